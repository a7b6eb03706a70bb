type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const debugEnabled = (): boolean => Boolean(process.env.ADDRESSBOOK_DEBUG || process.env.DEBUG);

function write(level: Level, args: unknown[]): void {
  console.error(`[${level}]`, ...args);
}

/**
 * Everything goes to stderr: stdout carries the MCP stdio transport.
 * Debug lines appear only when ADDRESSBOOK_DEBUG or DEBUG is set.
 */
export const logger = {
  info: (...args: unknown[]) => write('INFO', args),
  warn: (...args: unknown[]) => write('WARN', args),
  error: (...args: unknown[]) => write('ERROR', args),
  debug: (...args: unknown[]) => {
    if (debugEnabled()) write('DEBUG', args);
  },
};
