import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError, isErrnoCode } from './utils/index.js';

export interface AppConfig {
  dir: string;
  redirectPort: number;
}

export const DEFAULT_DIR = path.join(os.homedir(), '.config', 'addressbook');
export const DEFAULT_REDIRECT_PORT = 8080;

const portSchema = z.coerce.number().int().min(1).max(65535);

const configFileSchema = z.object({
  redirectPort: portSchema.optional(),
});

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const dir = env.ADDRESSBOOK_DIR || DEFAULT_DIR;
  const configPath = path.join(dir, 'config.json');

  let fileConfig: z.infer<typeof configFileSchema> = {};
  let raw: string | undefined;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    // No config file yet: use defaults
    if (!isErrnoCode(err, 'ENOENT')) {
      throw new ValidationError(`Cannot read ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  if (raw !== undefined) {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ValidationError(`${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`${configPath} is invalid: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`);
    }
    fileConfig = parsed.data;
  }

  let redirectPort = fileConfig.redirectPort;
  if (redirectPort === undefined && env.ADDRESSBOOK_REDIRECT_PORT) {
    const parsed = portSchema.safeParse(env.ADDRESSBOOK_REDIRECT_PORT);
    if (!parsed.success) {
      throw new ValidationError(`ADDRESSBOOK_REDIRECT_PORT is not a valid port: ${env.ADDRESSBOOK_REDIRECT_PORT}`);
    }
    redirectPort = parsed.data;
  }

  return { dir, redirectPort: redirectPort ?? DEFAULT_REDIRECT_PORT };
}

export function peopleDir(config: AppConfig): string {
  return path.join(config.dir, 'people');
}

export function credentialsPath(config: AppConfig): string {
  return path.join(config.dir, 'google_creds.json');
}

export function syncTokenPath(config: AppConfig): string {
  return path.join(config.dir, 'google_sync_token.txt');
}

export function redirectUri(config: AppConfig): string {
  return `http://localhost:${config.redirectPort}/callback`;
}
