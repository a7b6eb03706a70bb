import * as path from 'node:path';

export const VCARD_EXTENSION = '.vcf';

/**
 * Whether an identifier can name a file directly inside the store directory.
 * Anything that could escape it or address a different file is rejected.
 */
export function isStorableId(id: string): boolean {
  return id.length > 0 && id !== '.' && id !== '..' && !/[/\\\0]/.test(id);
}

export function contactPath(dir: string, id: string): string {
  return path.join(dir, `${id}${VCARD_EXTENSION}`);
}

/** Extract the contact id from a directory entry like "abc-123.vcf". */
export function extractIdFromFile(fileName: string): string | undefined {
  if (!fileName.endsWith(VCARD_EXTENSION)) return undefined;
  const id = fileName.slice(0, -VCARD_EXTENSION.length);
  return isStorableId(id) ? id : undefined;
}
