import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { AuthState, Credentials, TokenSet } from '../types/index.js';
import { NotAuthenticatedError, StoreError, ValidationError, isErrnoCode } from '../utils/index.js';

const OWNER_ONLY = 0o600;

export const credentialsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().optional(),
  access_token: z.string().optional(),
  email: z.string().optional(),
});

export function authStatus(credentials: Credentials | null): Exclude<AuthState, 'pending'> {
  return credentials?.refresh_token ? 'authenticated' : 'unauthenticated';
}

/** The provider credentials file: client id/secret plus the tokens obtained for them. */
export class CredentialsFile {
  readonly path: string;

  constructor(filePath: string) {
    this.path = filePath;
  }

  /** Returns null when the file does not exist. */
  async read(): Promise<Credentials | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return null;
      throw new StoreError('read credentials', this.path, err);
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ValidationError(`Credentials file ${this.path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = credentialsSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Credentials file ${this.path} is invalid: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`);
    }
    return parsed.data;
  }

  async load(): Promise<Credentials> {
    const creds = await this.read();
    if (!creds) {
      throw new NotAuthenticatedError(`Credentials file not found at ${this.path}: run the authorize command first`);
    }
    return creds;
  }

  async save(creds: Credentials): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      await fs.writeFile(this.path, JSON.stringify(creds, null, 2), { encoding: 'utf-8', mode: OWNER_ONLY });
      // mode only applies when the file is created
      await fs.chmod(this.path, OWNER_ONLY);
    } catch (err) {
      throw new StoreError('write credentials', this.path, err);
    }
  }

  /**
   * Merge freshly issued tokens into the stored credentials. Client id and
   * secret are preserved; a missing refresh token keeps the previous one.
   */
  async merge(tokens: TokenSet): Promise<Credentials> {
    const current = await this.load();
    const next: Credentials = {
      ...current,
      refresh_token: tokens.refreshToken ?? current.refresh_token,
      access_token: tokens.accessToken ?? current.access_token,
      email: tokens.email ?? current.email,
    };
    await this.save(next);
    return next;
  }
}

/** Opaque provider sync cursor, stored as raw text. */
export class SyncTokenFile {
  readonly path: string;

  constructor(filePath: string) {
    this.path = filePath;
  }

  async read(): Promise<string | undefined> {
    try {
      const token = await fs.readFile(this.path, 'utf-8');
      return token || undefined;
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return undefined;
      throw new StoreError('read sync token', this.path, err);
    }
  }

  async save(token: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      await fs.writeFile(this.path, token, { encoding: 'utf-8', mode: OWNER_ONLY });
      await fs.chmod(this.path, OWNER_ONLY);
    } catch (err) {
      throw new StoreError('write sync token', this.path, err);
    }
  }
}
