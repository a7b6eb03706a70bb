import { createHash, randomBytes } from 'node:crypto';

export interface PkcePair {
  verifier: string;
  challenge: string;
}

/** RFC 7636 S256: a 256-bit random verifier and the base64url SHA-256 of it. */
export function generatePkce(): PkcePair {
  const verifier = randomBytes(32).toString('base64url');
  return { verifier, challenge: challengeFor(verifier) };
}

export function challengeFor(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

/** Anti-forgery value echoed back by the provider on the redirect. */
export function generateState(): string {
  return randomBytes(16).toString('base64url');
}
