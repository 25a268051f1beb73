import { createHash } from 'node:crypto';
import { ConfigError } from '../shared/errors.js';

/**
 * A named, fixed hash used to key entries. The version is stored with the
 * database so a store is never read back under a different scheme.
 */
export interface IdentityScheme {
  readonly version: string;
  digest(input: string): string;
}

function hexDigest(algorithm: 'sha1' | 'sha256'): (input: string) => string {
  return (input) => createHash(algorithm).update(input, 'utf8').digest('hex');
}

export const SHA1_V1: IdentityScheme = { version: 'sha1-v1', digest: hexDigest('sha1') };
export const SHA256_V1: IdentityScheme = { version: 'sha256-v1', digest: hexDigest('sha256') };

export const DEFAULT_IDENTITY_SCHEME = SHA1_V1;

const SCHEMES: ReadonlyMap<string, IdentityScheme> = new Map(
  [SHA1_V1, SHA256_V1].map((s) => [s.version, s]),
);

export function getIdentityScheme(version: string): IdentityScheme {
  const scheme = SCHEMES.get(version);
  if (!scheme) {
    throw new ConfigError(`Unknown identity scheme: ${version}`, { version });
  }
  return scheme;
}

/**
 * Identity of an entry: hash of its primary text followed by its link, if any.
 */
export function deriveIdentity(
  primaryText: string,
  link: string | null,
  scheme: IdentityScheme = DEFAULT_IDENTITY_SCHEME,
): string {
  return scheme.digest(primaryText + (link ?? ''));
}
