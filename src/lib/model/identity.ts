/**
 * Participants, deduplicated across sources through their metadata
 */

import { z } from 'zod';
import { contentHash, generateNonce } from './canonical';
import { CorruptLogError, InvalidInputError } from '../errors';
import { Metadata } from './operation';

export interface IdentityProfile {
  name?: string;
  email?: string;
  login: string;
  avatarUrl?: string;
  metadata?: Metadata;
}

export interface Identity {
  readonly id: string;
  readonly name: string | null;
  readonly email: string | null;
  readonly login: string;
  readonly avatarUrl: string | null;
  readonly metadata: Readonly<Metadata>;
  readonly nonce: string;
}

const encodedIdentitySchema = z.object({
  v: z.literal(1),
  name: z.string().nullable(),
  email: z.string().nullable(),
  login: z.string(),
  avatarUrl: z.string().nullable(),
  metadata: z.record(z.string(), z.string()),
  nonce: z.string(),
});

export type EncodedIdentity = z.infer<typeof encodedIdentitySchema>;

export function encodeIdentity(identity: Identity): EncodedIdentity {
  return {
    v: 1,
    name: identity.name,
    email: identity.email,
    login: identity.login,
    avatarUrl: identity.avatarUrl,
    metadata: { ...identity.metadata },
    nonce: identity.nonce,
  };
}

export function createIdentity(profile: IdentityProfile): Identity {
  if (profile.login.trim() === '') {
    throw new InvalidInputError('identity login is empty');
  }

  const encoded: EncodedIdentity = {
    v: 1,
    name: profile.name || null,
    email: profile.email || null,
    login: profile.login,
    avatarUrl: profile.avatarUrl || null,
    metadata: { ...(profile.metadata ?? {}) },
    nonce: generateNonce(),
  };

  return toIdentity(encoded);
}

function toIdentity(encoded: EncodedIdentity): Identity {
  return {
    id: contentHash(encoded),
    name: encoded.name,
    email: encoded.email,
    login: encoded.login,
    avatarUrl: encoded.avatarUrl,
    metadata: encoded.metadata,
    nonce: encoded.nonce,
  };
}

export function decodeIdentity(raw: unknown): Identity {
  const parsed = encodedIdentitySchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptLogError(`undecodable identity: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return toIdentity(parsed.data);
}

/**
 * Human-readable form, e.g. "Alice Doe (alice)"
 */
export function displayName(identity: Identity): string {
  return identity.name ? `${identity.name} (${identity.login})` : identity.login;
}
