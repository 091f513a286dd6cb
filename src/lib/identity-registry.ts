/**
 * Identity registry: resolves participants by metadata and creates them at
 * most once per (key, value) anchor
 */

import {
  AmbiguousMatchError,
  AmbiguousPrefixError,
  IdentityNotFoundError,
  StorageFailureError,
  TracklogError,
  errorMessage,
} from './errors';
import { Identity, IdentityProfile, createIdentity } from './model/identity';
import { OperationStore } from './storage/types';

export interface EnsureIdentityResult {
  identity: Identity;
  /** True when the identity did not exist and was just persisted */
  created: boolean;
}

export class IdentityRegistry {
  private store: OperationStore;
  private identities = new Map<string, Identity>();

  constructor(store: OperationStore) {
    this.store = store;
  }

  /**
   * Build a registry holding every identity of the store
   */
  static async load(store: OperationStore): Promise<IdentityRegistry> {
    const registry = new IdentityRegistry(store);
    for (const identity of await store.listIdentities()) {
      registry.identities.set(identity.id, identity);
    }
    return registry;
  }

  get(id: string): Identity {
    const identity = this.identities.get(id);
    if (!identity) {
      throw new IdentityNotFoundError(id);
    }
    return identity;
  }

  all(): Identity[] {
    return Array.from(this.identities.values());
  }

  /**
   * Exact-match lookup. Two identities holding the same pair is a data
   * integrity problem and is reported, not resolved.
   */
  resolveByMetadata(key: string, value: string): Identity {
    const matches = this.all().filter((identity) => identity.metadata[key] === value);

    if (matches.length > 1) {
      throw new AmbiguousMatchError(key, value, matches.map((identity) => identity.id));
    }
    if (matches.length === 0) {
      throw new IdentityNotFoundError(`${key}=${value}`);
    }
    return matches[0];
  }

  resolveByPrefix(prefix: string): Identity {
    const matches = this.all().filter((identity) => identity.id.startsWith(prefix));

    if (matches.length > 1) {
      throw new AmbiguousPrefixError(prefix, matches.map((identity) => identity.id));
    }
    if (matches.length === 0) {
      throw new IdentityNotFoundError(prefix);
    }
    return matches[0];
  }

  /**
   * Create and persist a new identity without any deduplication
   */
  async createIdentity(profile: IdentityProfile): Promise<Identity> {
    const identity = createIdentity(profile);

    // Registered before the write so a concurrent ensureIdentity sees it
    this.identities.set(identity.id, identity);
    try {
      await this.store.writeIdentity(identity);
    } catch (error) {
      this.identities.delete(identity.id);
      if (error instanceof TracklogError) throw error;
      throw new StorageFailureError(`cannot store identity: ${errorMessage(error)}`, { cause: error });
    }

    return identity;
  }

  /**
   * Resolve by `(anchorKey, profile.login)`, or create the identity with that
   * pair attached. Every importer funnels person creation through here.
   */
  async ensureIdentity(anchorKey: string, profile: IdentityProfile): Promise<EnsureIdentityResult> {
    try {
      return { identity: this.resolveByMetadata(anchorKey, profile.login), created: false };
    } catch (error) {
      if (!(error instanceof IdentityNotFoundError)) {
        throw error;
      }
    }

    const identity = await this.createIdentity({
      ...profile,
      metadata: { ...(profile.metadata ?? {}), [anchorKey]: profile.login },
    });
    return { identity, created: true };
  }

  /**
   * Adopt an identity coming from another clone. Returns false when it is
   * already known.
   */
  async merge(identity: Identity): Promise<boolean> {
    if (this.identities.has(identity.id)) {
      return false;
    }
    await this.store.writeIdentity(identity);
    this.identities.set(identity.id, identity);
    return true;
  }
}
