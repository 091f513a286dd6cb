/**
 * Storage interface consumed by the identity registry and entity cache
 */

import { Identity } from '../model/identity';
import { Operation } from '../model/operation';

/**
 * Durable, append-only home of operation logs and identities.
 *
 * `appendOperations` is atomic: after a crash either every given operation
 * is readable or none is.
 */
export interface OperationStore {
  listEntityIds(): Promise<string[]>;

  /** Throws EntityNotFoundError for unknown ids, CorruptLogError on undecodable data */
  readLog(entityId: string): Promise<Operation[]>;

  appendOperations(entityId: string, operations: readonly Operation[]): Promise<void>;

  listIdentities(): Promise<Identity[]>;

  writeIdentity(identity: Identity): Promise<void>;
}
