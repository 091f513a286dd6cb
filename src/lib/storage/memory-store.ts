/**
 * In-process store, used by tests and as a scratch repository
 */

import { EntityNotFoundError, InvalidInputError } from '../errors';
import { EncodedIdentity, Identity, decodeIdentity, encodeIdentity } from '../model/identity';
import { EncodedOperation, Operation, decodeOperation, encodeOperation, hashOperation } from '../model/operation';
import { OperationStore } from './types';

export class MemoryStore implements OperationStore {
  private logs = new Map<string, EncodedOperation[]>();
  private identities = new Map<string, EncodedIdentity>();

  async listEntityIds(): Promise<string[]> {
    return Array.from(this.logs.keys());
  }

  async readLog(entityId: string): Promise<Operation[]> {
    const log = this.logs.get(entityId);
    if (!log) {
      throw new EntityNotFoundError(entityId);
    }
    return log.map(decodeOperation);
  }

  async appendOperations(entityId: string, operations: readonly Operation[]): Promise<void> {
    if (operations.length === 0) return;

    const existing = this.logs.get(entityId);
    if (!existing && hashOperation(operations[0]) !== entityId) {
      throw new InvalidInputError(`new log for ${entityId} must start with its create operation`);
    }

    this.logs.set(entityId, [...(existing ?? []), ...operations.map(encodeOperation)]);
  }

  async listIdentities(): Promise<Identity[]> {
    return Array.from(this.identities.values()).map(decodeIdentity);
  }

  async writeIdentity(identity: Identity): Promise<void> {
    this.identities.set(identity.id, encodeIdentity(identity));
  }

  /** Number of stored operations of an entity, 0 when unknown */
  logLength(entityId: string): number {
    return this.logs.get(entityId)?.length ?? 0;
  }
}
