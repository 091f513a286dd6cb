/**
 * In-memory handle on one entity: durable operations plus the ones staged
 * since the last flush
 */

import { AmbiguousMatchError, InvalidInputError } from '../errors';
import { humanId } from '../model/canonical';
import { Identity } from '../model/identity';
import {
  Metadata,
  Operation,
  OperationPayload,
  OperationType,
  Status,
  createOperation,
  hashOperation,
  validateOperation,
} from '../model/operation';
import { Snapshot, effectiveMetadata, replay } from '../model/snapshot';

export interface AppendedOperation {
  hash: string;
  operation: Operation;
}

export class CachedEntity {
  readonly id: string;
  private committed: Operation[];
  private staged: Operation[];
  private hashes: string[];
  private types = new Map<string, OperationType>();
  private cachedSnapshot: Snapshot | null = null;
  private cachedMetadata: Map<string, Metadata> | null = null;
  private onWarning: (message: string) => void;

  constructor(
    committed: Operation[],
    staged: Operation[],
    onWarning: (message: string) => void
  ) {
    const all = [...committed, ...staged];
    if (all.length === 0) {
      throw new InvalidInputError('an entity needs at least its create operation');
    }

    this.committed = [...committed];
    this.staged = [...staged];
    this.hashes = all.map(hashOperation);
    this.id = this.hashes[0];
    this.onWarning = onWarning;
    all.forEach((op, index) => this.types.set(this.hashes[index], op.payload.type));
  }

  get humanId(): string {
    return humanId(this.id);
  }

  get operations(): Operation[] {
    return [...this.committed, ...this.staged];
  }

  get length(): number {
    return this.hashes.length;
  }

  /**
   * Current state, recomputed after every append
   */
  snapshot(): Snapshot {
    if (!this.cachedSnapshot) {
      this.cachedSnapshot = replay(this.operations, { onWarning: this.onWarning });
    }
    return this.cachedSnapshot;
  }

  needsFlush(): boolean {
    return this.staged.length > 0;
  }

  isPersisted(): boolean {
    return this.committed.length > 0;
  }

  stagedOperations(): Operation[] {
    return [...this.staged];
  }

  /**
   * Append exactly one operation to the staged part of the log
   */
  append(author: Identity, unixTime: number, payload: OperationPayload, metadata: Metadata = {}): AppendedOperation {
    this.checkContext(payload);
    return this.stage(createOperation(author.id, unixTime, payload, metadata));
  }

  /**
   * Stage an operation written elsewhere (another clone's log)
   */
  adopt(operation: Operation): AppendedOperation {
    validateOperation(operation);
    this.checkContext(operation.payload);
    return this.stage(operation);
  }

  addComment(author: Identity, unixTime: number, message: string, metadata?: Metadata): AppendedOperation {
    return this.append(author, unixTime, { type: 'add-comment', message }, metadata);
  }

  editComment(
    author: Identity,
    unixTime: number,
    target: string,
    message: string,
    metadata?: Metadata
  ): AppendedOperation {
    return this.append(author, unixTime, { type: 'edit-comment', target, message }, metadata);
  }

  setTitle(author: Identity, unixTime: number, title: string, metadata?: Metadata): AppendedOperation {
    const was = this.snapshot().title;
    return this.append(author, unixTime, { type: 'set-title', title, was }, metadata);
  }

  setStatus(author: Identity, unixTime: number, status: Status, metadata?: Metadata): AppendedOperation {
    return this.append(author, unixTime, { type: 'set-status', status }, metadata);
  }

  /**
   * Record a label change as given, even when it changes nothing visible
   */
  changeLabels(
    author: Identity,
    unixTime: number,
    added: string[],
    removed: string[],
    metadata?: Metadata
  ): AppendedOperation {
    return this.append(author, unixTime, { type: 'label-change', added, removed }, metadata);
  }

  setMetadata(author: Identity, unixTime: number, target: string, newMetadata: Metadata): AppendedOperation {
    return this.append(author, unixTime, { type: 'set-metadata', target, newMetadata });
  }

  /**
   * Effective metadata of one operation, including keys attached later
   */
  operationMetadata(hash: string): Metadata | undefined {
    return this.metadataIndex().get(hash);
  }

  createMetadata(key: string): string | undefined {
    return this.operationMetadata(this.id)?.[key];
  }

  /**
   * Hash of the operation carrying `key=value`, or undefined when none does
   */
  resolveOperationByMetadata(key: string, value: string): string | undefined {
    const matches: string[] = [];
    for (const [hash, metadata] of this.metadataIndex()) {
      if (metadata[key] === value) {
        matches.push(hash);
      }
    }

    if (matches.length > 1) {
      throw new AmbiguousMatchError(key, value, matches);
    }
    return matches[0];
  }

  hashOf(index: number): string {
    return this.hashes[index];
  }

  /** Called by the cache once the first `count` staged operations are durable */
  markFlushed(count: number): void {
    this.committed.push(...this.staged.splice(0, count));
  }

  /** Drop everything staged since the last flush */
  discardStaged(): void {
    if (this.staged.length === 0) return;

    for (const hash of this.hashes.splice(this.committed.length)) {
      this.types.delete(hash);
    }
    this.staged = [];
    this.invalidate();
  }

  private stage(operation: Operation): AppendedOperation {
    const hash = hashOperation(operation);

    this.staged.push(operation);
    this.hashes.push(hash);
    this.types.set(hash, operation.payload.type);
    this.invalidate();

    return { hash, operation };
  }

  private checkContext(payload: OperationPayload): void {
    switch (payload.type) {
      case 'create':
        throw new InvalidInputError(`entity ${this.humanId} already has a create operation`);

      case 'edit-comment': {
        const type = this.types.get(payload.target);
        if (type !== 'create' && type !== 'add-comment') {
          throw new InvalidInputError(`edit target ${humanId(payload.target)} is not a comment of ${this.humanId}`);
        }
        return;
      }

      case 'set-metadata':
        if (!this.types.has(payload.target)) {
          throw new InvalidInputError(`metadata target ${humanId(payload.target)} is not part of ${this.humanId}`);
        }
        return;

      default:
        return;
    }
  }

  private metadataIndex(): Map<string, Metadata> {
    if (!this.cachedMetadata) {
      this.cachedMetadata = effectiveMetadata(this.operations, this.hashes);
    }
    return this.cachedMetadata;
  }

  private invalidate(): void {
    this.cachedSnapshot = null;
    this.cachedMetadata = null;
  }
}
