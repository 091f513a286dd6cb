/**
 * Export engine: pushes local operations a tracker has not seen yet and
 * records each push with a metadata-only follow-up operation
 */

import { CachedEntity } from '../cache/cached-entity';
import { EntityCache } from '../cache/entity-cache';
import { CancelledError, RemoteFetchError, StorageFailureError, TracklogError, errorMessage } from '../errors';
import { Identity } from '../model/identity';
import { Metadata, Operation } from '../model/operation';
import { MetadataKeys, metadataKeys } from '../sources/keys';
import { RemoteRef, RemoteWriter } from '../sources/types';
import { ExportEventKind, ExportResult } from './export-result';
import { toUnixTime } from './importer';

export interface ExportOptions {
  /** Skip operations dated before this time */
  since?: Date;
  /** Checked once per entity */
  signal?: AbortSignal;
  /** Clock for the follow-up operations, Unix seconds */
  now?: () => number;
}

type ExportStream = AsyncGenerator<ExportResult, void>;

interface PushOutcome {
  kind: ExportEventKind;
  metadata: Metadata;
  issue?: RemoteRef;
}

export class Exporter {
  private cache: EntityCache;
  private author: Identity;

  /**
   * @param author - identity recorded on the follow-up operations
   */
  constructor(cache: EntityCache, author: Identity) {
    this.cache = cache;
    this.author = author;
  }

  async *exportAll(writer: RemoteWriter, options: ExportOptions = {}): ExportStream {
    const keys = metadataKeys(writer.target);
    const now = options.now ?? (() => Math.floor(Date.now() / 1000));

    const entities = this.cache
      .all()
      .sort((a, b) => a.snapshot().createdAt - b.snapshot().createdAt || a.id.localeCompare(b.id));

    for (const entity of entities) {
      if (options.signal?.aborted) {
        yield { kind: 'error', error: new CancelledError(options.signal.reason), contextId: null };
        return;
      }

      const origin = entity.createMetadata(keys.origin);
      if (origin !== undefined && origin !== writer.target) {
        yield { kind: 'nothing', id: entity.id, reason: `entity originated from ${origin}` };
        continue;
      }

      const lock = await this.cache.acquireEntityLock(entity.id);
      try {
        const failed = yield* this.exportEntity(entity, writer, keys, options.since, now);
        if (failed) return;
      } finally {
        lock.release();
      }
    }
  }

  /**
   * Push one entity. Returns true when the run must stop.
   */
  private async *exportEntity(
    entity: CachedEntity,
    writer: RemoteWriter,
    keys: MetadataKeys,
    since: Date | undefined,
    now: () => number
  ): AsyncGenerator<ExportResult, boolean> {
    const createMetadata = entity.operationMetadata(entity.id) ?? {};
    let issue: RemoteRef | undefined =
      createMetadata[keys.id] && createMetadata[keys.url]
        ? { id: createMetadata[keys.id], url: createMetadata[keys.url] }
        : undefined;

    // Follow-ups appended below are not walked
    const operations = entity.operations.map((operation, index) => ({ operation, hash: entity.hashOf(index) }));
    let failure: { error: TracklogError; contextId: string } | undefined;
    let settled = false;

    try {
      for (const { operation, hash } of operations) {
        const type = operation.payload.type;
        if (type === 'noop' || type === 'set-metadata') continue;

        const metadata = entity.operationMetadata(hash) ?? {};
        if (metadata[keys.id] || metadata[keys.exported]) continue;
        if (since && operation.unixTime < toUnixTime(since)) continue;

        if (!issue && type !== 'create') {
          yield { kind: 'nothing', id: hash, reason: 'issue is not exported yet' };
          break;
        }

        let outcome: PushOutcome | string;
        try {
          outcome = await this.push(entity, operation, issue, writer, keys);
        } catch (error) {
          failure = {
            error:
              error instanceof TracklogError
                ? error
                : new RemoteFetchError(`push to ${writer.target}: ${errorMessage(error)}`, { cause: error }),
            contextId: hash,
          };
          break;
        }

        if (typeof outcome === 'string') {
          yield { kind: 'nothing', id: hash, reason: outcome };
          continue;
        }

        issue = outcome.issue ?? issue;
        entity.setMetadata(this.author, now(), hash, outcome.metadata);
        yield { kind: outcome.kind, id: hash };
      }

      // Pushed operations are tagged even when a push failed
      try {
        await this.cache.flushIfDirty(entity);
      } catch (error) {
        this.cache.rollback(entity);
        settled = true;
        const flushError = error instanceof Error ? error : new Error(String(error));
        yield {
          kind: 'error',
          error: failure
            ? new StorageFailureError(`${failure.error.message}; then ${flushError.message}`, { cause: flushError })
            : flushError,
          contextId: failure?.contextId ?? entity.id,
        };
        return true;
      }
      settled = true;
    } finally {
      // The consumer stopped pulling results: what was pushed stays tagged
      if (!settled) {
        try {
          await this.cache.flushIfDirty(entity);
        } catch (error) {
          this.cache.rollback(entity);
          throw error;
        }
      }
    }

    if (failure) {
      yield { kind: 'error', error: failure.error, contextId: failure.contextId };
      return true;
    }
    return false;
  }

  /**
   * Replay one operation on the tracker. A string outcome is a reason to
   * skip it.
   */
  private async push(
    entity: CachedEntity,
    operation: Operation,
    issue: RemoteRef | undefined,
    writer: RemoteWriter,
    keys: MetadataKeys
  ): Promise<PushOutcome | string> {
    const payload = operation.payload;
    const exported = { [keys.exported]: 'true' };

    if (payload.type === 'create') {
      const created = await writer.createIssue(payload.title, payload.message);
      return { kind: 'issue', metadata: { [keys.id]: created.id, [keys.url]: created.url }, issue: created };
    }
    if (!issue) {
      return 'issue is not exported yet';
    }

    switch (payload.type) {
      case 'add-comment': {
        const comment = await writer.addComment(issue, payload.message);
        return { kind: 'comment', metadata: { [keys.id]: comment.id, [keys.url]: comment.url } };
      }

      case 'edit-comment': {
        if (payload.target === entity.id) {
          await writer.editIssueBody(issue, payload.message);
          return { kind: 'comment-edition', metadata: exported };
        }
        const commentId = entity.operationMetadata(payload.target)?.[keys.id];
        if (!commentId) {
          return 'edited comment is not exported yet';
        }
        await writer.editComment(issue, commentId, payload.message);
        return { kind: 'comment-edition', metadata: exported };
      }

      case 'set-title':
        await writer.setTitle(issue, payload.title);
        return { kind: 'title-edition', metadata: exported };

      case 'set-status':
        await writer.setStatus(issue, payload.status);
        return { kind: 'status-change', metadata: exported };

      case 'label-change':
        await writer.changeLabels(issue, payload.added, payload.removed);
        return { kind: 'label-change', metadata: exported };

      default:
        return `${payload.type} operations are not exported`;
    }
  }
}
