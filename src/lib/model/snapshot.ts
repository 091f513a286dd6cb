/**
 * Snapshot projection: replay an operation log into its current state
 */

import { CorruptLogError } from '../errors';
import { humanId } from './canonical';
import { Metadata, Operation, Status, hashOperation } from './operation';

export interface Comment {
  /** Hash of the create or add-comment operation */
  id: string;
  author: string;
  message: string;
  unixTime: number;
  edited: boolean;
}

export interface CommentVersion {
  author: string;
  message: string;
  unixTime: number;
}

interface TimelineBase {
  hash: string;
  author: string;
  unixTime: number;
}

export interface CreateTimelineItem extends TimelineBase {
  type: 'create';
  title: string;
  message: string;
  history: CommentVersion[];
}

export interface CommentTimelineItem extends TimelineBase {
  type: 'comment';
  message: string;
  history: CommentVersion[];
}

export interface SetTitleTimelineItem extends TimelineBase {
  type: 'set-title';
  title: string;
  was: string;
}

export interface SetStatusTimelineItem extends TimelineBase {
  type: 'set-status';
  status: Status;
}

export interface LabelChangeTimelineItem extends TimelineBase {
  type: 'label-change';
  added: string[];
  removed: string[];
}

export type TimelineItem =
  | CreateTimelineItem
  | CommentTimelineItem
  | SetTitleTimelineItem
  | SetStatusTimelineItem
  | LabelChangeTimelineItem;

export interface Snapshot {
  id: string;
  status: Status;
  title: string;
  comments: Comment[];
  labels: string[];
  author: string;
  actors: string[];
  participants: string[];
  createdAt: number;
  lastEditTime: number;
  timeline: TimelineItem[];
  operations: Operation[];
  hashes: string[];
}

export interface ReplayOptions {
  /** Receives non-fatal anomalies such as clock skew between authors */
  onWarning?: (message: string) => void;
}

function addUnique(list: string[], value: string): void {
  if (!list.includes(value)) {
    list.push(value);
  }
}

/**
 * Replay every operation in log order. Pure: the same log always yields a
 * structurally identical snapshot.
 */
export function replay(operations: readonly Operation[], options: ReplayOptions = {}): Snapshot {
  const warn = options.onWarning ?? (() => undefined);
  const first = operations[0];

  if (!first || first.payload.type !== 'create') {
    throw new CorruptLogError('operation log does not start with a create operation');
  }

  const hashes = operations.map(hashOperation);
  const id = hashes[0];

  const snapshot: Snapshot = {
    id,
    status: 'open',
    title: first.payload.title,
    comments: [],
    labels: [],
    author: first.author,
    actors: [],
    participants: [],
    createdAt: first.unixTime,
    lastEditTime: first.unixTime,
    timeline: [],
    operations: [...operations],
    hashes,
  };

  const labels = new Set<string>();
  const commentIndex = new Map<string, number>();
  const historyIndex = new Map<string, CreateTimelineItem | CommentTimelineItem>();
  let previousTime = first.unixTime;

  operations.forEach((op, index) => {
    const hash = hashes[index];
    const payload = op.payload;

    if (index > 0 && payload.type === 'create') {
      throw new CorruptLogError(`entity ${humanId(id)} has a second create operation at position ${index}`);
    }
    if (op.unixTime < previousTime) {
      warn(
        `operation ${humanId(hash)} of entity ${humanId(id)} is dated before its predecessor ` +
          `(${op.unixTime} < ${previousTime})`
      );
    }
    previousTime = Math.max(previousTime, op.unixTime);
    snapshot.lastEditTime = op.unixTime;
    addUnique(snapshot.actors, op.author);

    switch (payload.type) {
      case 'create':
      case 'add-comment': {
        commentIndex.set(hash, snapshot.comments.length);
        snapshot.comments.push({
          id: hash,
          author: op.author,
          message: payload.message,
          unixTime: op.unixTime,
          edited: false,
        });
        addUnique(snapshot.participants, op.author);

        const version: CommentVersion = { author: op.author, message: payload.message, unixTime: op.unixTime };
        const item: CreateTimelineItem | CommentTimelineItem =
          payload.type === 'create'
            ? { type: 'create', hash, author: op.author, unixTime: op.unixTime, title: payload.title, message: payload.message, history: [version] }
            : { type: 'comment', hash, author: op.author, unixTime: op.unixTime, message: payload.message, history: [version] };
        historyIndex.set(hash, item);
        snapshot.timeline.push(item);
        break;
      }

      case 'edit-comment': {
        const position = commentIndex.get(payload.target);
        const item = historyIndex.get(payload.target);
        if (position === undefined || !item) {
          warn(`edit ${humanId(hash)} targets unknown comment ${humanId(payload.target)}, skipped`);
          break;
        }
        snapshot.comments[position] = {
          ...snapshot.comments[position],
          message: payload.message,
          edited: true,
        };
        item.message = payload.message;
        item.history.push({ author: op.author, message: payload.message, unixTime: op.unixTime });
        break;
      }

      case 'set-title':
        snapshot.title = payload.title;
        snapshot.timeline.push({
          type: 'set-title',
          hash,
          author: op.author,
          unixTime: op.unixTime,
          title: payload.title,
          was: payload.was,
        });
        break;

      case 'set-status':
        snapshot.status = payload.status;
        snapshot.timeline.push({
          type: 'set-status',
          hash,
          author: op.author,
          unixTime: op.unixTime,
          status: payload.status,
        });
        break;

      case 'label-change':
        for (const label of payload.added) labels.add(label);
        for (const label of payload.removed) labels.delete(label);
        snapshot.timeline.push({
          type: 'label-change',
          hash,
          author: op.author,
          unixTime: op.unixTime,
          added: [...payload.added],
          removed: [...payload.removed],
        });
        break;

      case 'set-metadata':
      case 'noop':
        break;

      default: {
        const unreachable: never = payload;
        throw new CorruptLogError(`unknown operation ${JSON.stringify(unreachable)}`);
      }
    }
  });

  snapshot.labels = [...labels].sort();
  return snapshot;
}

/**
 * Metadata of each operation merged with the keys later set-metadata
 * operations attached to it. Existing keys are never overridden.
 */
export function effectiveMetadata(operations: readonly Operation[], hashes: readonly string[]): Map<string, Metadata> {
  const result = new Map<string, Metadata>();

  operations.forEach((op, index) => {
    result.set(hashes[index], { ...op.metadata });

    if (op.payload.type === 'set-metadata') {
      const target = result.get(op.payload.target);
      if (!target) return;
      for (const [key, value] of Object.entries(op.payload.newMetadata)) {
        if (!(key in target)) {
          target[key] = value;
        }
      }
    }
  });

  return result;
}

export function searchComment(snapshot: Snapshot, id: string): Comment | undefined {
  return snapshot.comments.find((comment) => comment.id === id);
}
