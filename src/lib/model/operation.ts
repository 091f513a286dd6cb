/**
 * Operations: the immutable, content-addressed units of an entity's history
 */

import { z } from 'zod';
import { contentHash, generateNonce } from './canonical';
import { CorruptLogError, InvalidInputError } from '../errors';

export type Metadata = Record<string, string>;

export type Status = 'open' | 'closed';

export interface CreatePayload {
  type: 'create';
  title: string;
  message: string;
}

export interface AddCommentPayload {
  type: 'add-comment';
  message: string;
}

export interface EditCommentPayload {
  type: 'edit-comment';
  /** Hash of the create or add-comment operation being edited */
  target: string;
  message: string;
}

export interface SetTitlePayload {
  type: 'set-title';
  title: string;
  was: string;
}

export interface LabelChangePayload {
  type: 'label-change';
  added: string[];
  removed: string[];
}

export interface SetStatusPayload {
  type: 'set-status';
  status: Status;
}

/**
 * Attaches metadata learned after the target was written (e.g. the remote id
 * an exported comment received).
 */
export interface SetMetadataPayload {
  type: 'set-metadata';
  target: string;
  newMetadata: Metadata;
}

export interface NoopPayload {
  type: 'noop';
}

export type OperationPayload =
  | CreatePayload
  | AddCommentPayload
  | EditCommentPayload
  | SetTitlePayload
  | LabelChangePayload
  | SetStatusPayload
  | SetMetadataPayload
  | NoopPayload;

export type OperationType = OperationPayload['type'];

export interface Operation<P extends OperationPayload = OperationPayload> {
  /** Identity id of the author */
  readonly author: string;
  /** Author-supplied Unix time in seconds */
  readonly unixTime: number;
  readonly nonce: string;
  readonly metadata: Readonly<Metadata>;
  readonly payload: P;
}

export const OPERATION_FORMAT_VERSION = 1;

export function createOperation<P extends OperationPayload>(
  author: string,
  unixTime: number,
  payload: P,
  metadata: Metadata = {}
): Operation<P> {
  const op: Operation<P> = {
    author,
    unixTime,
    nonce: generateNonce(),
    metadata: { ...metadata },
    payload,
  };
  validateOperation(op);
  return op;
}

function isSingleLine(text: string): boolean {
  return !/[\r\n]/.test(text);
}

/**
 * Check the constraints an operation must satisfy on its own. Constraints
 * that depend on the rest of the log are checked by the entity.
 */
export function validateOperation(op: Operation): void {
  if (op.author.trim() === '') {
    throw new InvalidInputError('operation author is empty');
  }
  if (!Number.isInteger(op.unixTime) || op.unixTime <= 0) {
    throw new InvalidInputError(`invalid operation time: ${op.unixTime}`);
  }

  const payload = op.payload;
  switch (payload.type) {
    case 'create':
    case 'set-title':
      if (payload.title.trim() === '') {
        throw new InvalidInputError('title is empty');
      }
      if (!isSingleLine(payload.title)) {
        throw new InvalidInputError('title must be a single line');
      }
      return;

    case 'add-comment':
      if (payload.message.trim() === '') {
        throw new InvalidInputError('comment message is empty');
      }
      return;

    case 'edit-comment':
    case 'set-metadata':
      if (payload.target === '') {
        throw new InvalidInputError(`${payload.type} has no target`);
      }
      return;

    case 'label-change':
      if (payload.added.length === 0 && payload.removed.length === 0) {
        throw new InvalidInputError('label change adds and removes nothing');
      }
      for (const label of [...payload.added, ...payload.removed]) {
        if (label.trim() === '' || !isSingleLine(label)) {
          throw new InvalidInputError(`invalid label "${label}"`);
        }
      }
      return;

    case 'set-status':
    case 'noop':
      return;

    default: {
      const unreachable: never = payload;
      throw new InvalidInputError(`unknown operation ${JSON.stringify(unreachable)}`);
    }
  }
}

const metadataSchema = z.record(z.string(), z.string());

const baseSchema = {
  v: z.literal(OPERATION_FORMAT_VERSION),
  author: z.string(),
  time: z.number().int(),
  nonce: z.string(),
  metadata: metadataSchema,
};

const encodedOperationSchema = z.discriminatedUnion('type', [
  z.object({ ...baseSchema, type: z.literal('create'), title: z.string(), message: z.string() }),
  z.object({ ...baseSchema, type: z.literal('add-comment'), message: z.string() }),
  z.object({
    ...baseSchema,
    type: z.literal('edit-comment'),
    target: z.string(),
    message: z.string(),
  }),
  z.object({ ...baseSchema, type: z.literal('set-title'), title: z.string(), was: z.string() }),
  z.object({
    ...baseSchema,
    type: z.literal('label-change'),
    added: z.array(z.string()),
    removed: z.array(z.string()),
  }),
  z.object({ ...baseSchema, type: z.literal('set-status'), status: z.enum(['open', 'closed']) }),
  z.object({
    ...baseSchema,
    type: z.literal('set-metadata'),
    target: z.string(),
    newMetadata: metadataSchema,
  }),
  z.object({ ...baseSchema, type: z.literal('noop') }),
]);

export type EncodedOperation = z.infer<typeof encodedOperationSchema>;

export function encodeOperation(op: Operation): EncodedOperation {
  const base = {
    v: OPERATION_FORMAT_VERSION,
    author: op.author,
    time: op.unixTime,
    nonce: op.nonce,
    metadata: { ...op.metadata },
  } as const;

  const payload = op.payload;
  switch (payload.type) {
    case 'create':
      return { ...base, type: 'create', title: payload.title, message: payload.message };
    case 'add-comment':
      return { ...base, type: 'add-comment', message: payload.message };
    case 'edit-comment':
      return { ...base, type: 'edit-comment', target: payload.target, message: payload.message };
    case 'set-title':
      return { ...base, type: 'set-title', title: payload.title, was: payload.was };
    case 'label-change':
      return {
        ...base,
        type: 'label-change',
        added: [...payload.added],
        removed: [...payload.removed],
      };
    case 'set-status':
      return { ...base, type: 'set-status', status: payload.status };
    case 'set-metadata':
      return {
        ...base,
        type: 'set-metadata',
        target: payload.target,
        newMetadata: { ...payload.newMetadata },
      };
    case 'noop':
      return { ...base, type: 'noop' };
  }
}

function toPayload(encoded: EncodedOperation): OperationPayload {
  switch (encoded.type) {
    case 'create':
      return { type: 'create', title: encoded.title, message: encoded.message };
    case 'add-comment':
      return { type: 'add-comment', message: encoded.message };
    case 'edit-comment':
      return { type: 'edit-comment', target: encoded.target, message: encoded.message };
    case 'set-title':
      return { type: 'set-title', title: encoded.title, was: encoded.was };
    case 'label-change':
      return { type: 'label-change', added: encoded.added, removed: encoded.removed };
    case 'set-status':
      return { type: 'set-status', status: encoded.status };
    case 'set-metadata':
      return { type: 'set-metadata', target: encoded.target, newMetadata: encoded.newMetadata };
    case 'noop':
      return { type: 'noop' };
  }
}

/**
 * Decode a stored operation, failing with CorruptLogError on anything that
 * does not match the current format.
 */
export function decodeOperation(raw: unknown): Operation {
  const parsed = encodedOperationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptLogError(`undecodable operation: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const encoded = parsed.data;
  return {
    author: encoded.author,
    unixTime: encoded.time,
    nonce: encoded.nonce,
    metadata: encoded.metadata,
    payload: toPayload(encoded),
  };
}

/**
 * Content hash of an operation. Stable across releases for the same
 * encoded content.
 */
export function hashOperation(op: Operation): string {
  return contentHash(encodeOperation(op));
}
