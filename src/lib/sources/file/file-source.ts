/**
 * Offline source reading a JSON dump of normalized tracker records
 */

import fs from 'fs';
import { z } from 'zod';
import { RemoteFetchError, errorMessage } from '../../errors';
import { RemoteEvent, RemoteItem, SourceIterator } from '../types';

export const FILE_TARGET = 'file';

const dateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const actorSchema = z.object({
  login: z.string().min(1),
  name: z.string().optional(),
  email: z.string().optional(),
  avatarUrl: z.string().optional(),
});

const editSchema = z.object({
  id: z.string().min(1),
  editor: actorSchema.nullable(),
  createdAt: dateSchema,
  body: z.string().nullable(),
});

const eventBase = {
  id: z.string().min(1),
  actor: actorSchema.nullable(),
  createdAt: dateSchema,
};

const eventSchema = z.discriminatedUnion('kind', [
  z.object({
    ...eventBase,
    kind: z.literal('comment'),
    url: z.string().min(1),
    body: z.string(),
    updatedAt: dateSchema.optional(),
    edits: z.array(editSchema).default([]),
  }),
  z.object({ ...eventBase, kind: z.literal('status-change'), status: z.enum(['open', 'closed']) }),
  z.object({ ...eventBase, kind: z.literal('label-add'), label: z.string().min(1) }),
  z.object({ ...eventBase, kind: z.literal('label-remove'), label: z.string().min(1) }),
  z.object({ ...eventBase, kind: z.literal('title-change'), title: z.string().min(1) }),
  z.object({ ...eventBase, kind: z.literal('description-change'), body: z.string() }),
  z.object({ ...eventBase, kind: z.literal('unsupported'), type: z.string() }),
]);

const itemSchema = z.object({
  id: z.string().min(1),
  url: z.string().min(1),
  author: actorSchema.nullable(),
  title: z.string().min(1),
  body: z.string().default(''),
  createdAt: dateSchema,
  updatedAt: dateSchema.optional(),
  edits: z.array(editSchema).default([]),
  events: z.array(eventSchema).default([]),
});

export const dumpSchema = z.object({
  items: z.array(itemSchema),
});

export type DumpItem = z.infer<typeof itemSchema>;
type DumpEvent = z.infer<typeof eventSchema>;

function toRemoteEvent(event: DumpEvent): RemoteEvent {
  if (event.kind === 'comment') {
    return { ...event, updatedAt: event.updatedAt ?? event.createdAt };
  }
  return event;
}

function toRemoteItem(item: DumpItem): RemoteItem {
  return {
    id: item.id,
    url: item.url,
    author: item.author,
    title: item.title,
    body: item.body,
    createdAt: item.createdAt,
    updatedAt: item.updatedAt ?? item.createdAt,
    edits: item.edits,
    // A dump is complete, so no events means none happened
    knownEmpty: item.events.length === 0,
    async *events(): AsyncGenerator<RemoteEvent> {
      for (const event of item.events) {
        yield toRemoteEvent(event);
      }
    },
  };
}

export class FileSource implements SourceIterator {
  readonly target: string;
  private filePath: string;

  constructor(filePath: string, target: string = FILE_TARGET) {
    this.filePath = filePath;
    this.target = target;
  }

  async *items(since?: Date): AsyncGenerator<RemoteItem> {
    for (const item of await this.load()) {
      const updatedAt = item.updatedAt ?? item.createdAt;
      if (since && updatedAt < since) continue;
      yield toRemoteItem(item);
    }
  }

  async isReadable(): Promise<boolean> {
    try {
      await fs.promises.access(this.filePath, fs.constants.R_OK);
      return true;
    } catch (error) {
      if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EACCES')) {
        return false;
      }
      throw error;
    }
  }

  private async load(): Promise<DumpItem[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      throw new RemoteFetchError(`cannot read ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }

    const result = dumpSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new RemoteFetchError(`invalid dump ${this.filePath}: ${issue.path.join('.')} ${issue.message}`);
    }
    return result.data.items;
  }
}
