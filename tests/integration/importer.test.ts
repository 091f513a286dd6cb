import { EntityCache } from '../../src/lib/cache/entity-cache';
import { AmbiguousMatchError, CancelledError, RemoteFetchError, StorageFailureError } from '../../src/lib/errors';
import { MemoryStore } from '../../src/lib/storage/memory-store';
import { Importer } from '../../src/lib/sync/importer';
import { ImportResult, describeImportResult } from '../../src/lib/sync/import-result';
import { Operation } from '../../src/lib/model/operation';
import {
  FakeSource,
  alice,
  at,
  collect,
  commentEvent,
  fakeItem,
  itemUrl,
  statusEvent,
} from '../helpers/fakes';

class FailingStore extends MemoryStore {
  async appendOperations(_entityId: string, _operations: readonly Operation[]): Promise<void> {
    throw new Error('disk full');
  }
}

function kinds(results: ImportResult[]): string[] {
  return results.map((result) => result.kind);
}

function reasons(results: ImportResult[]): string[] {
  return results.flatMap((result) => (result.kind === 'nothing' ? [result.reason] : []));
}

function lastError(results: ImportResult[]): { error: Error; contextId: string | null } {
  const last = results[results.length - 1];
  if (last?.kind !== 'error') {
    throw new Error(`expected an error result, got ${last?.kind}`);
  }
  return last;
}

describe('Importer', () => {
  let store: MemoryStore;
  let cache: EntityCache;
  let importer: Importer;

  beforeEach(async () => {
    store = new MemoryStore();
    cache = await EntityCache.open(store, { onWarning: () => undefined });
    importer = new Importer(cache);
  });

  const bugA = (...comments: Array<[string, string]>) =>
    fakeItem({
      id: '42',
      title: 'Bug A',
      body: 'desc',
      events: comments.map(([id, body]) => commentEvent(id, body)),
    });

  describe('first import', () => {
    it('should create the entity and one comment per remote comment', async () => {
      const results = await collect(importer.importAll(new FakeSource([bugA(['c1', 'first'], ['c2', 'second'])])));

      expect(kinds(results)).toEqual(['identity', 'entity', 'identity', 'comment', 'comment']);

      const entity = cache.resolveCreateByMetadata('fake-url', itemUrl('42'));
      expect(entity).toBeDefined();
      if (!entity) return;

      expect(store.logLength(entity.id)).toBe(3);
      expect(results[1]).toEqual({ kind: 'entity', id: entity.id });
      expect(results[3]).toEqual({ kind: 'comment', id: entity.hashOf(1) });
      expect(results[4]).toEqual({ kind: 'comment', id: entity.hashOf(2) });

      const snapshot = entity.snapshot();
      expect(snapshot.title).toBe('Bug A');
      expect(snapshot.comments.map((c) => c.message)).toEqual(['desc', 'first', 'second']);
      expect(entity.createMetadata('origin')).toBe('fake');
      expect(entity.createMetadata('fake-id')).toBe('42');
      expect(entity.operationMetadata(entity.hashOf(1))).toEqual({
        'fake-id': 'c1',
        'fake-url': 'https://tracker.test/items/comments/c1',
      });
    });

    it('should create identities anchored on the tracker login', async () => {
      await collect(importer.importAll(new FakeSource([bugA(['c1', 'first'])])));

      const author = cache.identities.resolveByMetadata('fake-login', 'alice');
      expect(author.name).toBe('Alice');
      expect(cache.identities.resolveByMetadata('fake-login', 'bob').login).toBe('bob');
    });

    it('should map a missing author to the ghost account', async () => {
      const item = fakeItem({ id: '8', author: null, knownEmpty: true });

      const results = await collect(importer.importAll(new FakeSource([item])));

      expect(kinds(results)).toEqual(['identity', 'entity']);
      expect(cache.identities.resolveByMetadata('fake-login', 'ghost').login).toBe('ghost');
    });
  });

  describe('re-import', () => {
    it('should only append what is new', async () => {
      await collect(importer.importAll(new FakeSource([bugA(['c1', 'first'], ['c2', 'second'])])));

      const results = await collect(
        importer.importAll(new FakeSource([bugA(['c1', 'first'], ['c2', 'second'], ['c3', 'third'])]))
      );

      expect(kinds(results)).toEqual(['nothing', 'nothing', 'nothing', 'comment']);
      expect(reasons(results)).toEqual([
        'entity already imported',
        'comment already imported',
        'comment already imported',
      ]);

      const entity = cache.resolveCreateByMetadata('fake-url', itemUrl('42'));
      expect(entity && store.logLength(entity.id)).toBe(4);
    });

    it('should append nothing when a fresh cache re-imports the same items', async () => {
      const source = new FakeSource([bugA(['c1', 'first'], ['c2', 'second'])]);
      await collect(importer.importAll(source));

      const reopened = await EntityCache.open(store, { onWarning: () => undefined });
      const results = await collect(new Importer(reopened).importAll(source));

      expect(kinds(results)).toEqual(['nothing', 'nothing', 'nothing']);
      const [id] = await store.listEntityIds();
      expect(store.logLength(id)).toBe(3);
    });

    it('should detect a remotely edited comment by comparing texts', async () => {
      await collect(importer.importAll(new FakeSource([bugA(['c1', 'first'])])));

      const results = await collect(importer.importAll(new FakeSource([bugA(['c1', 'first, reworded'])])));

      expect(kinds(results)).toEqual(['nothing', 'comment-edition']);
      const entity = cache.resolveCreateByMetadata('fake-url', itemUrl('42'));
      expect(entity?.snapshot().comments[1]).toMatchObject({ message: 'first, reworded', edited: true });
    });
  });

  describe('edit history', () => {
    const edited = (edits: Array<{ id: string; body: string | null }>) =>
      fakeItem({
        id: '7',
        body: 'v2',
        knownEmpty: true,
        edits: edits.map((edit, index) => ({
          id: edit.id,
          editor: index === 0 ? alice : { login: 'bob' },
          createdAt: at(`2024-03-01T1${index}:30:00Z`),
          body: edit.body,
        })),
      });

    it('should create from the first version and replay the others', async () => {
      const results = await collect(
        importer.importAll(new FakeSource([edited([{ id: 'e0', body: 'v1' }, { id: 'e1', body: 'v2' }])]))
      );

      expect(kinds(results)).toEqual(['identity', 'entity', 'identity', 'comment-edition']);
      const entity = cache.resolveCreateByMetadata('fake-url', itemUrl('7'));
      expect(entity?.snapshot().comments[0]).toMatchObject({ message: 'v2', edited: true });
      expect(entity?.operations[0].payload).toEqual({ type: 'create', title: 'Item 7', message: 'v1' });
    });

    it('should not replay an edit twice', async () => {
      const source = new FakeSource([edited([{ id: 'e0', body: 'v1' }, { id: 'e1', body: 'v2' }])]);
      await collect(importer.importAll(source));

      const results = await collect(importer.importAll(source));

      expect(reasons(results)).toEqual(['entity already imported', 'edition already imported']);
    });

    it('should skip deletions', async () => {
      const results = await collect(
        importer.importAll(new FakeSource([edited([{ id: 'e0', body: 'v1' }, { id: 'e1', body: null }])]))
      );

      expect(kinds(results)).toEqual(['identity', 'entity', 'nothing']);
      expect(reasons(results)).toEqual(['comment deletion is not supported']);
    });

    it('should replay the edits of a comment', async () => {
      const comment = commentEvent('c1', 'second take', {
        actor: alice,
        edits: [
          { id: 'c1-e0', editor: alice, createdAt: at('2024-03-01T11:00:00Z'), body: 'first take' },
          { id: 'c1-e1', editor: alice, createdAt: at('2024-03-01T11:05:00Z'), body: 'second take' },
        ],
      });
      const item = fakeItem({ id: '11', events: [comment] });

      const first = await collect(importer.importAll(new FakeSource([item])));
      const second = await collect(importer.importAll(new FakeSource([item])));

      expect(kinds(first)).toEqual(['identity', 'entity', 'comment', 'comment-edition']);
      expect(reasons(second)).toEqual([
        'entity already imported',
        'comment already imported',
        'edition already imported',
      ]);
      const entity = cache.resolveCreateByMetadata('fake-url', itemUrl('11'));
      expect(entity?.snapshot().comments[1].message).toBe('second take');
    });
  });

  describe('events', () => {
    const createdAt = at('2024-03-02T10:00:00Z');
    const item = fakeItem({
      id: '12',
      events: [
        statusEvent('s1', 'closed'),
        { kind: 'label-add', id: 'l1', actor: alice, createdAt, label: 'bug' },
        { kind: 'title-change', id: 't1', actor: alice, createdAt, title: 'Renamed' },
        { kind: 'unsupported', id: 'u1', actor: alice, createdAt, type: 'assigned' },
      ],
    });

    it('should map each event to its operation', async () => {
      const results = await collect(importer.importAll(new FakeSource([item])));

      expect(kinds(results)).toEqual(['identity', 'entity', 'status-change', 'label-change', 'title-edition', 'nothing']);
      expect(reasons(results)).toEqual(['ignoring assigned event']);

      const snapshot = cache.resolveCreateByMetadata('fake-url', itemUrl('12'))?.snapshot();
      expect(snapshot?.status).toBe('closed');
      expect(snapshot?.labels).toEqual(['bug']);
      expect(snapshot?.title).toBe('Renamed');
    });

    it('should recognize events it already imported', async () => {
      await collect(importer.importAll(new FakeSource([item])));

      const results = await collect(importer.importAll(new FakeSource([item])));

      expect(reasons(results)).toEqual([
        'entity already imported',
        'operation already imported: status-change',
        'operation already imported: label-add',
        'operation already imported: title-change',
        'ignoring assigned event',
      ]);
    });

    it('should apply a changed description as an edit of the first comment', async () => {
      const change = (id: string, body: string) =>
        fakeItem({
          id: '13',
          body: 'desc',
          events: [{ kind: 'description-change', id, actor: alice, createdAt, body }],
        });

      const first = await collect(importer.importAll(new FakeSource([change('d1', 'desc, clarified')])));
      const second = await collect(importer.importAll(new FakeSource([change('d2', 'desc, clarified')])));

      expect(kinds(first)).toEqual(['identity', 'entity', 'comment-edition']);
      expect(reasons(second)).toEqual(['entity already imported', 'description unchanged']);
      const entity = cache.resolveCreateByMetadata('fake-url', itemUrl('13'));
      expect(entity?.snapshot().comments[0].message).toBe('desc, clarified');
    });

    it('should apply a cleared description', async () => {
      const item = fakeItem({
        id: '14',
        body: 'desc',
        events: [{ kind: 'description-change', id: 'd1', actor: alice, createdAt, body: '' }],
      });

      const results = await collect(importer.importAll(new FakeSource([item])));

      expect(kinds(results)).toEqual(['identity', 'entity', 'comment-edition']);
      const entity = cache.resolveCreateByMetadata('fake-url', itemUrl('14'));
      expect(entity?.snapshot().comments[0]).toMatchObject({ message: '', edited: true });
    });
  });

  describe('empty items', () => {
    it('should accept an item the tracker reports as empty', async () => {
      const results = await collect(importer.importAll(new FakeSource([fakeItem({ id: '9', knownEmpty: true })])));

      expect(kinds(results)).toEqual(['identity', 'entity']);
      expect(await store.listEntityIds()).toHaveLength(1);
    });

    it('should treat an unexpected empty event sequence as a fetch failure', async () => {
      const results = await collect(importer.importAll(new FakeSource([fakeItem({ id: '9' })])));

      expect(kinds(results)).toEqual(['identity', 'entity', 'error']);
      const { error, contextId } = lastError(results);
      expect(error).toBeInstanceOf(RemoteFetchError);
      expect(error.message).toBe('no events fetched for item 9');
      expect(contextId).toBe('9');
      expect(cache.all()).toHaveLength(0);
      expect(await store.listEntityIds()).toEqual([]);
    });
  });

  describe('failures', () => {
    it('should stop at the first failing item and keep the ones before it', async () => {
      const source = new FakeSource([fakeItem({ id: '1', knownEmpty: true }), fakeItem({ id: '2', knownEmpty: true })], {
        failAt: 1,
      });

      const results = await collect(importer.importAll(source));

      expect(kinds(results)).toEqual(['identity', 'entity', 'error']);
      const { error, contextId } = lastError(results);
      expect(error).toBeInstanceOf(RemoteFetchError);
      expect(error.message).toBe('fetching fake items: connection reset');
      expect(contextId).toBeNull();
      expect(await store.listEntityIds()).toHaveLength(1);
    });

    it('should roll back an item whose events fail mid-way', async () => {
      const item = fakeItem({ id: '3', events: [commentEvent('c1', 'hi')], eventsError: new Error('timeout') });

      const results = await collect(importer.importAll(new FakeSource([item])));

      expect(kinds(results)).toEqual(['identity', 'entity', 'identity', 'comment', 'error']);
      const { error, contextId } = lastError(results);
      expect(error).toBeInstanceOf(RemoteFetchError);
      expect(error.message).toBe('fetching events of item 3: timeout');
      expect(contextId).toBe('3');
      expect(cache.all()).toHaveLength(0);
      expect(await store.listEntityIds()).toEqual([]);
    });

    it('should surface two entities claiming the same remote item', async () => {
      const me = await cache.identities.createIdentity({ login: 'me' });
      for (const title of ['one', 'two']) {
        const { entity } = cache.createEntity(me, 1_700_000_000, title, '', { 'fake-url': itemUrl('5') });
        await cache.flushIfDirty(entity);
      }

      const results = await collect(importer.importAll(new FakeSource([fakeItem({ id: '5', knownEmpty: true })])));

      expect(kinds(results)).toEqual(['identity', 'error']);
      const { error, contextId } = lastError(results);
      expect(error).toBeInstanceOf(AmbiguousMatchError);
      expect(contextId).toBe('5');
    });

    it('should report a failed flush and forget the staged item', async () => {
      const failing = new FailingStore();
      const failingCache = await EntityCache.open(failing, { onWarning: () => undefined });

      const results = await collect(
        new Importer(failingCache).importAll(new FakeSource([fakeItem({ id: '6', knownEmpty: true })]))
      );

      expect(kinds(results)).toEqual(['identity', 'entity', 'error']);
      const { error } = lastError(results);
      expect(error).toBeInstanceOf(StorageFailureError);
      expect(error.message).toMatch(/^flush of entity [0-9a-f]{7} failed: disk full$/);
      expect(failingCache.all()).toHaveLength(0);
    });
  });

  describe('consumers stopping early', () => {
    it('should forget a half-imported item', async () => {
      const results: ImportResult[] = [];
      for await (const result of importer.importAll(new FakeSource([bugA(['c1', 'first'], ['c2', 'second'])]))) {
        results.push(result);
        if (result.kind === 'comment') break;
      }

      expect(kinds(results)).toEqual(['identity', 'entity', 'identity', 'comment']);
      expect(cache.all()).toHaveLength(0);
      expect(await store.listEntityIds()).toEqual([]);
    });

    it('should discard what was staged on a known item and release it', async () => {
      await collect(importer.importAll(new FakeSource([bugA(['c1', 'first'])])));
      const entity = cache.resolveCreateByMetadata('fake-url', itemUrl('42'));
      if (!entity) throw new Error('item 42 was not imported');
      const source = new FakeSource([bugA(['c1', 'first'], ['c2', 'second'], ['c3', 'third'])]);

      for await (const result of importer.importAll(source)) {
        if (result.kind === 'comment') break;
      }

      expect(entity.needsFlush()).toBe(false);
      expect(await cache.flushIfDirty(entity)).toBe(false);
      expect(store.logLength(entity.id)).toBe(2);

      const resumed = await collect(importer.importAll(source));

      expect(kinds(resumed)).toEqual(['nothing', 'nothing', 'comment', 'comment']);
      expect(store.logLength(entity.id)).toBe(4);
    });
  });

  describe('cancellation', () => {
    it('should finish the current item and stop before the next one', async () => {
      const source = new FakeSource(
        ['1', '2', '3'].map((id) => fakeItem({ id, events: [commentEvent(`c${id}`, `comment ${id}`, { actor: alice })] }))
      );
      const controller = new AbortController();

      const results: ImportResult[] = [];
      for await (const result of importer.importAll(source, { signal: controller.signal })) {
        results.push(result);
        if (result.kind === 'comment') controller.abort();
      }

      expect(kinds(results)).toEqual(['identity', 'entity', 'comment', 'error']);
      expect(lastError(results).error).toBeInstanceOf(CancelledError);
      expect(await store.listEntityIds()).toHaveLength(1);
      expect(source.served).toBe(1);
    });
  });

  describe('options', () => {
    it('should pass the watermark to the source', async () => {
      const source = new FakeSource([
        fakeItem({ id: 'old', knownEmpty: true, updatedAt: at('2024-01-01T00:00:00Z') }),
        fakeItem({ id: 'new', knownEmpty: true, updatedAt: at('2024-06-01T00:00:00Z') }),
      ]);

      await collect(importer.importAll(source, { since: at('2024-03-01T00:00:00Z') }));

      expect(source.served).toBe(1);
      expect(cache.resolveCreateByMetadata('fake-url', itemUrl('new'))).toBeDefined();
      expect(cache.resolveCreateByMetadata('fake-url', itemUrl('old'))).toBeUndefined();
    });
  });

  describe('concurrent runs', () => {
    it('should import an item once when two runs race on it', async () => {
      const item = () => fakeItem({ id: '20', events: [commentEvent('c1', 'only once')] });

      const [first, second] = await Promise.all([
        collect(importer.importAll(new FakeSource([item()]))),
        collect(new Importer(cache).importAll(new FakeSource([item()]))),
      ]);

      const all = [...first, ...second];
      expect(all.filter((r) => r.kind === 'entity')).toHaveLength(1);
      expect(all.filter((r) => r.kind === 'comment')).toHaveLength(1);
      const [id] = await store.listEntityIds();
      expect(store.logLength(id)).toBe(2);
    });
  });

  describe('describeImportResult', () => {
    it('should render one line per result', () => {
      expect(describeImportResult({ kind: 'comment', id: '3fa9c12deadbeef' })).toBe('new comment: 3fa9c12');
      expect(describeImportResult({ kind: 'nothing', id: null, reason: 'comment already imported' })).toBe(
        'no event: comment already imported'
      );
      expect(describeImportResult({ kind: 'error', error: new Error('boom'), contextId: '42' })).toBe(
        'import error (42): boom'
      );
    });
  });
});
