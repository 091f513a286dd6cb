import { CorruptLogError, InvalidInputError } from '../../src/lib/errors';
import { canonicalJson, humanId } from '../../src/lib/model/canonical';
import {
  OperationPayload,
  createOperation,
  decodeOperation,
  encodeOperation,
  hashOperation,
} from '../../src/lib/model/operation';

describe('operations', () => {
  describe('createOperation', () => {
    it('should copy metadata and add a nonce', () => {
      const metadata = { 'github-id': '17' };
      const op = createOperation('author-1', 1_700_000_000, { type: 'add-comment', message: 'hello' }, metadata);

      metadata['github-id'] = 'changed';

      expect(op.metadata).toEqual({ 'github-id': '17' });
      expect(op.nonce).toHaveLength(28);
    });

    it('should give identical content different hashes', () => {
      const payload: OperationPayload = { type: 'set-status', status: 'closed' };
      const a = createOperation('author-1', 1_700_000_000, payload);
      const b = createOperation('author-1', 1_700_000_000, payload);

      expect(hashOperation(a)).not.toBe(hashOperation(b));
      expect(hashOperation(a)).toMatch(/^[0-9a-f]{64}$/);
    });

    it.each<[string, string, number, OperationPayload]>([
      ['operation author is empty', ' ', 1, { type: 'noop' }],
      ['invalid operation time: 0', 'a', 0, { type: 'noop' }],
      ['invalid operation time: 1.5', 'a', 1.5, { type: 'noop' }],
      ['title is empty', 'a', 1, { type: 'create', title: '  ', message: '' }],
      ['title must be a single line', 'a', 1, { type: 'set-title', title: 'one\ntwo', was: 'x' }],
      ['comment message is empty', 'a', 1, { type: 'add-comment', message: '\n' }],
      ['edit-comment has no target', 'a', 1, { type: 'edit-comment', target: '', message: 'x' }],
      ['label change adds and removes nothing', 'a', 1, { type: 'label-change', added: [], removed: [] }],
      ['invalid label ""', 'a', 1, { type: 'label-change', added: [''], removed: [] }],
    ])('should reject: %s', (message, author, unixTime, payload) => {
      expect(() => createOperation(author, unixTime, payload)).toThrow(new InvalidInputError(message));
    });

    it('should accept an empty description and empty edits', () => {
      expect(() => createOperation('a', 1, { type: 'create', title: 'Title', message: '' })).not.toThrow();
      expect(() => createOperation('a', 1, { type: 'edit-comment', target: 'abc', message: '' })).not.toThrow();
    });
  });

  describe('encoding', () => {
    it('should keep the hash through a store round trip', () => {
      const op = createOperation('author-1', 1_700_000_000, { type: 'label-change', added: ['bug'], removed: ['wip'] });

      const decoded = decodeOperation(JSON.parse(JSON.stringify(encodeOperation(op))));

      expect(decoded).toEqual(op);
      expect(hashOperation(decoded)).toBe(hashOperation(op));
    });

    it('should write the format version and flat fields', () => {
      const op = createOperation('author-1', 1_700_000_000, { type: 'set-title', title: 'New', was: 'Old' });

      expect(encodeOperation(op)).toEqual({
        v: 1,
        author: 'author-1',
        time: 1_700_000_000,
        nonce: op.nonce,
        metadata: {},
        type: 'set-title',
        title: 'New',
        was: 'Old',
      });
    });

    it('should reject unknown versions and types', () => {
      const encoded = encodeOperation(createOperation('a', 1, { type: 'noop' }));

      expect(() => decodeOperation({ ...encoded, v: 2 })).toThrow(CorruptLogError);
      expect(() => decodeOperation({ ...encoded, type: 'assign' })).toThrow(/^undecodable operation: /);
      expect(() => decodeOperation('not an object')).toThrow(CorruptLogError);
    });
  });

  describe('canonical form', () => {
    it('should sort keys at every level', () => {
      expect(canonicalJson({ b: 1, a: { d: [1, { f: 2, e: 3 }], c: null } })).toBe(
        '{"a":{"c":null,"d":[1,{"e":3,"f":2}]},"b":1}'
      );
    });

    it('should shorten ids to seven characters', () => {
      expect(humanId('3fa9c12deadbeef')).toBe('3fa9c12');
    });
  });
});
