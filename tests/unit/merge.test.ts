import { InvalidInputError } from '../../src/lib/errors';
import { createOperation, hashOperation } from '../../src/lib/model/operation';
import { mergeLogs } from '../../src/lib/model/merge';

describe('mergeLogs', () => {
  const create = createOperation('a', 100, { type: 'create', title: 'Shared', message: '' });
  const local1 = createOperation('a', 110, { type: 'add-comment', message: 'from clone A' });
  const remote1 = createOperation('b', 105, { type: 'add-comment', message: 'from clone B' });
  const remote2 = createOperation('b', 120, { type: 'set-status', status: 'closed' });

  it('should append remote operations missing locally, in remote order', () => {
    const { merged, added } = mergeLogs([create, local1], [create, remote1, remote2]);

    expect(added).toEqual([remote1, remote2]);
    expect(merged.map(hashOperation)).toEqual([create, local1, remote1, remote2].map(hashOperation));
  });

  it('should add nothing when the remote log is a prefix', () => {
    const { merged, added } = mergeLogs([create, local1], [create]);

    expect(added).toEqual([]);
    expect(merged).toEqual([create, local1]);
  });

  it('should refuse logs of different entities', () => {
    const other = createOperation('b', 100, { type: 'create', title: 'Other', message: '' });

    expect(() => mergeLogs([create], [other])).toThrow(new InvalidInputError('cannot merge logs of different entities'));
  });
});
