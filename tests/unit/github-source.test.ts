import { RemoteFetchError } from '../../src/lib/errors';
import { GitHubClient, GitHubIssue } from '../../src/lib/sources/github/github-client';
import { GitHubSource, toRemoteEvent } from '../../src/lib/sources/github/github-source';
import { collect } from '../helpers/fakes';
import { installOctokitMock, issuePayload, servePages } from '../helpers/octokit';

jest.mock('@octokit/rest');

const issue: GitHubIssue = {
  id: 1001,
  number: 1,
  html_url: 'https://github.com/octo-org/tracker/issues/1',
  title: 'Crash on start',
  body: 'stack trace',
  user: { login: 'alice' },
  state: 'open',
  comments: 1,
  created_at: '2024-03-01T10:00:00Z',
  updated_at: '2024-03-02T09:00:00Z',
};

describe('toRemoteEvent', () => {
  it('should map comments with their author', () => {
    const event = toRemoteEvent(
      {
        id: 11,
        event: 'commented',
        actor: { login: 'bob' },
        user: { login: 'bob', name: 'Bob' },
        created_at: '2024-03-01T11:00:00Z',
        updated_at: '2024-03-01T12:00:00Z',
        body: 'me too',
        html_url: 'https://github.com/octo-org/tracker/issues/1#issuecomment-11',
      },
      issue
    );

    expect(event).toEqual({
      kind: 'comment',
      id: 'comment:11',
      actor: { login: 'bob', name: 'Bob' },
      createdAt: new Date('2024-03-01T11:00:00Z'),
      url: 'https://github.com/octo-org/tracker/issues/1#issuecomment-11',
      body: 'me too',
      updatedAt: new Date('2024-03-01T12:00:00Z'),
      edits: [],
    });
  });

  it('should report empty comments as unsupported', () => {
    const event = toRemoteEvent(
      {
        id: 12,
        event: 'commented',
        created_at: '2024-03-01T11:00:00Z',
        body: '',
        html_url: 'https://github.com/octo-org/tracker/issues/1#issuecomment-12',
      },
      issue
    );

    expect(event).toMatchObject({ kind: 'unsupported', id: 'comment:12', type: 'empty comment' });
  });

  it('should refuse comments missing their url', () => {
    expect(() =>
      toRemoteEvent({ id: 13, event: 'commented', created_at: '2024-03-01T11:00:00Z', body: 'hi' }, issue)
    ).toThrow(new RemoteFetchError('malformed commented event on issue #1'));
  });

  it('should map status, label and title events', () => {
    const base = { id: 20, actor: { login: 'carol' }, created_at: '2024-03-01T13:00:00Z' };

    expect(toRemoteEvent({ ...base, event: 'closed' }, issue)).toMatchObject({
      kind: 'status-change',
      id: 'event:20',
      status: 'closed',
    });
    expect(toRemoteEvent({ ...base, event: 'reopened' }, issue)).toMatchObject({ kind: 'status-change', status: 'open' });
    expect(toRemoteEvent({ ...base, event: 'labeled', label: { name: 'bug' } }, issue)).toMatchObject({
      kind: 'label-add',
      label: 'bug',
    });
    expect(toRemoteEvent({ ...base, event: 'unlabeled', label: { name: 'bug' } }, issue)).toMatchObject({
      kind: 'label-remove',
      label: 'bug',
    });
    expect(
      toRemoteEvent({ ...base, event: 'renamed', rename: { from: 'Crash', to: 'Crash on start' } }, issue)
    ).toMatchObject({ kind: 'title-change', title: 'Crash on start', actor: { login: 'carol' } });
  });

  it('should pass other events through as unsupported', () => {
    const event = toRemoteEvent({ event: 'cross-referenced' }, issue);

    expect(event).toEqual({
      kind: 'unsupported',
      id: '',
      actor: null,
      createdAt: new Date('2024-03-02T09:00:00Z'),
      type: 'cross-referenced',
    });
  });
});

describe('GitHubSource', () => {
  it('should expose issues as items with lazy timelines', async () => {
    const mock = installOctokitMock();
    const edited = { ...issuePayload, comments: 1, updated_at: '2024-03-02T09:00:00Z' };
    const untouched = { ...issuePayload, id: 1002, number: 2 };
    servePages(
      mock,
      new Map<jest.Mock, unknown[][]>([
        [mock.listForRepo, [[edited, untouched]]],
        [
          mock.listEventsForTimeline,
          [[{ id: 30, event: 'closed', actor: { login: 'alice' }, created_at: '2024-03-01T15:00:00Z' }]],
        ],
      ])
    );
    const source = new GitHubSource(new GitHubClient('test-token', 'octo-org/tracker'));

    const [first, second] = await collect(source.items());

    expect(first).toMatchObject({
      id: '1001',
      url: 'https://github.com/octo-org/tracker/issues/1',
      author: { login: 'alice' },
      title: 'Crash on start',
      body: 'stack trace',
      knownEmpty: false,
    });
    expect(second.knownEmpty).toBe(true);
    // only the issue listing so far
    expect(mock.iterator).toHaveBeenCalledTimes(1);

    const events = await collect(first.events());

    expect(events.map((event) => event.kind)).toEqual(['status-change', 'description-change']);
    expect(events[1]).toMatchObject({ id: '1001/body@2024-03-02T09:00:00Z', body: 'stack trace' });
    expect(mock.iterator).toHaveBeenLastCalledWith(mock.listEventsForTimeline, {
      owner: 'octo-org',
      repo: 'tracker',
      issue_number: 1,
      per_page: 100,
    });
  });

  it('should report a cleared body of an issue without comments', async () => {
    const mock = installOctokitMock();
    const cleared = { ...issuePayload, body: null, comments: 0, updated_at: '2024-03-02T09:00:00Z' };
    servePages(
      mock,
      new Map<jest.Mock, unknown[][]>([
        [mock.listForRepo, [[cleared]]],
        [mock.listEventsForTimeline, [[]]],
      ])
    );
    const source = new GitHubSource(new GitHubClient('test-token', 'octo-org/tracker'));

    const [item] = await collect(source.items());
    const events = await collect(item.events());

    expect(item.knownEmpty).toBe(false);
    expect(events).toEqual([
      {
        kind: 'description-change',
        id: '1001/body@2024-03-02T09:00:00Z',
        actor: { login: 'alice', name: undefined, email: undefined, avatarUrl: undefined },
        createdAt: new Date('2024-03-02T09:00:00Z'),
        body: '',
      },
    ]);
  });
});
