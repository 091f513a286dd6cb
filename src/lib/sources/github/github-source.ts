/**
 * GitHub issues as a source of remote items
 */

import { RemoteFetchError } from '../../errors';
import { RemoteActor, RemoteEvent, RemoteItem, SourceIterator } from '../types';
import { GitHubClient, GitHubIssue, GitHubTimelineEvent, GitHubUser } from './github-client';

export const GITHUB_TARGET = 'github';

/**
 * Comments and timeline events are numbered apart from each other and from
 * issues, so their ids carry their kind.
 */
export function commentKey(id: number | string): string {
  return `comment:${id}`;
}

export function eventKey(id: number | string): string {
  return `event:${id}`;
}

export function toRemoteActor(user: GitHubUser | null | undefined): RemoteActor | null {
  if (!user) return null;
  return {
    login: user.login,
    name: user.name ?? undefined,
    email: user.email ?? undefined,
    avatarUrl: user.avatar_url,
  };
}

/**
 * Map one timeline entry. Known events missing the fields they need are a
 * transport problem, not something to skip.
 */
export function toRemoteEvent(raw: GitHubTimelineEvent, issue: GitHubIssue): RemoteEvent {
  const key = raw.event === 'commented' ? commentKey : eventKey;
  const id = raw.id === undefined ? '' : key(raw.id);
  const actor = toRemoteActor(raw.actor);
  const createdAt = new Date(raw.created_at ?? issue.updated_at);
  const malformed = () => new RemoteFetchError(`malformed ${raw.event} event on issue #${issue.number}`);

  switch (raw.event) {
    case 'commented':
      if (!raw.id || !raw.html_url || !raw.created_at) throw malformed();
      if (!raw.body) {
        return { kind: 'unsupported', id, actor, createdAt, type: 'empty comment' };
      }
      return {
        kind: 'comment',
        id,
        actor: toRemoteActor(raw.user ?? raw.actor),
        createdAt,
        url: raw.html_url,
        body: raw.body,
        updatedAt: new Date(raw.updated_at ?? raw.created_at),
        edits: [],
      };

    case 'closed':
    case 'reopened':
      if (!raw.id) throw malformed();
      return { kind: 'status-change', id, actor, createdAt, status: raw.event === 'closed' ? 'closed' : 'open' };

    case 'labeled':
    case 'unlabeled':
      if (!raw.id || !raw.label) throw malformed();
      return {
        kind: raw.event === 'labeled' ? 'label-add' : 'label-remove',
        id,
        actor,
        createdAt,
        label: raw.label.name,
      };

    case 'renamed':
      if (!raw.id || !raw.rename) throw malformed();
      return { kind: 'title-change', id, actor, createdAt, title: raw.rename.to };

    default:
      return { kind: 'unsupported', id, actor, createdAt, type: raw.event };
  }
}

export class GitHubSource implements SourceIterator {
  readonly target = GITHUB_TARGET;
  private client: GitHubClient;

  constructor(client: GitHubClient) {
    this.client = client;
  }

  async *items(since?: Date): AsyncGenerator<RemoteItem> {
    for await (const issue of this.client.listIssues(since)) {
      yield this.toRemoteItem(issue);
    }
  }

  private toRemoteItem(issue: GitHubIssue): RemoteItem {
    const client = this.client;
    const body = issue.body ?? '';
    const edited = issue.updated_at !== issue.created_at;

    return {
      id: String(issue.id),
      url: issue.html_url,
      author: toRemoteActor(issue.user),
      title: issue.title,
      body,
      createdAt: new Date(issue.created_at),
      updatedAt: new Date(issue.updated_at),
      // REST exposes no edit history
      edits: [],
      knownEmpty: issue.comments === 0 && !edited,
      async *events(): AsyncGenerator<RemoteEvent> {
        for await (const raw of client.listTimeline(issue.number)) {
          yield toRemoteEvent(raw, issue);
        }

        // Body edits leave no timeline entry; the importer compares texts.
        // A cleared body is an edit too.
        if (edited) {
          yield {
            kind: 'description-change',
            id: `${issue.id}/body@${issue.updated_at}`,
            actor: toRemoteActor(issue.user),
            createdAt: new Date(issue.updated_at),
            body,
          };
        }
      },
    };
  }
}
