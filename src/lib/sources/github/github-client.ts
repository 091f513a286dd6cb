/**
 * GitHub API client wrapper using Octokit
 */

import { createHash } from 'crypto';
import { Octokit } from '@octokit/rest';
import { z } from 'zod';
import { RemoteFetchError } from '../../errors';

const userSchema = z.object({
  login: z.string(),
  name: z.string().nullish(),
  email: z.string().nullish(),
  avatar_url: z.string().optional(),
});

const issueSchema = z.object({
  id: z.number(),
  number: z.number(),
  html_url: z.string(),
  title: z.string(),
  body: z.string().nullish(),
  user: userSchema.nullable(),
  state: z.enum(['open', 'closed']),
  comments: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
  pull_request: z.unknown().optional(),
});

// Timeline entries differ per event; only the fields the mapping reads
const timelineEventSchema = z.object({
  id: z.number().optional(),
  event: z.string(),
  actor: userSchema.nullish(),
  user: userSchema.nullish(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  body: z.string().nullish(),
  html_url: z.string().optional(),
  label: z.object({ name: z.string() }).optional(),
  rename: z.object({ from: z.string(), to: z.string() }).optional(),
});

const commentSchema = z.object({
  id: z.number(),
  html_url: z.string(),
});

const labelSchema = z.object({
  name: z.string(),
  color: z.string(),
});

export type GitHubUser = z.infer<typeof userSchema>;
export type GitHubIssue = z.infer<typeof issueSchema>;
export type GitHubTimelineEvent = z.infer<typeof timelineEventSchema>;
export type GitHubComment = z.infer<typeof commentSchema>;

function parsePayload<T>(schema: z.ZodType<T>, data: unknown, context: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new RemoteFetchError(`unexpected ${context} payload: ${issue.path.join('.')} ${issue.message}`);
  }
  return result.data;
}

function hasStatus(error: unknown, ...statuses: number[]): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? statuses.includes(error.status)
    : false;
}

/**
 * Stable label color derived from the name
 */
export function labelColor(name: string): string {
  return createHash('sha256').update(name).digest('hex').slice(0, 6);
}

export class GitHubClient {
  private octokit: Octokit;
  readonly owner: string;
  readonly repo: string;
  private labelCache: Map<string, { color: string }> | null = null;

  constructor(token: string, repoFullName: string) {
    this.octokit = new Octokit({
      auth: token,
      log: {
        debug: () => {},
        info: () => {},
        warn: () => {},
        error: console.error,
      },
    });

    // Parse owner/repo from full name (e.g., "octo-org/tracker")
    const parts = repoFullName.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new Error(`Invalid repo format: ${repoFullName}. Expected "owner/repo"`);
    }
    this.owner = parts[0];
    this.repo = parts[1];
  }

  get fullName(): string {
    return `${this.owner}/${this.repo}`;
  }

  /**
   * Page through every issue changed since the given time, oldest first.
   * Pull requests are skipped.
   */
  async *listIssues(since?: Date): AsyncGenerator<GitHubIssue> {
    const pages = this.octokit.paginate.iterator(this.octokit.issues.listForRepo, {
      owner: this.owner,
      repo: this.repo,
      state: 'all',
      sort: 'created',
      direction: 'asc',
      since: since?.toISOString(),
      per_page: 100,
    });

    for await (const page of pages) {
      for (const issue of parsePayload(z.array(issueSchema), page.data, 'issue list')) {
        if (issue.pull_request !== undefined && issue.pull_request !== null) continue;
        yield issue;
      }
    }
  }

  /**
   * Page through the timeline of one issue in chronological order
   */
  async *listTimeline(issueNumber: number): AsyncGenerator<GitHubTimelineEvent> {
    const pages = this.octokit.paginate.iterator(this.octokit.issues.listEventsForTimeline, {
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
      per_page: 100,
    });

    for await (const page of pages) {
      yield* parsePayload(z.array(timelineEventSchema), page.data, `timeline of #${issueNumber}`);
    }
  }

  /**
   * Create a new issue
   */
  async createIssue(title: string, body: string): Promise<GitHubIssue> {
    const { data } = await this.octokit.issues.create({
      owner: this.owner,
      repo: this.repo,
      title,
      body,
    });

    return parsePayload(issueSchema, data, 'created issue');
  }

  /**
   * Update an existing issue
   */
  async updateIssue(
    issueNumber: number,
    updates: {
      title?: string;
      body?: string;
      state?: 'open' | 'closed';
    }
  ): Promise<void> {
    await this.octokit.issues.update({
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
      ...updates,
    });
  }

  /**
   * Add a comment to an issue
   */
  async createComment(issueNumber: number, body: string): Promise<GitHubComment> {
    const { data } = await this.octokit.issues.createComment({
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
      body,
    });

    return parsePayload(commentSchema, data, 'created comment');
  }

  /**
   * Replace the text of a comment
   */
  async updateComment(commentId: number, body: string): Promise<void> {
    await this.octokit.issues.updateComment({
      owner: this.owner,
      repo: this.repo,
      comment_id: commentId,
      body,
    });
  }

  async addLabels(issueNumber: number, labels: string[]): Promise<void> {
    await this.octokit.issues.addLabels({
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
      labels,
    });
  }

  /**
   * Remove a label. Removing a label the issue does not carry is a no-op.
   */
  async removeLabel(issueNumber: number, name: string): Promise<void> {
    try {
      await this.octokit.issues.removeLabel({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber,
        name,
      });
    } catch (error) {
      if (hasStatus(error, 404)) return;
      throw error;
    }
  }

  /**
   * Verify GitHub token has correct permissions
   */
  async verifyAccess(): Promise<boolean> {
    try {
      await this.octokit.repos.get({
        owner: this.owner,
        repo: this.repo,
      });
      return true;
    } catch (error) {
      if (hasStatus(error, 401, 403, 404)) return false;
      throw error;
    }
  }

  /**
   * Fetch all labels and populate cache
   */
  private async fetchLabelCache(): Promise<Map<string, { color: string }>> {
    if (this.labelCache) return this.labelCache;

    const cache = new Map<string, { color: string }>();
    const pages = this.octokit.paginate.iterator(this.octokit.issues.listLabelsForRepo, {
      owner: this.owner,
      repo: this.repo,
      per_page: 100,
    });

    for await (const page of pages) {
      for (const label of parsePayload(z.array(labelSchema), page.data, 'label list')) {
        cache.set(label.name, { color: label.color });
      }
    }

    this.labelCache = cache;
    return cache;
  }

  /**
   * Create the labels the repository does not have yet
   */
  async ensureLabels(labels: string[]): Promise<void> {
    const cache = await this.fetchLabelCache();

    for (const name of labels) {
      if (cache.has(name)) continue;

      const color = labelColor(name);
      await this.octokit.issues.createLabel({
        owner: this.owner,
        repo: this.repo,
        name,
        color,
      });
      cache.set(name, { color });
    }
  }
}
