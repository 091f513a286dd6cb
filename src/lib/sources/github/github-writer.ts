/**
 * Pushes local changes to GitHub issues
 */

import { InvalidInputError } from '../../errors';
import { Status } from '../../model/operation';
import { RemoteRef, RemoteWriter } from '../types';
import { GitHubClient } from './github-client';
import { GITHUB_TARGET, commentKey } from './github-source';

const ISSUE_URL_PATTERN = /\/issues\/(\d+)$/;
const COMMENT_KEY_PATTERN = /^comment:(\d+)$/;

export function issueNumberFromUrl(url: string): number {
  const match = ISSUE_URL_PATTERN.exec(url);
  if (!match) {
    throw new InvalidInputError(`not a GitHub issue URL: ${url}`);
  }
  return Number(match[1]);
}

export class GitHubWriter implements RemoteWriter {
  readonly target = GITHUB_TARGET;
  private client: GitHubClient;

  constructor(client: GitHubClient) {
    this.client = client;
  }

  async createIssue(title: string, body: string): Promise<RemoteRef> {
    const issue = await this.client.createIssue(title, body);
    return { id: String(issue.id), url: issue.html_url };
  }

  async editIssueBody(issue: RemoteRef, body: string): Promise<void> {
    await this.client.updateIssue(issueNumberFromUrl(issue.url), { body });
  }

  async addComment(issue: RemoteRef, body: string): Promise<RemoteRef> {
    const comment = await this.client.createComment(issueNumberFromUrl(issue.url), body);
    return { id: commentKey(comment.id), url: comment.html_url };
  }

  async editComment(_issue: RemoteRef, commentId: string, body: string): Promise<void> {
    const match = COMMENT_KEY_PATTERN.exec(commentId);
    const id = match ? Number(match[1]) : NaN;
    if (!Number.isSafeInteger(id)) {
      throw new InvalidInputError(`not a GitHub comment id: ${commentId}`);
    }
    await this.client.updateComment(id, body);
  }

  async setTitle(issue: RemoteRef, title: string): Promise<void> {
    await this.client.updateIssue(issueNumberFromUrl(issue.url), { title });
  }

  async setStatus(issue: RemoteRef, status: Status): Promise<void> {
    await this.client.updateIssue(issueNumberFromUrl(issue.url), { state: status });
  }

  async changeLabels(issue: RemoteRef, added: string[], removed: string[]): Promise<void> {
    const issueNumber = issueNumberFromUrl(issue.url);

    if (added.length > 0) {
      await this.client.ensureLabels(added);
      await this.client.addLabels(issueNumber, added);
    }
    for (const label of removed) {
      await this.client.removeLabel(issueNumber, label);
    }
  }
}
