/**
 * GitHub bridge
 */

import { BridgeConfig } from '../../config';
import { InvalidInputError } from '../../errors';
import { Bridge, BridgeFactory } from '../registry';
import { GitHubClient } from './github-client';
import { GITHUB_TARGET, GitHubSource } from './github-source';
import { GitHubWriter } from './github-writer';

export { GitHubClient, labelColor } from './github-client';
export type { GitHubIssue, GitHubTimelineEvent, GitHubUser } from './github-client';
export { GITHUB_TARGET, GitHubSource, toRemoteActor, toRemoteEvent } from './github-source';
export { GitHubWriter, issueNumberFromUrl } from './github-writer';

export interface GitHubBridgeOptions {
  /** Token lookup, run when a bridge is opened */
  token: () => string | null;
  /** Repository lookup for bridges that name none */
  repo: (config: BridgeConfig) => string | null;
}

export function createGitHubBridgeFactory(options: GitHubBridgeOptions): BridgeFactory {
  return {
    target: GITHUB_TARGET,
    open(config: BridgeConfig): Bridge {
      const token = options.token();
      if (!token) {
        throw new InvalidInputError('no GitHub authentication found, run "gh auth login" or set GITHUB_TOKEN');
      }
      const repo = options.repo(config);
      if (!repo) {
        throw new InvalidInputError(
          `could not determine the GitHub repository of bridge "${config.name}", set repo or GITHUB_REPO`
        );
      }

      const client = new GitHubClient(token, repo);
      return {
        name: config.name,
        target: GITHUB_TARGET,
        source: new GitHubSource(client),
        writer: new GitHubWriter(client),
        verifyAccess: () => client.verifyAccess(),
      };
    },
  };
}
