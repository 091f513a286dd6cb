/**
 * Everything a command needs, opened from one project directory
 */

import { EntityCache, EntityCacheOptions } from './cache/entity-cache';
import {
  BridgeConfig,
  CommandRunner,
  TracklogConfig,
  getGitHubToken,
  loadConfig,
  resolveDataDir,
  resolveGitHubRepo,
  runCommand,
  saveConfig,
} from './config';
import { IdentityNotFoundError, InvalidInputError } from './errors';
import { Identity } from './model/identity';
import { createFileBridgeFactory } from './sources/file';
import { createGitHubBridgeFactory } from './sources/github';
import { BridgeRegistry } from './sources/registry';
import { FileStore } from './storage/file-store';
import { SyncStateStore } from './sync-state';

export interface WorkspaceOptions extends EntityCacheOptions {
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
}

/**
 * Registry with every bridge this build knows
 */
export function createDefaultRegistry(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env,
  run: CommandRunner = runCommand
): BridgeRegistry {
  return new BridgeRegistry()
    .register(
      createGitHubBridgeFactory({
        token: () => getGitHubToken(env, run),
        repo: (bridge: BridgeConfig) => resolveGitHubRepo(bridge, projectRoot, env, run),
      })
    )
    .register(createFileBridgeFactory(projectRoot));
}

export class Workspace {
  readonly projectRoot: string;
  readonly dataDir: string;
  readonly store: FileStore;
  readonly cache: EntityCache;
  readonly syncState: SyncStateStore;
  readonly bridges: BridgeRegistry;
  config: TracklogConfig;

  private constructor(projectRoot: string, dataDir: string, store: FileStore, cache: EntityCache, bridges: BridgeRegistry) {
    this.projectRoot = projectRoot;
    this.dataDir = dataDir;
    this.store = store;
    this.cache = cache;
    this.bridges = bridges;
    this.syncState = new SyncStateStore(dataDir);
    this.config = loadConfig(dataDir);
  }

  static async open(projectRoot: string, options: WorkspaceOptions = {}): Promise<Workspace> {
    const env = options.env ?? process.env;
    const dataDir = resolveDataDir(projectRoot, env);
    const store = new FileStore(dataDir);
    const cache = await EntityCache.open(store, { onWarning: options.onWarning });
    return new Workspace(projectRoot, dataDir, store, cache, createDefaultRegistry(projectRoot, env, options.run));
  }

  /**
   * The configured local user
   */
  currentUser(): Identity {
    const userId = this.config.user;
    if (!userId) {
      throw new InvalidInputError('no local user, run "tracklog user create"');
    }
    try {
      return this.cache.identities.get(userId);
    } catch (error) {
      if (error instanceof IdentityNotFoundError) {
        throw new InvalidInputError(`configured user ${userId.slice(0, 7)} is not in the store`);
      }
      throw error;
    }
  }

  setCurrentUser(identity: Identity): void {
    this.saveConfig({ ...this.config, user: identity.id });
  }

  saveConfig(config: TracklogConfig): void {
    saveConfig(this.dataDir, config);
    this.config = config;
  }
}
