/**
 * Project configuration: environment, data directory, local user and bridges
 */

import fs from 'fs';
import path from 'path';
import { execSync } from 'child_process';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { InvalidInputError, StorageFailureError, errorMessage } from './errors';

export const CONFIG_DIR = '.tracklog';
export const CONFIG_FILE = 'config.json';

export const bridgeTargets = ['github', 'file'] as const;
export type BridgeTarget = (typeof bridgeTargets)[number];

export const bridgeConfigSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[\w.-]+$/, 'bridge names use letters, digits, ".", "_" and "-"'),
  target: z.enum(bridgeTargets),
  /** owner/repo, GitHub only */
  repo: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, 'expected "owner/repo"')
    .optional(),
  /** Dump path, file bridges only */
  path: z.string().min(1).optional(),
});

export const configSchema = z.object({
  /** Identity id of the local user */
  user: z.string().optional(),
  bridges: z.array(bridgeConfigSchema).default([]),
});

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;
export type TracklogConfig = z.infer<typeof configSchema>;

/** Runs a shell command and returns its trimmed output, or null when it fails */
export type CommandRunner = (command: string, cwd?: string) => string | null;

export const runCommand: CommandRunner = (command, cwd) => {
  try {
    const output = execSync(command, {
      cwd,
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
    return output || null;
  } catch {
    return null;
  }
};

/**
 * Load environment variables from the project directory
 */
export function loadEnv(projectRoot: string): void {
  loadDotenv({ path: path.join(projectRoot, '.env.local') });
  loadDotenv({ path: path.join(projectRoot, '.env') });
}

/**
 * Directory holding the store, config and sync state
 */
export function resolveDataDir(projectRoot: string, env: NodeJS.ProcessEnv = process.env): string {
  return env.TRACKLOG_DIR ? path.resolve(projectRoot, env.TRACKLOG_DIR) : path.join(projectRoot, CONFIG_DIR);
}

export function loadConfig(dataDir: string): TracklogConfig {
  const file = path.join(dataDir, CONFIG_FILE);
  if (!fs.existsSync(file)) {
    return { bridges: [] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new InvalidInputError(`cannot parse ${file}: ${errorMessage(error)}`, { cause: error });
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidInputError(`invalid ${file}: ${issue.path.join('.')} ${issue.message}`);
  }
  return result.data;
}

export function saveConfig(dataDir: string, config: TracklogConfig): void {
  try {
    fs.mkdirSync(dataDir, { recursive: true });
    fs.writeFileSync(path.join(dataDir, CONFIG_FILE), JSON.stringify(config, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new StorageFailureError(`cannot write config: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Return a copy of the config with one more bridge
 */
export function addBridge(config: TracklogConfig, bridge: BridgeConfig): TracklogConfig {
  const result = bridgeConfigSchema.safeParse(bridge);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidInputError(`invalid bridge ${issue.path.join('.')}: ${issue.message}`);
  }

  const parsed = result.data;
  if (config.bridges.some((b) => b.name === parsed.name)) {
    throw new InvalidInputError(`bridge "${parsed.name}" already exists`);
  }
  if (parsed.target === 'file' && !parsed.path) {
    throw new InvalidInputError('file bridges need a path');
  }
  return { ...config, bridges: [...config.bridges, parsed] };
}

/**
 * Pick the bridge to use: the named one, or the only one configured
 */
export function selectBridge(config: TracklogConfig, name?: string): BridgeConfig {
  if (name) {
    const bridge = config.bridges.find((b) => b.name === name);
    if (!bridge) {
      throw new InvalidInputError(`no bridge named "${name}"`);
    }
    return bridge;
  }

  if (config.bridges.length === 0) {
    throw new InvalidInputError('no bridge configured, run "tracklog bridge configure"');
  }
  if (config.bridges.length > 1) {
    throw new InvalidInputError(`several bridges configured (${config.bridges.map((b) => b.name).join(', ')}), name one`);
  }
  return config.bridges[0];
}

/**
 * Parse owner/repo from URL formats:
 * https://github.com/owner/repo.git
 * git@github.com:owner/repo.git
 */
export function parseGitHubRemote(remoteUrl: string): string | null {
  const match = remoteUrl.match(/github\.com[:/]([^/]+\/[^/]+?)(?:\.git)?\/?$/);
  return match ? match[1] : null;
}

/**
 * Detect GitHub repo from git remote URL
 */
export function detectGitHubRepo(projectRoot: string, run: CommandRunner = runCommand): string | null {
  const remoteUrl = run('git config --get remote.origin.url', projectRoot);
  return remoteUrl ? parseGitHubRemote(remoteUrl) : null;
}

/**
 * Get GitHub token from gh CLI or env var
 */
export function getGitHubToken(env: NodeJS.ProcessEnv = process.env, run: CommandRunner = runCommand): string | null {
  // gh keeps the token in the keyring
  const token = run('gh auth token');
  if (token) return token;

  // Fall back to env var (for CI/CD)
  return env.GITHUB_TOKEN || null;
}

/**
 * Repository of a GitHub bridge: its own setting, GITHUB_REPO, then the git remote
 */
export function resolveGitHubRepo(
  bridge: BridgeConfig,
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env,
  run: CommandRunner = runCommand
): string | null {
  return bridge.repo || env.GITHUB_REPO || detectGitHubRepo(projectRoot, run);
}
