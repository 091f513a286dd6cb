#!/usr/bin/env node

/**
 * tracklog CLI
 *
 * Offline-first issue tracking with bridges to remote trackers
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import path from 'path';
import { CachedEntity } from './lib/cache/cached-entity';
import {
  BridgeConfig,
  BridgeTarget,
  addBridge,
  bridgeTargets,
  detectGitHubRepo,
  loadEnv,
  selectBridge,
} from './lib/config';
import { InvalidInputError, RemoteFetchError, errorMessage } from './lib/errors';
import { Status } from './lib/model/operation';
import { formatEntityLine, renderSnapshot } from './lib/render';
import { Bridge } from './lib/sources/registry';
import { FileStore } from './lib/storage/file-store';
import { ExportResult, describeExportResult } from './lib/sync/export-result';
import { Exporter } from './lib/sync/exporter';
import { fetchStore } from './lib/sync/fetcher';
import { ImportResult, describeImportResult } from './lib/sync/import-result';
import { Importer } from './lib/sync/importer';
import { Workspace } from './lib/workspace';

// Use current working directory as project root (where command is run)
const PROJECT_ROOT = process.cwd();

// Load environment variables from target project directory
loadEnv(PROJECT_ROOT);

function now(): number {
  return Math.floor(Date.now() / 1000);
}

function fail(error: unknown): never {
  console.error(chalk.red(`\nError: ${errorMessage(error)}`));
  process.exit(1);
}

/**
 * Wrap a command so any error ends the process with a red message
 */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      fail(error);
    }
  };
}

function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidInputError(`invalid date: ${value}`);
  }
  return date;
}

function parseStatus(value: string): Status {
  if (value === 'open') return 'open';
  if (value === 'close' || value === 'closed') return 'closed';
  throw new InvalidInputError(`unknown status "${value}", expected open or close`);
}

/**
 * Apply one local change under the entity's lock and make it durable
 */
async function mutate(ws: Workspace, entity: CachedEntity, change: () => void): Promise<void> {
  await ws.cache.withEntityLock(entity.id, async () => {
    try {
      change();
      await ws.cache.flushIfDirty(entity);
    } catch (error) {
      ws.cache.rollback(entity);
      throw error;
    }
  });
}

/**
 * Abort the controller on Ctrl-C while `run` is in progress
 */
async function withInterrupt<T>(onInterrupt: () => void, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const handler = () => {
    onInterrupt();
    controller.abort();
  };

  process.once('SIGINT', handler);
  try {
    return await run(controller.signal);
  } finally {
    process.removeListener('SIGINT', handler);
  }
}

/**
 * Verify the bridge can reach its tracker
 */
async function verifyAccess(opened: Bridge): Promise<void> {
  const spinner = ora(`Verifying access to ${opened.name}...`).start();

  let hasAccess: boolean;
  try {
    hasAccess = await opened.verifyAccess();
  } catch (error) {
    spinner.fail('Access verification failed');
    throw error;
  }

  if (!hasAccess) {
    spinner.fail('Access verification failed');
    throw new RemoteFetchError(
      opened.target === 'github'
        ? `cannot access the repository of bridge "${opened.name}", check your gh auth or GITHUB_TOKEN permissions`
        : `cannot read the dump of bridge "${opened.name}"`
    );
  }
  spinner.succeed('Access verified');
}

/**
 * Print sync result summary
 */
function printSummary(title: string, counts: Map<string, number>, skipped: number): void {
  console.log(chalk.bold('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  console.log(chalk.bold.cyan(title));
  console.log(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n'));

  if (counts.size === 0) {
    console.log(chalk.green('✓ Everything is in sync'));
  }
  for (const [kind, count] of counts) {
    console.log(chalk.green(`✓ ${kind}: ${count}`));
  }
  if (skipped > 0) {
    console.log(chalk.gray(`⊘ Skipped: ${skipped}`));
  }

  console.log();
}

type SyncResult = ImportResult | ExportResult;

/**
 * Drain a result stream into a spinner. Returns the error result's error,
 * if the stream ended with one.
 */
async function drain<R extends SyncResult>(
  results: AsyncIterable<R>,
  describe: (result: R) => string,
  spinner: ora.Ora,
  verbose: boolean
): Promise<{ counts: Map<string, number>; skipped: number; error: Error | null }> {
  const counts = new Map<string, number>();
  let skipped = 0;

  for await (const item of results) {
    const line = describe(item);
    const result: SyncResult = item;
    if (result.kind === 'error') {
      return { counts, skipped, error: result.error };
    }

    if (result.kind === 'nothing') {
      skipped++;
    } else {
      counts.set(result.kind, (counts.get(result.kind) ?? 0) + 1);
    }

    if (verbose) {
      spinner.stopAndPersist({ symbol: result.kind === 'nothing' ? chalk.gray('○') : chalk.green('✓'), text: line });
      spinner.start();
    } else {
      spinner.text = line;
    }
  }

  return { counts, skipped, error: null };
}

// Create CLI
const program = new Command();

program
  .name('tracklog')
  .description('Offline-first issue tracker with bridges to remote trackers')
  .version('0.1.0');

// User commands
const user = program.command('user').description('Manage the local identity');

user
  .command('create')
  .description('Create the local identity and make it the current user')
  .option('--login <login>', 'Login')
  .option('--name <name>', 'Display name')
  .option('--email <email>', 'Email address')
  .action(
    action(async (options: { login?: string; name?: string; email?: string }) => {
      const ws = await Workspace.open(PROJECT_ROOT);

      const answers = await inquirer.prompt<{ login: string }>([
        {
          type: 'input',
          name: 'login',
          message: 'Login:',
          when: !options.login,
          validate: (value: string) => value.trim() !== '' || 'login is required',
        },
      ]);

      const identity = await ws.cache.identities.createIdentity({
        login: options.login ?? answers.login,
        name: options.name,
        email: options.email,
      });
      ws.setCurrentUser(identity);

      console.log(chalk.green(`✓ Created identity ${identity.id.slice(0, 7)} (${identity.login})`));
    })
  );

// Entity commands
program
  .command('new <title>')
  .description('Create a new issue')
  .option('-m, --message <message>', 'Description', '')
  .action(
    action(async (title: string, options: { message: string }) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const author = ws.currentUser();

      const { entity } = ws.cache.createEntity(author, now(), title, options.message);
      try {
        await ws.cache.flushIfDirty(entity);
      } catch (error) {
        ws.cache.rollback(entity);
        throw error;
      }

      console.log(chalk.green(`✓ Created ${entity.humanId}`));
    })
  );

program
  .command('ls')
  .description('List issues')
  .option('--status <status>', 'Only issues with this status (open|closed)')
  .action(
    action(async (options: { status?: string }) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const status = options.status ? parseStatus(options.status) : undefined;

      const entities = ws.cache
        .all()
        .filter((entity) => !status || entity.snapshot().status === status)
        .sort((a, b) => a.snapshot().createdAt - b.snapshot().createdAt);

      if (entities.length === 0) {
        console.log(chalk.gray('No issues'));
        return;
      }
      for (const entity of entities) {
        console.log(formatEntityLine(entity));
      }
    })
  );

program
  .command('show <id>')
  .description('Show an issue and its timeline')
  .option('--history', 'Show edit history of comments as diffs')
  .action(
    action(async (id: string, options: { history?: boolean }) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const entity = ws.cache.resolveByPrefix(id);

      for (const line of renderSnapshot(entity.snapshot(), ws.cache.identities, { history: options.history })) {
        console.log(line);
      }
    })
  );

program
  .command('comment <id>')
  .description('Add a comment')
  .requiredOption('-m, --message <message>', 'Comment text')
  .action(
    action(async (id: string, options: { message: string }) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const author = ws.currentUser();
      const entity = ws.cache.resolveByPrefix(id);

      await mutate(ws, entity, () => {
        entity.addComment(author, now(), options.message);
      });
      console.log(chalk.green(`✓ Commented on ${entity.humanId}`));
    })
  );

program
  .command('title <id> <title>')
  .description('Change the title')
  .action(
    action(async (id: string, title: string) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const author = ws.currentUser();
      const entity = ws.cache.resolveByPrefix(id);

      await mutate(ws, entity, () => {
        entity.setTitle(author, now(), title);
      });
      console.log(chalk.green(`✓ Renamed ${entity.humanId}`));
    })
  );

program
  .command('status <id> <status>')
  .description('Open or close an issue (open|close)')
  .action(
    action(async (id: string, value: string) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const author = ws.currentUser();
      const entity = ws.cache.resolveByPrefix(id);
      const status = parseStatus(value);

      await mutate(ws, entity, () => {
        entity.setStatus(author, now(), status);
      });
      console.log(chalk.green(`✓ ${entity.humanId} is ${status}`));
    })
  );

program
  .command('label <id> [labels...]')
  .description('Change labels: "+x" or "x" adds, "-x" removes (put "--" before removals)')
  .action(
    action(async (id: string, labels: string[] = []) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const author = ws.currentUser();
      const entity = ws.cache.resolveByPrefix(id);

      const added = labels.filter((l) => !l.startsWith('-')).map((l) => l.replace(/^\+/, ''));
      const removed = labels.filter((l) => l.startsWith('-')).map((l) => l.slice(1));

      await mutate(ws, entity, () => {
        entity.changeLabels(author, now(), added, removed);
      });
      console.log(chalk.green(`✓ Labels of ${entity.humanId}: ${entity.snapshot().labels.join(', ') || '(none)'}`));
    })
  );

program
  .command('fetch <dir>')
  .description("Merge another clone's data directory into this one")
  .action(
    action(async (dir: string) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const spinner = ora(`Fetching from ${dir}...`).start();

      try {
        const summary = await fetchStore(ws.cache, new FileStore(path.resolve(PROJECT_ROOT, dir)));
        spinner.succeed('Fetch complete');

        console.log(chalk.green(`✓ New identities: ${summary.identities}`));
        console.log(chalk.green(`✓ New issues: ${summary.createdEntities.length}`));
        console.log(chalk.green(`✓ Updated issues: ${summary.updatedEntities.length}`));
        console.log(chalk.gray(`  ${summary.operations} operation(s) merged`));
      } catch (error) {
        spinner.fail('Fetch failed');
        throw error;
      }
    })
  );

// Bridge commands
const bridge = program.command('bridge').description('Configure and run bridges to remote trackers');

bridge
  .command('configure')
  .description('Add a bridge')
  .option('--name <name>', 'Bridge name')
  .option('--target <target>', `Tracker (${bridgeTargets.join('|')})`)
  .option('--repo <owner/repo>', 'GitHub repository')
  .option('--path <file>', 'JSON dump, for file bridges')
  .action(
    action(async (options: { name?: string; target?: string; repo?: string; path?: string }) => {
      const ws = await Workspace.open(PROJECT_ROOT);

      const answers = await inquirer.prompt<{ name: string; target: BridgeTarget; repo?: string; path?: string }>([
        {
          type: 'input',
          name: 'name',
          message: 'Bridge name:',
          default: 'default',
          when: !options.name,
        },
        {
          type: 'list',
          name: 'target',
          message: 'Tracker:',
          choices: ws.bridges.getTargets(),
          when: !options.target,
        },
        {
          type: 'input',
          name: 'repo',
          message: 'Repository (owner/repo):',
          default: () => detectGitHubRepo(PROJECT_ROOT) ?? undefined,
          when: (current) => !options.repo && (options.target ?? current.target) === 'github',
        },
        {
          type: 'input',
          name: 'path',
          message: 'Dump file:',
          when: (current) => !options.path && (options.target ?? current.target) === 'file',
        },
      ]);

      const target = options.target ?? answers.target;
      if (target !== 'github' && target !== 'file') {
        throw new InvalidInputError(`unknown target "${target}"`);
      }

      const config: BridgeConfig = {
        name: options.name ?? answers.name,
        target,
        repo: options.repo ?? (answers.repo || undefined),
        path: options.path ?? (answers.path || undefined),
      };
      ws.saveConfig(addBridge(ws.config, config));

      console.log(chalk.green(`✓ Bridge "${config.name}" configured`));
    })
  );

bridge
  .command('ls')
  .description('List bridges')
  .action(
    action(async () => {
      const ws = await Workspace.open(PROJECT_ROOT);

      if (ws.config.bridges.length === 0) {
        console.log(chalk.gray('No bridges configured'));
        return;
      }
      for (const b of ws.config.bridges) {
        const where = b.repo ?? b.path ?? '';
        const state = ws.syncState.get(b.name);
        console.log(`${chalk.cyan(b.name)} ${b.target} ${where}`);
        console.log(chalk.gray(`  last pull: ${state.lastImport ?? 'never'}, last push: ${state.lastExport ?? 'never'}`));
      }
    })
  );

bridge
  .command('pull [name]')
  .description('Import changes from a remote tracker')
  .option('--since <date>', 'Only items changed since this date')
  .option('--all', 'Ignore the last pull time')
  .option('-v, --verbose', 'Print every result')
  .action(
    action(async (name: string | undefined, options: { since?: string; all?: boolean; verbose?: boolean }) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const opened = ws.bridges.open(selectBridge(ws.config, name));
      await verifyAccess(opened);

      const since = options.all
        ? undefined
        : options.since
          ? parseDate(options.since)
          : ws.syncState.lastImport(opened.name);
      const startedAt = new Date();

      const spinner = ora(`Pulling from ${opened.name}...`).start();
      const outcome = await withInterrupt(
        () => {
          spinner.text = 'Cancelling...';
        },
        (signal) =>
          drain<ImportResult>(
            new Importer(ws.cache).importAll(opened.source, { since, signal }),
            describeImportResult,
            spinner,
            options.verbose ?? false
          )
      );

      if (outcome.error) {
        spinner.fail('Pull failed');
        fail(outcome.error);
      }

      ws.syncState.recordImport(opened.name, startedAt);
      spinner.succeed('Pull complete');
      printSummary('Pull Results', outcome.counts, outcome.skipped);
    })
  );

bridge
  .command('push [name]')
  .description('Export local changes to a remote tracker')
  .option('--since <date>', 'Only changes made since this date')
  .option('-v, --verbose', 'Print every result')
  .action(
    action(async (name: string | undefined, options: { since?: string; verbose?: boolean }) => {
      const ws = await Workspace.open(PROJECT_ROOT);
      const opened = ws.bridges.open(selectBridge(ws.config, name));
      if (!opened.writer) {
        throw new InvalidInputError(`bridge "${opened.name}" is read-only`);
      }
      await verifyAccess(opened);

      const writer = opened.writer;
      const since = options.since ? parseDate(options.since) : undefined;
      const exporter = new Exporter(ws.cache, ws.currentUser());

      const spinner = ora(`Pushing to ${opened.name}...`).start();
      const outcome = await withInterrupt(
        () => {
          spinner.text = 'Cancelling...';
        },
        (signal) =>
          drain<ExportResult>(
            exporter.exportAll(writer, { since, signal }),
            describeExportResult,
            spinner,
            options.verbose ?? false
          )
      );

      if (outcome.error) {
        spinner.fail('Push failed');
        fail(outcome.error);
      }

      ws.syncState.recordExport(opened.name, new Date());
      spinner.succeed('Push complete');
      printSummary('Push Results', outcome.counts, outcome.skipped);
    })
  );

// Parse and execute
program.parseAsync().catch(fail);
