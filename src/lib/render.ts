/**
 * Terminal rendering of entities and their timelines
 */

import chalk from 'chalk';
import { diffWords } from 'diff';
import { CachedEntity } from './cache/cached-entity';
import { IdentityNotFoundError } from './errors';
import { IdentityRegistry } from './identity-registry';
import { humanId } from './model/canonical';
import { displayName } from './model/identity';
import { Status } from './model/operation';
import { CommentVersion, Snapshot, TimelineItem } from './model/snapshot';

/**
 * UTC time as "YYYY-MM-DD HH:MM"
 */
export function formatTime(unixTime: number): string {
  return new Date(unixTime * 1000).toISOString().slice(0, 16).replace('T', ' ');
}

export function formatStatus(status: Status): string {
  return status === 'open' ? chalk.green('open') : chalk.magenta('closed');
}

/**
 * Name of an author, or its short id when the identity is unknown
 */
export function authorName(identities: IdentityRegistry, id: string): string {
  try {
    return displayName(identities.get(id));
  } catch (error) {
    if (error instanceof IdentityNotFoundError) return humanId(id);
    throw error;
  }
}

export function formatEntityLine(entity: CachedEntity): string {
  const snapshot = entity.snapshot();
  const labels = snapshot.labels.length > 0 ? chalk.gray(` [${snapshot.labels.join(', ')}]`) : '';
  return `${chalk.cyan(entity.humanId)} ${formatStatus(snapshot.status).padEnd(6)} ${snapshot.title}${labels}`;
}

/**
 * Word-level diff between two versions of a text
 */
export function renderDiff(before: string, after: string): string {
  return diffWords(before, after)
    .map((part) => {
      if (part.added) return chalk.green(part.value);
      if (part.removed) return chalk.red.strikethrough(part.value);
      return part.value;
    })
    .join('');
}

function renderHistory(history: CommentVersion[], identities: IdentityRegistry): string[] {
  const lines: string[] = [];
  for (let i = 1; i < history.length; i++) {
    const version = history[i];
    lines.push(chalk.gray(`  ~ edited by ${authorName(identities, version.author)} on ${formatTime(version.unixTime)}`));
    lines.push(indent(renderDiff(history[i - 1].message, version.message), '    '));
  }
  return lines;
}

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => prefix + line)
    .join('\n');
}

function renderTimelineItem(item: TimelineItem, identities: IdentityRegistry, withHistory: boolean): string[] {
  const header = `${authorName(identities, item.author)} ${chalk.gray(formatTime(item.unixTime))}`;

  switch (item.type) {
    case 'create':
    case 'comment': {
      const verb = item.type === 'create' ? 'opened' : 'commented';
      const edited = item.history.length > 1 ? chalk.gray(' (edited)') : '';
      const lines = [`${header} ${verb}${edited}`];
      if (item.message) lines.push(indent(item.message, '  '));
      if (withHistory) lines.push(...renderHistory(item.history, identities));
      return lines;
    }
    case 'set-title':
      return [`${header} changed the title from "${item.was}" to "${item.title}"`];
    case 'set-status':
      return [`${header} ${item.status === 'closed' ? 'closed' : 'reopened'} the issue`];
    case 'label-change': {
      const parts = [
        ...item.added.map((label) => chalk.green(`+${label}`)),
        ...item.removed.map((label) => chalk.red(`-${label}`)),
      ];
      return [`${header} changed labels ${parts.join(' ')}`];
    }
  }
}

export interface RenderOptions {
  /** Show every version of edited comments as word diffs */
  history?: boolean;
}

export function renderSnapshot(snapshot: Snapshot, identities: IdentityRegistry, options: RenderOptions = {}): string[] {
  const lines = [
    `${chalk.bold(snapshot.title)} ${chalk.cyan(humanId(snapshot.id))}`,
    `${formatStatus(snapshot.status)} · opened by ${authorName(identities, snapshot.author)} on ${formatTime(snapshot.createdAt)}`,
  ];
  if (snapshot.labels.length > 0) {
    lines.push(`labels: ${snapshot.labels.join(', ')}`);
  }
  lines.push(`participants: ${snapshot.participants.map((id) => authorName(identities, id)).join(', ')}`);
  lines.push('');

  for (const item of snapshot.timeline) {
    lines.push(...renderTimelineItem(item, identities, options.history ?? false));
  }
  return lines;
}
