/**
 * Convergence of two independently advanced copies of the same log
 */

import { InvalidInputError } from '../errors';
import { Operation, hashOperation } from './operation';

export interface MergeResult {
  merged: Operation[];
  /** Remote operations missing locally, in remote order */
  added: Operation[];
}

/**
 * Deterministic union: local operations first, then the remote ones not
 * already present (by content hash) in their remote order. Nothing is
 * dropped or rewritten.
 */
export function mergeLogs(local: readonly Operation[], remote: readonly Operation[]): MergeResult {
  if (local.length > 0 && remote.length > 0 && hashOperation(local[0]) !== hashOperation(remote[0])) {
    throw new InvalidInputError('cannot merge logs of different entities');
  }

  const known = new Set(local.map(hashOperation));
  const added: Operation[] = [];

  for (const op of remote) {
    const hash = hashOperation(op);
    if (known.has(hash)) continue;
    known.add(hash);
    added.push(op);
  }

  return { merged: [...local, ...added], added };
}
