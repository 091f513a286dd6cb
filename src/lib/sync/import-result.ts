/**
 * Results streamed by the import engine
 */

export type ImportEventKind =
  | 'entity'
  | 'comment'
  | 'comment-edition'
  | 'status-change'
  | 'title-edition'
  | 'label-change'
  | 'identity';

export type ImportResult =
  | { kind: ImportEventKind; id: string }
  | { kind: 'nothing'; id: string | null; reason: string }
  | { kind: 'error'; error: Error; contextId: string | null };

export function importNothing(reason: string, id: string | null = null): ImportResult {
  return { kind: 'nothing', id, reason };
}

export function importError(error: Error, contextId: string | null = null): ImportResult {
  return { kind: 'error', error, contextId };
}

const labels: Record<ImportEventKind, string> = {
  entity: 'new issue',
  comment: 'new comment',
  'comment-edition': 'updated comment',
  'status-change': 'changed status',
  'title-edition': 'changed title',
  'label-change': 'changed label',
  identity: 'new identity',
};

/**
 * One-line description, e.g. "new comment: 3fa9c12"
 */
export function describeImportResult(result: ImportResult): string {
  switch (result.kind) {
    case 'nothing':
      return `no event: ${result.reason}`;
    case 'error':
      return result.contextId
        ? `import error (${result.contextId}): ${result.error.message}`
        : `import error: ${result.error.message}`;
    default:
      return `${labels[result.kind]}: ${result.id.slice(0, 7)}`;
  }
}
