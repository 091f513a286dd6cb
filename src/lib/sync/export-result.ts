/**
 * Results streamed by the export engine
 */

export type ExportEventKind =
  | 'issue'
  | 'comment'
  | 'comment-edition'
  | 'status-change'
  | 'title-edition'
  | 'label-change';

export type ExportResult =
  | { kind: ExportEventKind; id: string }
  | { kind: 'nothing'; id: string | null; reason: string }
  | { kind: 'error'; error: Error; contextId: string | null };

const labels: Record<ExportEventKind, string> = {
  issue: 'new issue',
  comment: 'new comment',
  'comment-edition': 'updated comment',
  'status-change': 'changed status',
  'title-edition': 'changed title',
  'label-change': 'changed label',
};

export function describeExportResult(result: ExportResult): string {
  switch (result.kind) {
    case 'nothing':
      return `no event: ${result.reason}`;
    case 'error':
      return result.contextId
        ? `export error (${result.contextId.slice(0, 7)}): ${result.error.message}`
        : `export error: ${result.error.message}`;
    default:
      return `${labels[result.kind]}: ${result.id.slice(0, 7)}`;
  }
}
