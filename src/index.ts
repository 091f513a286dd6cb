/**
 * tracklog - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export * from './lib/errors';
export * from './lib/model';
export * from './lib/storage';
export * from './lib/cache';
export * from './lib/sources';
export { IdentityRegistry } from './lib/identity-registry';
export type { EnsureIdentityResult } from './lib/identity-registry';

export { Importer, toUnixTime } from './lib/sync/importer';
export type { ImportOptions } from './lib/sync/importer';
export { describeImportResult, importError, importNothing } from './lib/sync/import-result';
export type { ImportEventKind, ImportResult } from './lib/sync/import-result';
export { Exporter } from './lib/sync/exporter';
export type { ExportOptions } from './lib/sync/exporter';
export { describeExportResult } from './lib/sync/export-result';
export type { ExportEventKind, ExportResult } from './lib/sync/export-result';
export { fetchStore } from './lib/sync/fetcher';
export type { FetchSummary } from './lib/sync/fetcher';

export * from './lib/config';
export { SyncStateStore } from './lib/sync-state';
export type { BridgeSyncState, SyncState } from './lib/sync-state';
export { Workspace, createDefaultRegistry } from './lib/workspace';
export type { WorkspaceOptions } from './lib/workspace';
export { formatEntityLine, formatTime, renderDiff, renderSnapshot } from './lib/render';
