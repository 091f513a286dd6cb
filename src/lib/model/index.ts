/**
 * Entity and operation model exports
 */

export * from './operation';
export * from './snapshot';
export * from './identity';
export { mergeLogs } from './merge';
export type { MergeResult } from './merge';
export { canonicalJson, contentHash, humanId } from './canonical';
export type { JsonValue } from './canonical';
