export { EntityCache } from './entity-cache';
export type { EntityCacheOptions, CreatedEntity, MergeEntityResult } from './entity-cache';
export { CachedEntity } from './cached-entity';
export type { AppendedOperation } from './cached-entity';
export { EntityLockManager } from './lock-manager';
export type { LockHandle } from './lock-manager';
