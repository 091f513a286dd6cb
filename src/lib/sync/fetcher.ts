/**
 * Pull identities and entity logs from another clone's store
 */

import { EntityCache } from '../cache/entity-cache';
import { OperationStore } from '../storage/types';

export interface FetchSummary {
  identities: number;
  createdEntities: string[];
  updatedEntities: string[];
  operations: number;
}

/**
 * Union every log of `remote` into the local cache. Identities come first
 * so authors of merged operations are known.
 */
export async function fetchStore(cache: EntityCache, remote: OperationStore): Promise<FetchSummary> {
  const summary: FetchSummary = { identities: 0, createdEntities: [], updatedEntities: [], operations: 0 };

  for (const identity of await remote.listIdentities()) {
    if (await cache.identities.merge(identity)) {
      summary.identities++;
    }
  }

  for (const id of await remote.listEntityIds()) {
    const { created, added } = await cache.mergeEntity(await remote.readLog(id));
    summary.operations += added;
    if (created) {
      summary.createdEntities.push(id);
    } else if (added > 0) {
      summary.updatedEntities.push(id);
    }
  }

  return summary;
}
