/**
 * Provenance metadata keys. These are the idempotency anchors of import and
 * export and must not change between runs.
 */

export const KEY_ORIGIN = 'origin';

/** Login reported for actors the tracker no longer knows (deleted users) */
export const GHOST_LOGIN = 'ghost';

export interface MetadataKeys {
  origin: string;
  id: string;
  url: string;
  login: string;
  exported: string;
}

export function metadataKeys(target: string): MetadataKeys {
  return {
    origin: KEY_ORIGIN,
    id: `${target}-id`,
    url: `${target}-url`,
    login: `${target}-login`,
    exported: `${target}-exported`,
  };
}
