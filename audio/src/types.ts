export type SourceKind = 'PrimaryExtractor' | 'PublicAPI' | 'Mirror' | 'Feed' | 'DirectUrl';

export type LoopMode = 'off' | 'track' | 'queue';

/**
 * A resolved, playable reference. Immutable: failure bookkeeping lives in the
 * queue, keyed by `canonicalUrl`.
 */
export interface Item {
  readonly title: string;
  readonly artist?: string;
  /** Seconds. */
  readonly duration?: number;
  readonly thumbnail?: string;
  readonly canonicalUrl: string;
  readonly sourceKind: SourceKind;
  readonly requestedBy: string;
}

export interface ItemInit {
  title: string;
  artist?: string;
  duration?: number;
  thumbnail?: string;
  canonicalUrl: string;
  sourceKind: SourceKind;
  requestedBy?: string;
}

export function createItem(init: ItemInit): Item {
  const item: Item = {
    title: init.title,
    canonicalUrl: init.canonicalUrl,
    sourceKind: init.sourceKind,
    requestedBy: init.requestedBy ?? '',
    ...(init.artist ? { artist: init.artist } : {}),
    ...(init.duration !== undefined && Number.isFinite(init.duration) ? { duration: init.duration } : {}),
    ...(init.thumbnail ? { thumbnail: init.thumbnail } : {}),
  };
  return Object.freeze(item);
}

export function withRequester(item: Item, requestedBy: string): Item {
  return Object.freeze({ ...item, requestedBy });
}
