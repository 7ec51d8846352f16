/**
 * Key-value store types.
 */

/** Index type of a store's keys. */
export type IndexType = 'string' | 'number';

export interface KeyValueStore {
  name: string;
  indexes: string[];
  /** Index type as reported by the server. */
  type: string;
}

/**
 * Options for a range seek.
 */
export interface SeekOptions {
  /** First key, inclusive. */
  startKey: string;
  /** Last key. Unbounded when omitted. */
  endKey?: string;
  /** Maximum number of pairs to yield. */
  limit?: number;
  signal?: AbortSignal;
  /** Throw on unexpected server rejections instead of ending quietly. */
  strict?: boolean;
}

export interface SizeHint {
  lower: number;
  upper?: number;
}
