/**
 * Object-store collaborator.
 *
 * The manifest builder consumes `list`, the sync engine consumes
 * `getObject`. Implementations must throw `ObjectNotFoundError` for a
 * missing key so the engine does not retry it.
 */

import type { Readable } from 'node:stream';
import type { ListingRecord } from '../manifest/types.js';

export interface GetObjectOptions {
  /** Aborts the request and the body stream (per-attempt timeout) */
  signal?: AbortSignal;
}

export interface ObjectStore {
  /**
   * List every object under a prefix. Record paths are relative to the
   * prefix; directory markers are omitted.
   */
  list(prefix: string): Promise<ListingRecord[]>;

  /** Open the byte stream of one object by its full key */
  getObject(remotePath: string, options?: GetObjectOptions): Promise<Readable>;
}

/** Options for the S3 adapter */
export interface S3ObjectStoreOptions {
  bucket: string;

  /** Maximum number of list pages per listing (safety limit) */
  maxListPages: number;
}
