/**
 * S3 adapter for the object-store collaborator.
 *
 * Lists a prefix through ListObjectsV2 (paginated, with a page cap) and
 * streams objects through GetObject. Public dataset buckets are read
 * with unsigned requests.
 */

import { Readable } from 'node:stream';
import {
  S3Client,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
} from '@aws-sdk/client-s3';
import type { _Object, S3ClientConfig } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import type { MirrorConfig } from '../config.js';
import { ObjectNotFoundError, TransientFetchError } from '../errors.js';
import { isArchiveName } from '../manifest/archive-names.js';
import type { ListingRecord } from '../manifest/types.js';
import type { GetObjectOptions, ObjectStore, S3ObjectStoreOptions } from './types.js';

/**
 * Create an S3 client for the configured endpoint. Anonymous clients
 * send unsigned requests.
 */
export function createS3Client(
  config: Pick<MirrorConfig, 'region' | 'endpoint' | 'anonymous'>
): S3Client {
  const clientConfig: S3ClientConfig = { region: config.region };

  if (config.endpoint) {
    clientConfig.endpoint = config.endpoint;
    clientConfig.forcePathStyle = true;
  }

  if (config.anonymous) {
    // Identity resolution still runs before signing, so hand it a static one
    clientConfig.credentials = { accessKeyId: 'anonymous', secretAccessKey: 'anonymous' };
    clientConfig.signer = { sign: async (request) => request };
  }

  return new S3Client(clientConfig);
}

/** Normalize a listing prefix to `a/b/` form ('' for the bucket root). */
export function toKeyPrefix(prefix: string): string {
  const trimmed = prefix.replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed === '' ? '' : `${trimmed}/`;
}

function isNotFound(err: unknown): boolean {
  if (err instanceof NoSuchKey) {
    return true;
  }
  if (err instanceof Error && (err.name === 'NoSuchKey' || err.name === 'NotFound')) {
    return true;
  }
  return false;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly options: S3ObjectStoreOptions;
  private readonly logger: Logger;

  constructor(client: S3Client, options: S3ObjectStoreOptions, logger: Logger) {
    this.client = client;
    this.options = options;
    this.logger = logger.child({ component: 's3-object-store' });
  }

  /**
   * List all objects under a prefix, handling pagination.
   */
  async list(prefix: string): Promise<ListingRecord[]> {
    const keyPrefix = toKeyPrefix(prefix);
    const records: ListingRecord[] = [];
    let continuationToken: string | undefined;
    let pageCount = 0;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.options.bucket,
          Prefix: keyPrefix || undefined,
          ContinuationToken: continuationToken,
          MaxKeys: 1000,
        })
      );

      for (const obj of response.Contents ?? []) {
        const record = this.toListingRecord(obj, keyPrefix);
        if (record) {
          records.push(record);
        }
      }

      continuationToken = response.NextContinuationToken;
      pageCount++;

      if (continuationToken && pageCount >= this.options.maxListPages) {
        this.logger.warn(
          { maxListPages: this.options.maxListPages, objectsSoFar: records.length },
          'Reached maximum list pages limit'
        );
        break;
      }
    } while (continuationToken);

    this.logger.debug({ prefix: keyPrefix, objectCount: records.length }, 'Listed objects');
    return records;
  }

  async getObject(remotePath: string, options: GetObjectOptions = {}): Promise<Readable> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.options.bucket, Key: remotePath }),
        { abortSignal: options.signal }
      );

      if (!response.Body) {
        throw new TransientFetchError(`Empty response body for ${remotePath}`);
      }
      if (!(response.Body instanceof Readable)) {
        throw new TransientFetchError(`Unexpected response body type for ${remotePath}`);
      }
      return response.Body;
    } catch (err) {
      if (isNotFound(err)) {
        throw new ObjectNotFoundError(remotePath);
      }
      throw err;
    }
  }

  /**
   * Convert an S3 _Object to a listing record relative to the prefix.
   * Directory markers and keys outside the prefix are dropped.
   */
  private toListingRecord(obj: _Object, keyPrefix: string): ListingRecord | null {
    if (!obj.Key || obj.Key.endsWith('/') || !obj.Key.startsWith(keyPrefix)) {
      return null;
    }

    const path = obj.Key.slice(keyPrefix.length);
    if (!path) {
      return null;
    }

    return {
      path,
      sizeBytes: obj.Size ?? 0,
      isArchive: isArchiveName(path),
    };
  }
}
