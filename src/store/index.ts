export { S3ObjectStore, createS3Client, toKeyPrefix } from './s3-object-store.js';
export type { ObjectStore, GetObjectOptions, S3ObjectStoreOptions } from './types.js';
