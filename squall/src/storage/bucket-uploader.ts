/**
 * Upload of curated files to the managed bucket (Backblaze B2 through its
 * S3-compatible API). All or nothing: the first failure aborts the call.
 */
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { HeadBucketCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { B2Credentials, B2Settings } from '../core/config.js';
import { DEFAULT_B2_ENDPOINT, regionFromEndpoint } from '../core/config.js';
import { UploadFailedError, errorMessage } from '../core/errors.js';
import { getDefaultLogger, type Logger } from '../core/logger.js';

/** Object-store operations the uploader needs. */
export interface ObjectStoreClient {
  /** Rejects when the bucket does not exist or the credentials cannot see it. */
  headBucket(bucket: string): Promise<void>;
  putObject(bucket: string, key: string, body: Uint8Array): Promise<void>;
}

export type ClientFactory = (
  credentials: B2Credentials,
  settings: Pick<B2Settings, 'endpoint' | 'region'>
) => ObjectStoreClient;

export interface BucketUploaderOptions {
  endpoint?: string;
  region?: string;
  logger?: Logger;
  createClient?: ClientFactory;
}

export const createS3Client: ClientFactory = (credentials, settings) => {
  const client = new S3Client({
    region: settings.region,
    endpoint: settings.endpoint,
    credentials: {
      accessKeyId: credentials.applicationKeyId,
      secretAccessKey: credentials.applicationKey,
    },
  });

  return {
    headBucket: async (bucket) => {
      await client.send(new HeadBucketCommand({ Bucket: bucket }));
    },
    putObject: async (bucket, key, body) => {
      await client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body }));
    },
  };
};

export class BucketUploader {
  private readonly endpoint: string;
  private readonly region: string;
  private readonly logger: Logger;
  private readonly createClient: ClientFactory;

  constructor(options: BucketUploaderOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_B2_ENDPOINT;
    this.region = options.region ?? regionFromEndpoint(this.endpoint);
    this.logger = options.logger ?? getDefaultLogger();
    this.createClient = options.createClient ?? createS3Client;
  }

  /**
   * Authorise against the account, make sure the bucket exists and upload
   * each file under its base name.
   */
  async upload(files: readonly string[], bucket: string, credentials: B2Credentials): Promise<boolean> {
    const client = this.createClient(credentials, { endpoint: this.endpoint, region: this.region });

    try {
      await client.headBucket(bucket);
    } catch (err) {
      this.logger.error(`Upload failed: ${errorMessage(err)}`);
      throw new UploadFailedError(`Cannot access bucket '${bucket}': ${errorMessage(err)}`, { cause: err });
    }
    this.logger.info(`Authorized to bucket: ${bucket}`);

    for (const file of files) {
      const key = basename(file);
      this.logger.info(`Uploading '${file}' to bucket '${bucket}'`);
      try {
        const body = await readFile(file);
        await client.putObject(bucket, key, body);
      } catch (err) {
        this.logger.error(`Upload failed: ${errorMessage(err)}`);
        throw new UploadFailedError(`Failed to upload '${file}': ${errorMessage(err)}`, { file, cause: err });
      }
    }

    this.logger.info('All files uploaded successfully.');
    return true;
  }
}
