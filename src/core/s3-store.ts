import { promisify } from 'util';
import * as zlib from 'zlib';
import {
  CopyObjectCommand,
  GetObjectAclCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectAclCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { AccessControlPolicy, ListObjectsV2CommandOutput } from '@aws-sdk/client-s3';
import { HeaderSet, ObjectHandle, ObjectStore, ObjectSummary, StoreConfig } from '../types';
import { StoreError, StoreErrorCode, describeError } from './errors';
import { Logger, defaultLogger } from './logger';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

/**
 * The part of the SDK client the store talks to. Tests hand in a fake `send()`.
 */
export type S3Sender = Pick<S3Client, 'send'>;

export interface S3ObjectStoreOptions {
  config: StoreConfig;
  logger?: Logger;
  /** Inject a client for testing. If not provided, creates a real S3Client. */
  client?: S3Sender;
}

export function createS3Client(config: StoreConfig): S3Client {
  const credentials =
    config.accessKeyId && config.secretAccessKey
      ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
      : undefined;
  return new S3Client({
    region: config.region ?? process.env.AWS_REGION ?? 'us-east-1',
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials,
  });
}

const toCopySource = (bucket: string, key: string): string => {
  return `/${bucket}/${encodeURIComponent(key).replace(/%2F/g, '/')}`;
};

const NOT_FOUND_NAMES = new Set(['NotFound', 'NoSuchKey']);

const mapError = (error: unknown, code: StoreErrorCode, message: string, key?: string): StoreError => {
  if (error instanceof StoreError) {
    return error;
  }
  if (error instanceof S3ServiceException && NOT_FOUND_NAMES.has(error.name)) {
    return new StoreError('STORE_NOT_FOUND', `${message}: not found`, { key, cause: error });
  }
  return new StoreError(code, `${message}: ${describeError(error)}`, { key, cause: error });
};

/**
 * S3-compatible gateway (AWS S3, MinIO, DigitalOcean Spaces, ...)
 */
export class S3ObjectStore implements ObjectStore {
  private client: S3Sender;
  private preserveAcl: boolean;
  private logger: Logger;

  constructor(options: S3ObjectStoreOptions) {
    this.client = options.client ?? createS3Client(options.config);
    this.preserveAcl = options.config.preserveAcl;
    this.logger = options.logger ?? defaultLogger;
  }

  async *list(bucket: string, prefix: string): AsyncIterable<ObjectSummary> {
    let continuationToken: string | undefined;
    do {
      const page = await this.listPage(bucket, prefix, continuationToken);
      for (const item of page.Contents ?? []) {
        if (item.Key) {
          yield { key: item.Key, size: item.Size };
        }
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  async fetch(bucket: string, key: string): Promise<ObjectHandle> {
    try {
      const head = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return {
        bucket,
        key,
        headers: {
          contentType: head.ContentType,
          cacheControl: head.CacheControl,
          contentEncoding: head.ContentEncoding,
          contentDisposition: head.ContentDisposition,
          contentLanguage: head.ContentLanguage,
          metadata: { ...head.Metadata },
        },
        size: head.ContentLength,
        version: head.ETag,
        redirectLocation: head.WebsiteRedirectLocation,
      };
    } catch (error) {
      throw mapError(error, 'STORE_READ_FAILED', `Failed to fetch "${bucket}/${key}"`, key);
    }
  }

  async readContent(handle: ObjectHandle): Promise<Buffer> {
    let raw: Buffer;
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: handle.bucket, Key: handle.key })
      );
      raw = response.Body ? Buffer.from(await response.Body.transformToByteArray()) : Buffer.alloc(0);
    } catch (error) {
      throw mapError(error, 'STORE_READ_FAILED', `Failed to read "${handle.bucket}/${handle.key}"`, handle.key);
    }

    if (handle.headers.contentEncoding !== 'gzip' || raw.length === 0) {
      return raw;
    }
    try {
      return await gunzip(raw);
    } catch (error) {
      throw mapError(error, 'STORE_READ_FAILED', `Failed to inflate "${handle.bucket}/${handle.key}"`, handle.key);
    }
  }

  async writeContent(handle: ObjectHandle, content: Buffer): Promise<ObjectHandle> {
    const { bucket, key, headers } = handle;
    const body = headers.contentEncoding === 'gzip' ? await gzip(content) : content;

    return this.withAcl(handle, async () => {
      const response = await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ...this.toHeaderInput(headers),
          WebsiteRedirectLocation: handle.redirectLocation,
        })
      );
      this.logger.debug(`[s3] PUT ${bucket}/${key} (${body.length} bytes)`);
      return { ...handle, headers, size: body.length, version: response.ETag };
    });
  }

  async rewriteHeaders(handle: ObjectHandle, headers: HeaderSet): Promise<ObjectHandle> {
    const { bucket, key } = handle;

    return this.withAcl(handle, async () => {
      const response = await this.client.send(
        new CopyObjectCommand({
          Bucket: bucket,
          Key: key,
          CopySource: toCopySource(bucket, key),
          MetadataDirective: 'REPLACE',
          ...this.toHeaderInput(headers),
        })
      );
      this.logger.debug(`[s3] COPY ${bucket}/${key} with replaced metadata`);
      return { ...handle, headers, version: response.CopyObjectResult?.ETag };
    });
  }

  isRedirect(handle: ObjectHandle): boolean {
    return Boolean(handle.redirectLocation);
  }

  /**
   * Runs a write and puts the object's ACL back afterwards; S3 resets it to private
   * on every PUT or COPY. A failed restore does not undo the write, it is logged.
   */
  private async withAcl(handle: ObjectHandle, write: () => Promise<ObjectHandle>): Promise<ObjectHandle> {
    const { bucket, key } = handle;
    let policy: AccessControlPolicy | undefined;
    let updated: ObjectHandle;
    try {
      if (this.preserveAcl) {
        const acl = await this.client.send(new GetObjectAclCommand({ Bucket: bucket, Key: key }));
        policy = { Owner: acl.Owner, Grants: acl.Grants };
      }
      updated = await write();
    } catch (error) {
      throw mapError(error, 'STORE_WRITE_FAILED', `Failed to write "${bucket}/${key}"`, key);
    }

    if (policy) {
      try {
        await this.client.send(
          new PutObjectAclCommand({ Bucket: bucket, Key: key, AccessControlPolicy: policy })
        );
      } catch (error) {
        this.logger.error(`[s3] Failed to restore ACL of "${bucket}/${key}": ${describeError(error)}`);
      }
    }
    return updated;
  }

  private async listPage(
    bucket: string,
    prefix: string,
    continuationToken?: string
  ): Promise<ListObjectsV2CommandOutput> {
    try {
      return await this.client.send(
        new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: continuationToken })
      );
    } catch (error) {
      throw mapError(error, 'STORE_LIST_FAILED', `Failed to list "${bucket}/${prefix}"`);
    }
  }

  private toHeaderInput(headers: HeaderSet) {
    return {
      ContentType: headers.contentType,
      CacheControl: headers.cacheControl,
      ContentEncoding: headers.contentEncoding,
      ContentDisposition: headers.contentDisposition,
      ContentLanguage: headers.contentLanguage,
      Metadata: headers.metadata,
    };
  }
}
