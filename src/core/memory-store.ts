import * as zlib from 'zlib';
import { HeaderSet, ObjectHandle, ObjectStore, ObjectSummary } from '../types';
import { StoreError } from './errors';

interface StoredObject {
  body: Buffer;
  headers: HeaderSet;
  acl: string[];
  version: number;
  redirectLocation?: string;
}

export interface SeedOptions {
  headers?: Partial<HeaderSet>;
  acl?: string[];
  redirectLocation?: string;
}

type FailingOperation = 'fetch' | 'read' | 'write';

function copyHeaders(headers: HeaderSet): HeaderSet {
  return { ...headers, metadata: { ...headers.metadata } };
}

/**
 * In-process object store.
 *
 * NOTE: This is a DEV-HELPER used by the tests and for trying rule tables
 * locally. Every mutation bumps the object's version and a write made through
 * an older handle is refused, the way a stale ETag would be.
 */
export class MemoryObjectStore implements ObjectStore {
  private buckets = new Map<string, Map<string, StoredObject>>();
  private failures = new Map<string, FailingOperation>();
  private listingFailures = new Map<string, number>();
  mutations = 0;

  /**
   * Seed an object. Content is given decoded; it is stored gzipped when the
   * headers say so.
   */
  put(bucket: string, key: string, content: Buffer | string, options: SeedOptions = {}): void {
    const headers: HeaderSet = { ...options.headers, metadata: { ...options.headers?.metadata } };
    const decoded = typeof content === 'string' ? Buffer.from(content) : content;
    this.objects(bucket).set(key, {
      body: headers.contentEncoding === 'gzip' ? zlib.gzipSync(decoded) : decoded,
      headers,
      acl: options.acl ?? ['owner:FULL_CONTROL'],
      version: 1,
      redirectLocation: options.redirectLocation,
    });
  }

  /**
   * Stored state of an object, for assertions. `content` is decoded, `body` is as stored.
   */
  inspect(bucket: string, key: string): { content: Buffer; body: Buffer; headers: HeaderSet; acl: string[]; version: number } | undefined {
    const stored = this.objects(bucket).get(key);
    if (!stored) return undefined;
    return {
      content: this.decode(stored),
      body: stored.body,
      headers: copyHeaders(stored.headers),
      acl: [...stored.acl],
      version: stored.version,
    };
  }

  failOn(key: string, operation: FailingOperation): void {
    this.failures.set(key, operation);
  }

  /**
   * Make the listing of a bucket throw after `after` keys
   */
  failListing(bucket: string, after: number): void {
    this.listingFailures.set(bucket, after);
  }

  async *list(bucket: string, prefix: string): AsyncIterable<ObjectSummary> {
    const keys = [...this.objects(bucket).keys()].filter((key) => key.startsWith(prefix)).sort();
    const failAfter = this.listingFailures.get(bucket);
    let listed = 0;
    for (const key of keys) {
      if (failAfter !== undefined && listed >= failAfter) {
        throw new StoreError('STORE_LIST_FAILED', `Listing of "${bucket}" failed`);
      }
      const stored = this.objects(bucket).get(key);
      if (!stored) continue;
      listed++;
      yield { key, size: stored.body.length };
    }
  }

  async fetch(bucket: string, key: string): Promise<ObjectHandle> {
    this.maybeFail(key, 'fetch');
    const stored = this.get(bucket, key);
    return this.toHandle(bucket, key, stored);
  }

  async readContent(handle: ObjectHandle): Promise<Buffer> {
    this.maybeFail(handle.key, 'read');
    return this.decode(this.get(handle.bucket, handle.key));
  }

  async writeContent(handle: ObjectHandle, content: Buffer): Promise<ObjectHandle> {
    this.maybeFail(handle.key, 'write');
    const stored = this.current(handle);
    stored.headers = copyHeaders(handle.headers);
    stored.body = handle.headers.contentEncoding === 'gzip' ? zlib.gzipSync(content) : Buffer.from(content);
    return this.bump(handle, stored);
  }

  async rewriteHeaders(handle: ObjectHandle, headers: HeaderSet): Promise<ObjectHandle> {
    this.maybeFail(handle.key, 'write');
    const stored = this.current(handle);
    stored.headers = copyHeaders(headers);
    return this.bump(handle, stored);
  }

  isRedirect(handle: ObjectHandle): boolean {
    return handle.redirectLocation !== undefined;
  }

  private objects(bucket: string): Map<string, StoredObject> {
    let objects = this.buckets.get(bucket);
    if (!objects) {
      objects = new Map();
      this.buckets.set(bucket, objects);
    }
    return objects;
  }

  private get(bucket: string, key: string): StoredObject {
    const stored = this.objects(bucket).get(key);
    if (!stored) {
      throw new StoreError('STORE_NOT_FOUND', `No such object "${bucket}/${key}"`, { key });
    }
    return stored;
  }

  private current(handle: ObjectHandle): StoredObject {
    const stored = this.get(handle.bucket, handle.key);
    if (handle.version !== String(stored.version)) {
      throw new StoreError(
        'STORE_STALE_HANDLE',
        `Stale handle for "${handle.key}": version ${handle.version ?? 'none'}, stored ${stored.version}`,
        { key: handle.key }
      );
    }
    return stored;
  }

  private bump(handle: ObjectHandle, stored: StoredObject): ObjectHandle {
    stored.version++;
    this.mutations++;
    return this.toHandle(handle.bucket, handle.key, stored);
  }

  private decode(stored: StoredObject): Buffer {
    return stored.headers.contentEncoding === 'gzip' ? zlib.gunzipSync(stored.body) : stored.body;
  }

  private toHandle(bucket: string, key: string, stored: StoredObject): ObjectHandle {
    return {
      bucket,
      key,
      headers: copyHeaders(stored.headers),
      size: stored.body.length,
      version: String(stored.version),
      redirectLocation: stored.redirectLocation,
    };
  }

  private maybeFail(key: string, operation: FailingOperation): void {
    if (this.failures.get(key) !== operation) return;
    const code = operation === 'write' ? 'STORE_WRITE_FAILED' : 'STORE_READ_FAILED';
    throw new StoreError(code, `Simulated ${operation} failure for "${key}"`, { key });
  }
}
