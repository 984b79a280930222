import { MemoryObjectStore } from './memory-store';
import { StoreError } from './errors';

async function collect(store: MemoryObjectStore, bucket: string, prefix: string): Promise<string[]> {
  const keys: string[] = [];
  for await (const item of store.list(bucket, prefix)) {
    keys.push(item.key);
  }
  return keys;
}

describe('MemoryObjectStore', () => {
  let store: MemoryObjectStore;

  beforeEach(() => {
    store = new MemoryObjectStore();
  });

  it('should list sorted keys under a prefix', async () => {
    store.put('bkt', 'b/2.txt', 'two');
    store.put('bkt', 'b/1.txt', 'one');
    store.put('bkt', 'a/1.txt', 'one');

    expect(await collect(store, 'bkt', 'b/')).toEqual(['b/1.txt', 'b/2.txt']);
    expect(await collect(store, 'bkt', '')).toEqual(['a/1.txt', 'b/1.txt', 'b/2.txt']);
    expect(await collect(store, 'other', '')).toEqual([]);
  });

  it('should refuse writes through a stale handle', async () => {
    store.put('bkt', 'a.txt', 'hello', { headers: { contentType: 'text/plain' } });
    const handle = await store.fetch('bkt', 'a.txt');

    const updated = await store.rewriteHeaders(handle, { ...handle.headers, cacheControl: 'no-cache' });
    expect(updated.version).toBe('2');

    await expect(store.writeContent(handle, Buffer.from('bye'))).rejects.toMatchObject({
      name: 'StoreError',
      code: 'STORE_STALE_HANDLE',
    });
    await expect(store.writeContent(updated, Buffer.from('bye'))).resolves.toMatchObject({ version: '3' });
    expect(store.mutations).toBe(2);
  });

  it('should store gzip-encoded objects compressed and read them decoded', async () => {
    store.put('bkt', 'a.css', 'body { color: red }', { headers: { contentEncoding: 'gzip' } });
    const handle = await store.fetch('bkt', 'a.css');

    expect((await store.readContent(handle)).toString()).toBe('body { color: red }');
    const stored = store.inspect('bkt', 'a.css');
    expect(stored?.body[0]).toBe(0x1f);
    expect(stored?.body[1]).toBe(0x8b);
  });

  it('should report missing objects', async () => {
    await expect(store.fetch('bkt', 'missing')).rejects.toBeInstanceOf(StoreError);
    await expect(store.fetch('bkt', 'missing')).rejects.toMatchObject({ code: 'STORE_NOT_FOUND' });
  });

  it('should simulate failures', async () => {
    store.put('bkt', 'a.txt', 'a');
    store.put('bkt', 'b.txt', 'b');
    store.put('bkt', 'c.txt', 'c');
    store.failOn('a.txt', 'fetch');
    store.failListing('bkt', 2);

    await expect(store.fetch('bkt', 'a.txt')).rejects.toThrow('Simulated fetch failure for "a.txt"');
    await expect(collect(store, 'bkt', '')).rejects.toMatchObject({ code: 'STORE_LIST_FAILED' });
  });

  it('should tell redirects apart', async () => {
    store.put('bkt', 'old.html', '', { redirectLocation: '/new.html' });
    store.put('bkt', 'new.html', '<p>new</p>');

    expect(store.isRedirect(await store.fetch('bkt', 'old.html'))).toBe(true);
    expect(store.isRedirect(await store.fetch('bkt', 'new.html'))).toBe(false);
  });
});
