import { CacheVisibility } from '../../types';
import { MemoryObjectStore } from '../memory-store';
import { CacheControlAnalyser, ContentTypeAnalyser, buildCacheControl, inferContentType } from './headers';
import { createMockLogger, MockLogger } from '../../../tests/helpers/mockLogger';

describe('inferContentType', () => {
  it('should map known extensions', () => {
    expect(inferContentType('style.css')).toBe('text/css');
    expect(inferContentType('site/index.html')).toBe('text/html');
    expect(inferContentType('img/photo.JPG')).toBe('image/jpeg');
  });

  it('should return undefined without a usable extension', () => {
    expect(inferContentType('LICENSE')).toBeUndefined();
    expect(inferContentType('archive.notarealextension')).toBeUndefined();
  });
});

describe('buildCacheControl', () => {
  it('should build max-age directives', () => {
    expect(buildCacheControl(604800, CacheVisibility.Public)).toBe('public, max-age=604800');
    expect(buildCacheControl(0, CacheVisibility.Private)).toBe('private, max-age=0');
  });

  it('should use no-cache for a negative max-age', () => {
    expect(buildCacheControl(-1, CacheVisibility.Public)).toBe('public, no-cache');
  });
});

describe('ContentTypeAnalyser', () => {
  let store: MemoryObjectStore;
  let logger: MockLogger;
  let analyser: ContentTypeAnalyser;

  beforeEach(() => {
    store = new MemoryObjectStore();
    logger = createMockLogger();
    analyser = new ContentTypeAnalyser('Content Type', logger);
    analyser.start();
  });

  it('should rewrite a wrong Content-Type and keep the other headers', async () => {
    store.put('bkt', 'style.css', 'body {}', {
      headers: { contentType: 'text/plain', cacheControl: 'public, max-age=60', metadata: { owner: 'web' } },
    });

    await analyser.analyse(await store.fetch('bkt', 'style.css'), { store, dryRun: false });

    expect(analyser.getStats()).toEqual({ total: 1, problematic: 1, changed: 1 });
    expect(store.inspect('bkt', 'style.css')?.headers).toEqual({
      contentType: 'text/css',
      cacheControl: 'public, max-age=60',
      metadata: { owner: 'web' },
    });
    expect(logger.warn).toHaveBeenCalledWith('[Content Type] Changing contentType of "style.css" to "text/css"');
  });

  it('should only count problems in dry run', async () => {
    store.put('bkt', 'style.css', 'body {}', { headers: { contentType: 'text/plain' } });

    await analyser.analyse(await store.fetch('bkt', 'style.css'), { store, dryRun: true });

    expect(analyser.getStats()).toEqual({ total: 1, problematic: 1, changed: 0 });
    expect(store.mutations).toBe(0);
  });

  it('should accept objects whose type cannot be inferred', async () => {
    store.put('bkt', 'LICENSE', 'MIT');

    await analyser.analyse(await store.fetch('bkt', 'LICENSE'), { store, dryRun: false });

    expect(analyser.getStats()).toEqual({ total: 1, problematic: 0, changed: 0 });
  });

  it('should accept any live type when none can be inferred', async () => {
    store.put('bkt', 'Makefile', 'all:', { headers: { contentType: 'application/x-bogus' } });

    await analyser.analyse(await store.fetch('bkt', 'Makefile'), { store, dryRun: false });

    expect(analyser.getStats()).toEqual({ total: 1, problematic: 0, changed: 0 });
    expect(store.mutations).toBe(0);
    expect(store.inspect('bkt', 'Makefile')?.headers.contentType).toBe('application/x-bogus');
  });

  it('should leave redirects alone', async () => {
    store.put('bkt', 'old.html', '', { redirectLocation: '/new.html' });

    await analyser.analyse(await store.fetch('bkt', 'old.html'), { store, dryRun: false });

    expect(analyser.getStats()).toEqual({ total: 1, problematic: 1, changed: 0 });
    expect(store.mutations).toBe(0);
  });

  it('should summarise the scan', async () => {
    store.put('bkt', 'a.css', 'a', { headers: { contentType: 'text/css' } });
    store.put('bkt', 'b.css', 'b');
    expect(analyser.finish()).toEqual({ status: 'ok', message: 'GOOD: all 0 objects ok.' });

    await analyser.analyse(await store.fetch('bkt', 'a.css'), { store, dryRun: true });
    await analyser.analyse(await store.fetch('bkt', 'b.css'), { store, dryRun: true });
    expect(analyser.finish()).toEqual({
      status: 'problem',
      message: 'PROBLEM: 1 out of 2 objects are problematic (50.00%).',
    });

    analyser.start();
    await analyser.analyse(await store.fetch('bkt', 'a.css'), { store, dryRun: false });
    await analyser.analyse(await store.fetch('bkt', 'b.css'), { store, dryRun: false });
    expect(analyser.finish()).toEqual({
      status: 'changed',
      message: 'CHANGED: 1 out of 2 objects changed (50.00%).',
    });
  });
});

describe('CacheControlAnalyser', () => {
  it('should set the configured directive', async () => {
    const store = new MemoryObjectStore();
    const analyser = new CacheControlAnalyser('Images Caching', 3600, CacheVisibility.Private, createMockLogger());
    store.put('bkt', 'logo.png', 'png', { headers: { contentType: 'image/png' } });

    await analyser.analyse(await store.fetch('bkt', 'logo.png'), { store, dryRun: false });

    expect(analyser.cacheControl).toBe('private, max-age=3600');
    expect(store.inspect('bkt', 'logo.png')?.headers.cacheControl).toBe('private, max-age=3600');
    expect(store.inspect('bkt', 'logo.png')?.headers.contentType).toBe('image/png');
  });
});
