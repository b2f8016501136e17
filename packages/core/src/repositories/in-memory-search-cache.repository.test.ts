import { describe, it, expect, vi, afterEach } from 'vitest';
import { createInMemorySearchCacheRepository } from './in-memory-search-cache.repository.js';

const source = { title: 'Sky Color', url: 'https://example.com/sky', snippet: 'The sky is blue.' };

describe('InMemorySearchCacheRepository', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return null for a cache miss', async () => {
    const repo = createInMemorySearchCacheRepository();
    expect(await repo.get('some query')).toBeNull();
  });

  it('should cache and retrieve a result', async () => {
    const repo = createInMemorySearchCacheRepository();
    await repo.set('sky color', { content: 'The sky is blue.', sources: [source] });

    const result = await repo.get('sky color');
    expect(result?.content).toBe('The sky is blue.');
    expect(result?.sources).toEqual([source]);
    expect(result?.query).toBe('sky color');
    expect(result?.cachedAt).toBeInstanceOf(Date);
    expect(result?.expiresAt).toBeInstanceOf(Date);
  });

  it('should normalize queries (case-insensitive, trimmed)', async () => {
    const repo = createInMemorySearchCacheRepository();
    await repo.set('  Sky Color  ', { content: 'result', sources: [] });

    const result = await repo.get('sky color');
    expect(result?.content).toBe('result');
  });

  it('should expire entries after the default TTL of seven days', async () => {
    const repo = createInMemorySearchCacheRepository();
    const now = Date.now();
    await repo.set('sky color', { content: 'old result', sources: [] });

    vi.spyOn(Date, 'now').mockReturnValue(now + 7 * 24 * 60 * 60 * 1000 + 3600000);

    expect(await repo.get('sky color')).toBeNull();
  });

  it('should honour a custom TTL', async () => {
    const repo = createInMemorySearchCacheRepository({ ttlMs: 1000 });
    const now = Date.now();
    vi.spyOn(Date, 'now').mockReturnValue(now);
    await repo.set('sky color', { content: 'fresh', sources: [] });

    vi.spyOn(Date, 'now').mockReturnValue(now + 500);
    expect((await repo.get('sky color'))?.content).toBe('fresh');

    vi.spyOn(Date, 'now').mockReturnValue(now + 1500);
    expect(await repo.get('sky color')).toBeNull();
  });

  it('should overwrite existing entries', async () => {
    const repo = createInMemorySearchCacheRepository();
    await repo.set('sky color', { content: 'first', sources: [] });
    await repo.set('sky color', { content: 'second', sources: [source] });

    const result = await repo.get('sky color');
    expect(result?.content).toBe('second');
    expect(result?.sources).toEqual([source]);
  });
});
