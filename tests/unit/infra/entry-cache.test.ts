import { describe, it, expect } from 'vitest';
import { InMemoryEntryCache } from '../../../src/infra/memory/entry-cache/index.js';

const DIR = 'burrow:///srv/';

describe('InMemoryEntryCache', () => {
  it('assigns ids in listing order', () => {
    const cache = new InMemoryEntryCache();
    const stored = cache.storeListing(DIR, [
      { name: 'b', type: 'file' },
      { name: 'a', type: 'directory' },
    ]);
    expect(stored).toEqual([
      { name: 'b', type: 'file', id: '1' },
      { name: 'a', type: 'directory', id: '2' },
    ]);
    expect(cache.getEntryById('2')).toEqual({ name: 'a', type: 'directory', id: '2' });
  });

  it('keeps ids of entries that survive a relisting', () => {
    const cache = new InMemoryEntryCache();
    cache.storeListing(DIR, [
      { name: 'a', type: 'file' },
      { name: 'b', type: 'file' },
    ]);
    cache.storeListing(DIR, [
      { name: 'b', type: 'file' },
      { name: 'c', type: 'file' },
    ]);

    expect(cache.listUrl(DIR).get('b')?.id).toBe('2');
    expect(cache.listUrl(DIR).get('c')?.id).toBe('3');
    expect(cache.getEntryById('1')).toBeUndefined();
  });

  it('shares one id counter across directories', () => {
    const cache = new InMemoryEntryCache();
    cache.storeListing(DIR, [{ name: 'a', type: 'file' }]);
    const [other] = cache.storeListing('burrow:///tmp/', [{ name: 'a', type: 'file' }]);
    expect(other?.id).toBe('2');
  });

  it('is empty for directories never listed or cleared', () => {
    const cache = new InMemoryEntryCache();
    expect(cache.listUrl(DIR).size).toBe(0);

    cache.storeListing(DIR, [{ name: 'a', type: 'file' }]);
    cache.clear(DIR);

    expect(cache.listUrl(DIR).size).toBe(0);
    expect(cache.getEntryById('1')).toBeUndefined();
  });
});
