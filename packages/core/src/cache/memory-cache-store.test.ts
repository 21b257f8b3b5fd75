/**
 * Memory Cache Store Tests
 */
import { describe, it, expect } from 'vitest';
import { MemoryCacheStore } from './memory-cache-store.js';
import { createMemorySnapshot, readContent } from './snapshot.js';

describe('MemoryCacheStore', () => {
  it('should return undefined for an unknown key', async () => {
    expect(await new MemoryCacheStore().get('Linux-t1')).toBeUndefined();
  });

  it('should return the last snapshot put under a key', async () => {
    const store = new MemoryCacheStore();
    const first = createMemorySnapshot([{ path: 'a', content: Buffer.from('1'), mode: 0o644 }]);
    const second = createMemorySnapshot([{ path: 'a', content: Buffer.from('2'), mode: 0o644 }]);

    await store.put('Linux-t1', first);
    await store.put('Linux-t1', second);

    const entry = await store.get('Linux-t1');
    expect(entry?.key).toBe('Linux-t1');
    expect(entry?.snapshot.digest).toBe(second.digest);
    expect(store.size).toBe(1);
    expect(store.keys()).toEqual(['Linux-t1']);
  });

  it('should keep its own copy of the contents', async () => {
    const store = new MemoryCacheStore();
    await store.put('Linux-t1', createMemorySnapshot([{ path: 'debug/app', content: Buffer.from('binary'), mode: 0o755 }]));

    const entry = await store.get('Linux-t1');
    const content = entry ? await readContent(entry.snapshot.openFile('debug/app')) : undefined;
    expect(content?.toString()).toBe('binary');
  });

  it('should not match keys by prefix', async () => {
    const store = new MemoryCacheStore();
    await store.put('Linux-t1', createMemorySnapshot([]));

    expect(await store.get('Linux-t')).toBeUndefined();
  });
});
