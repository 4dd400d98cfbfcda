/**
 * Duplicate Detector Tests
 */

import { InMemoryDeduplicator } from '../duplicate-detector';

describe('InMemoryDeduplicator', () => {
  const byId = (item: { id: string }) => item.id;

  it('should pass through items never seen', async () => {
    const dedup = new InMemoryDeduplicator(byId);

    const fresh = await dedup.filterFresh([{ id: 'a' }, { id: 'b' }]);

    expect(fresh.map(byId)).toEqual(['a', 'b']);
    expect(dedup.totalSeen()).toBe(2);
  });

  it('should drop items seen in an earlier batch', async () => {
    const dedup = new InMemoryDeduplicator(byId);

    const first = await dedup.filterFresh([{ id: 'a' }, { id: 'b' }]);
    const second = await dedup.filterFresh([{ id: 'b' }, { id: 'c' }]);

    expect(first.map(byId)).toEqual(['a', 'b']);
    expect(second.map(byId)).toEqual(['c']);
    expect(dedup.totalSeen()).toBe(3);
    expect(dedup.duplicatesDetected()).toBe(1);
  });

  it('should collapse duplicates within one batch to the first occurrence', () => {
    const dedup = new InMemoryDeduplicator((item: { id: string; v: number }) => item.id);

    const fresh = dedup.filterFreshSync([
      { id: 'x', v: 1 },
      { id: 'x', v: 2 },
      { id: 'y', v: 3 },
    ]);

    expect(fresh).toEqual([
      { id: 'x', v: 1 },
      { id: 'y', v: 3 },
    ]);
  });

  it('should hand each identifier to exactly one of many concurrent callers', async () => {
    const dedup = new InMemoryDeduplicator(byId);
    const batch = Array.from({ length: 50 }, (_, i) => ({ id: `repo-${i}` }));

    const results = await Promise.all(Array.from({ length: 10 }, () => dedup.filterFresh(batch)));

    const handedOut = results.flat().map(byId);
    expect(handedOut).toHaveLength(50);
    expect(new Set(handedOut).size).toBe(50);
    expect(dedup.totalSeen()).toBe(50);
  });

  it('should report membership by key', async () => {
    const dedup = new InMemoryDeduplicator(byId);
    await dedup.filterFresh([{ id: 'a' }]);

    expect(dedup.has('a')).toBe(true);
    expect(dedup.has('b')).toBe(false);
  });

  it('should treat an empty batch as a no-op', async () => {
    const dedup = new InMemoryDeduplicator(byId);

    expect(await dedup.filterFresh([])).toEqual([]);
    expect(dedup.totalSeen()).toBe(0);
  });
});
