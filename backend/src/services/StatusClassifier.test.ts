import { describe, expect, it } from 'vitest';
import type { Thresholds } from '../types/report';
import { classify, clusterStatus, isBelow, tierRank } from './StatusClassifier';

const thresholds: Thresholds = { very_low: 50, low: 200, medium: 500, good: 1000 };

describe('classify', () => {
  it('clamps a download under the low bound to very_low', () => {
    expect(classify(120.4, 80, 12, thresholds)).toBe('very_low');
  });

  it('clamps speeds below every bound to very_low', () => {
    expect(classify(0, 0, 0, thresholds)).toBe('very_low');
    expect(classify(49.9, 10, 5, thresholds)).toBe('very_low');
  });

  it('treats a bound as inclusive', () => {
    expect(classify(200, 0, 0, thresholds)).toBe('low');
    expect(classify(500, 0, 0, thresholds)).toBe('medium');
    expect(classify(1000, 0, 0, thresholds)).toBe('good');
  });

  it('never reaches excellent without a configured bound', () => {
    expect(classify(10_000, 0, 0, thresholds)).toBe('good');
    expect(classify(10_000, 0, 0, { ...thresholds, excellent: 2000 })).toBe('excellent');
    expect(classify(1999, 0, 0, { ...thresholds, excellent: 2000 })).toBe('good');
  });

  it('ignores upload and ping', () => {
    expect(classify(600, 1, 900, thresholds)).toBe(classify(600, 900, 1, thresholds));
  });

  it('is monotonic in download', () => {
    let previous = -1;
    for (let download = 0; download <= 3000; download += 7.5) {
      const rank = tierRank(classify(download, 0, 0, { ...thresholds, excellent: 2000 }));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});

describe('isBelow', () => {
  it('orders tiers weakest first', () => {
    expect(isBelow('very_low', 'low')).toBe(true);
    expect(isBelow('low', 'low')).toBe(false);
    expect(isBelow('excellent', 'good')).toBe(false);
  });
});

describe('clusterStatus', () => {
  it('is ok for an empty set', () => {
    expect(clusterStatus([])).toBe('ok');
  });

  it('is ok when every node is fresh and at least low', () => {
    expect(clusterStatus([{ tier: 'low', stale: false }, { tier: 'good', stale: false }])).toBe('ok');
  });

  it('degrades on a stale node', () => {
    expect(clusterStatus([{ tier: 'good', stale: false }, { stale: true }])).toBe('degraded');
  });

  it('degrades on a node under low', () => {
    expect(clusterStatus([{ tier: 'good', stale: false }, { tier: 'very_low', stale: false }])).toBe('degraded');
  });

  it('does not depend on input order', () => {
    const entries = [
      { tier: 'very_low' as const, stale: false },
      { tier: 'good' as const, stale: false },
    ];
    expect(clusterStatus(entries)).toBe(clusterStatus([...entries].reverse()));
  });
});
