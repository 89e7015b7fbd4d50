import { describe, expect, it } from 'vitest';
import type { SpeedReport } from '../types/report';
import { DataAggregator, FALLBACK_FLAG } from './DataAggregator';
import type { NodeStateSnapshot } from './NodeStateStore';

const now = new Date('2026-03-01T12:00:00Z');

function minutesAgo(minutes: number): Date {
  return new Date(now.getTime() - minutes * 60_000);
}

function snapshotOf(...reports: SpeedReport[]): NodeStateSnapshot {
  return { takenAt: now, reports: new Map(reports.map((report) => [report.nodeId, report])) };
}

function aggregator() {
  return new DataAggregator({
    nodes: [
      { id: 'fin', flag: '🇫🇮', displayName: 'Helsinki' },
      { id: 'lv', flag: '🇱🇻', displayName: 'Riga' },
      { id: 'de' },
    ],
    thresholds: { very_low: 50, low: 200, medium: 500, good: 1000 },
    stalenessMinutes: 120,
  });
}

describe('DataAggregator', () => {
  it('lists configured nodes in configured order, then unconfigured ones by id', () => {
    const view = aggregator().buildView(
      snapshotOf(
        { nodeId: 'zz', downloadMbps: 300, uploadMbps: 10, pingMs: 5, receivedAt: minutesAgo(1) },
        { nodeId: 'aa', downloadMbps: 300, uploadMbps: 10, pingMs: 5, receivedAt: minutesAgo(1) },
        { nodeId: 'lv', downloadMbps: 300, uploadMbps: 10, pingMs: 5, receivedAt: minutesAgo(1) }
      )
    );

    expect(view.nodes.map((node) => node.meta.nodeId)).toEqual(['fin', 'lv', 'de', 'aa', 'zz']);
    expect(view.nodes[3].meta).toEqual({ nodeId: 'aa', flag: FALLBACK_FLAG, displayName: 'aa', orderRank: 3 });
  });

  it('falls back to the id and default flag for bare node entries', () => {
    const view = aggregator().buildView(snapshotOf());
    expect(view.nodes[2].meta.flag).toBe(FALLBACK_FLAG);
    expect(view.nodes[2].meta.displayName).toBe('de');
  });

  it('marks nodes that never reported as unknown and offline', () => {
    const view = aggregator().buildView(snapshotOf());

    expect(view.nodes.every((node) => node.freshness === 'unknown' && node.derivedStatus === 'offline')).toBe(true);
    expect(view.summary).toEqual({ ok: 0, degraded: 0, offline: 3 });
    expect(view.clusterStatus).toBe('degraded');
  });

  it('carries a recorded measurement failure onto a node without a report', () => {
    const view = aggregator().buildView({ ...snapshotOf(), failures: new Map([['lv', 'timeout']]) });

    expect(view.nodes[1]).toMatchObject({ freshness: 'unknown', derivedStatus: 'offline', error: 'timeout' });
    expect(view.nodes[0].error).toBeUndefined();
  });

  it('classifies fresh nodes and flags those under low as degraded', () => {
    const view = aggregator().buildView(
      snapshotOf(
        { nodeId: 'fin', downloadMbps: 120.4, uploadMbps: 80, pingMs: 12, receivedAt: minutesAgo(5) },
        { nodeId: 'lv', downloadMbps: 640, uploadMbps: 300, pingMs: 8, receivedAt: minutesAgo(0) }
      )
    );

    const [fin, lv, de] = view.nodes;
    expect(fin).toMatchObject({ freshness: 'fresh', tier: 'very_low', derivedStatus: 'degraded', ageMinutes: 5 });
    expect(lv).toMatchObject({ freshness: 'fresh', tier: 'medium', derivedStatus: 'ok', ageMinutes: 0 });
    expect(de.freshness).toBe('unknown');
    expect(view.summary).toEqual({ ok: 1, degraded: 1, offline: 1 });
  });

  it('keeps the last report of a stale node but drops its tier', () => {
    const report: SpeedReport = {
      nodeId: 'fin',
      downloadMbps: 700,
      uploadMbps: 300,
      pingMs: 9,
      receivedAt: minutesAgo(121),
    };
    const view = aggregator().buildView(snapshotOf(report));

    expect(view.nodes[0]).toMatchObject({ freshness: 'stale', derivedStatus: 'offline', ageMinutes: 121 });
    expect(view.nodes[0].report).toBe(report);
    expect(view.nodes[0].tier).toBeUndefined();
  });

  it('treats a report exactly at the staleness limit as fresh', () => {
    const view = aggregator().buildView(
      snapshotOf({ nodeId: 'fin', downloadMbps: 700, uploadMbps: 300, pingMs: 9, receivedAt: minutesAgo(120) })
    );
    expect(view.nodes[0].freshness).toBe('fresh');
  });

  it('is ok only when every node is fresh and at least low', () => {
    const agg = new DataAggregator({
      nodes: [{ id: 'fin' }],
      thresholds: { very_low: 50, low: 200, medium: 500, good: 1000 },
      stalenessMinutes: 120,
    });
    const view = agg.buildView(
      snapshotOf({ nodeId: 'fin', downloadMbps: 250, uploadMbps: 100, pingMs: 9, receivedAt: minutesAgo(3) })
    );
    expect(view.clusterStatus).toBe('ok');
    expect(view.generatedAt).toBe(now);
  });
});
