import type { NodeMetaConfig } from '../types/config';
import type { AggregatedView, DerivedStatus, NodeMeta, NodeView, Thresholds } from '../types/report';
import type { NodeStateSnapshot } from './NodeStateStore';
import { classify, clusterStatus, isBelow } from './StatusClassifier';

export const FALLBACK_FLAG = '🛰️';

export interface AggregatorOptions {
  nodes: NodeMetaConfig[];
  thresholds: Thresholds;
  stalenessMinutes: number;
}

/**
 * Turns a state snapshot into the view every digest is rendered from.
 *
 * Configured nodes come first in configured order, whether or not they have
 * ever reported. Nodes that report without being configured follow,
 * alphabetically, under their raw id.
 */
export class DataAggregator {
  private metas: Map<string, NodeMeta> = new Map();

  constructor(private readonly options: AggregatorOptions) {
    options.nodes.forEach((node, index) => {
      this.metas.set(node.id, {
        nodeId: node.id,
        flag: node.flag || FALLBACK_FLAG,
        displayName: node.displayName || node.id,
        orderRank: index,
        location: node.location,
        description: node.description,
      });
    });
  }

  public buildView(snapshot: NodeStateSnapshot, now: Date = snapshot.takenAt): AggregatedView {
    const configured = [...this.metas.values()].sort((a, b) => a.orderRank - b.orderRank);
    const extras = [...snapshot.reports.keys()]
      .filter((nodeId) => !this.metas.has(nodeId))
      .sort()
      .map(
        (nodeId, index): NodeMeta => ({
          nodeId,
          flag: FALLBACK_FLAG,
          displayName: nodeId,
          orderRank: configured.length + index,
        })
      );

    const nodes = [...configured, ...extras].map((meta) => this.buildNodeView(meta, snapshot, now));
    const summary: Record<DerivedStatus, number> = { ok: 0, degraded: 0, offline: 0 };
    for (const node of nodes) {
      summary[node.derivedStatus]++;
    }

    return {
      generatedAt: now,
      nodes,
      clusterStatus: clusterStatus(nodes.map((node) => ({ tier: node.tier, stale: node.freshness !== 'fresh' }))),
      summary,
    };
  }

  private buildNodeView(meta: NodeMeta, snapshot: NodeStateSnapshot, now: Date): NodeView {
    const report = snapshot.reports.get(meta.nodeId);
    if (!report) {
      const error = snapshot.failures?.get(meta.nodeId);
      return error === undefined
        ? { meta, freshness: 'unknown', derivedStatus: 'offline' }
        : { meta, freshness: 'unknown', derivedStatus: 'offline', error };
    }

    const ageMs = Math.max(0, now.getTime() - report.receivedAt.getTime());
    const ageMinutes = Math.floor(ageMs / 60_000);
    if (ageMs > this.options.stalenessMinutes * 60_000) {
      return { meta, report, freshness: 'stale', derivedStatus: 'offline', ageMinutes };
    }

    const tier = classify(report.downloadMbps, report.uploadMbps, report.pingMs, this.options.thresholds);
    return {
      meta,
      report,
      freshness: 'fresh',
      tier,
      derivedStatus: isBelow(tier, 'low') ? 'degraded' : 'ok',
      ageMinutes,
    };
  }
}
