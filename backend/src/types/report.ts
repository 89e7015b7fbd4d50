/**
 * Report and aggregation types shared by the ingestor, aggregator,
 * scheduler and renderer.
 */

/** Discrete status tiers, weakest first. */
export const TIERS = ['very_low', 'low', 'medium', 'good', 'excellent'] as const;
export type Tier = (typeof TIERS)[number];

/** Download lower bounds (Mbps) per tier; excellent is only reached when configured. */
export interface Thresholds {
  very_low: number;
  low: number;
  medium: number;
  good: number;
  excellent?: number;
}

export type ClusterStatus = 'ok' | 'degraded';

export type DerivedStatus = 'ok' | 'degraded' | 'offline';

/**
 * Latest measurement from one node. Frozen once created; a newer
 * arrival replaces it as a whole.
 */
export interface SpeedReport {
  readonly nodeId: string;
  readonly downloadMbps: number;
  readonly uploadMbps: number;
  readonly pingMs: number;
  readonly isp?: string;
  readonly location?: string;
  readonly osInfo?: string;
  readonly testServer?: string;
  readonly description?: string;
  /** Timestamp claimed by the node; informational only */
  readonly reportedAt?: Date;
  /** Master wall clock at ingestion; drives staleness */
  readonly receivedAt: Date;
}

export interface NodeMeta {
  nodeId: string;
  flag: string;
  displayName: string;
  orderRank: number;
  location?: string;
  description?: string;
}

export type NodeFreshness = 'fresh' | 'stale' | 'unknown';

export interface NodeView {
  meta: NodeMeta;
  /** Last report, retained even when stale */
  report?: SpeedReport;
  freshness: NodeFreshness;
  /** Only set for fresh nodes */
  tier?: Tier;
  derivedStatus: DerivedStatus;
  /** Whole minutes since the last arrival */
  ageMinutes?: number;
  /** Why the latest measurement produced no report */
  error?: string;
}

export interface AggregatedView {
  generatedAt: Date;
  nodes: NodeView[];
  clusterStatus: ClusterStatus;
  summary: Record<DerivedStatus, number>;
}
