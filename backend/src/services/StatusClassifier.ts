import { TIERS, type ClusterStatus, type Thresholds, type Tier } from '../types/report';

/**
 * Pick the highest tier whose lower bound the download speed meets.
 * Speeds under every bound clamp to the weakest tier. Upload and ping
 * are carried for display only and never move the tier.
 */
export function classify(download: number, _upload: number, _ping: number, thresholds: Thresholds): Tier {
  let tier: Tier = TIERS[0];
  for (const candidate of TIERS) {
    const bound = thresholds[candidate];
    if (bound !== undefined && download >= bound) {
      tier = candidate;
    }
  }
  return tier;
}

export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

export function isBelow(tier: Tier, floor: Tier): boolean {
  return tierRank(tier) < tierRank(floor);
}

export interface ClusterEntry {
  tier?: Tier;
  stale: boolean;
}

/**
 * Any stale node or any node under the "low" tier degrades the whole cluster.
 */
export function clusterStatus(entries: Iterable<ClusterEntry>): ClusterStatus {
  for (const entry of entries) {
    if (entry.stale || entry.tier === undefined || isBelow(entry.tier, 'low')) {
      return 'degraded';
    }
  }
  return 'ok';
}
