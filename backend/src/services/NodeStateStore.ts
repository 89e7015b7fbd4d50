import { EventEmitter } from 'events';
import type { SpeedReport } from '../types/report';
import { log } from '../utils/logger';
import { FALLBACK_FLAG } from './DataAggregator';

export interface NodeStateSnapshot {
  takenAt: Date;
  reports: ReadonlyMap<string, SpeedReport>;
  /** Nodes whose latest measurement failed, with the reason */
  failures?: ReadonlyMap<string, string>;
}

/**
 * Latest-report-per-node state. put() replaces a node's record as a whole;
 * snapshot() returns a point-in-time copy that later puts cannot touch.
 */
export interface NodeStateStore {
  get(nodeId: string): SpeedReport | undefined;
  put(report: SpeedReport): void;
  snapshot(): NodeStateSnapshot;
  size(): number;
  on(event: 'reportRecorded', listener: (report: SpeedReport) => void): this;
  off(event: 'reportRecorded', listener: (report: SpeedReport) => void): this;
}

/**
 * Map owned by the event loop. Each put is a single synchronous Map.set of a
 * frozen record, so two submissions for the same node can only ever leave one
 * of them in place, and a snapshot never observes a partial write.
 */
export class InMemoryNodeStateStore extends EventEmitter implements NodeStateStore {
  private reports: Map<string, SpeedReport> = new Map();
  private failures: Map<string, string> = new Map();
  private knownNodes: Set<string>;
  private warnedUnknown: Set<string> = new Set();

  constructor(knownNodeIds: Iterable<string> = []) {
    super();
    this.knownNodes = new Set(knownNodeIds);
  }

  public get(nodeId: string): SpeedReport | undefined {
    return this.reports.get(nodeId);
  }

  public put(report: SpeedReport): void {
    const frozen = Object.isFrozen(report) ? report : Object.freeze({ ...report });

    if (this.knownNodes.size > 0 && !this.knownNodes.has(frozen.nodeId) && !this.warnedUnknown.has(frozen.nodeId)) {
      this.warnedUnknown.add(frozen.nodeId);
      log.warn(
        `Report from unconfigured node "${frozen.nodeId}". Add it to master.nodes, e.g. ` +
          `{ "id": "${frozen.nodeId}", "flag": "${FALLBACK_FLAG}", "displayName": "Node ${frozen.nodeId}" }`,
        'NodeStateStore'
      );
    }

    this.failures.delete(frozen.nodeId);
    this.reports.set(frozen.nodeId, frozen);
    this.emit('reportRecorded', frozen);
  }

  /** A failed local measurement; cleared by the node's next put() */
  public recordFailure(nodeId: string, error: string): void {
    this.failures.set(nodeId, error);
  }

  public snapshot(): NodeStateSnapshot {
    return {
      takenAt: new Date(),
      reports: new Map(this.reports),
      failures: new Map(this.failures),
    };
  }

  public size(): number {
    return this.reports.size;
  }

  public cleanup(): void {
    this.removeAllListeners();
    this.reports.clear();
    this.failures.clear();
  }
}
