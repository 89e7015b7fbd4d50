import { DataAggregator } from '../services/DataAggregator';
import { DigestService, type DigestRunResult } from '../services/DigestService';
import { InMemoryNodeStateStore } from '../services/NodeStateStore';
import { DefaultsResolver, InMemoryPreferenceStore, type PreferenceStore } from '../services/PreferenceStore';
import { describeHost } from '../services/ReportClient';
import { SpeedtestRunner, type SpeedtestResult } from '../services/SpeedtestRunner';
import { classify, isBelow } from '../services/StatusClassifier';
import { TelegramClient, type MessageDispatcher } from '../services/TelegramClient';
import type { AppConfig } from '../types/config';
import type { Tier } from '../types/report';
import { log } from '../utils/logger';

// A just-measured report is never stale within one run
const SINGLE_STALENESS_MINUTES = 60;

export interface SingleDeps {
  runner?: { run(): Promise<SpeedtestResult> };
  dispatcher?: MessageDispatcher;
  preferences?: PreferenceStore;
  now?: () => Date;
}

/**
 * Whether a single-mode run should message anyone: always when configured,
 * otherwise only for failed runs and tiers below "low".
 */
export function shouldNotify(sendAlways: boolean, tier: Tier | undefined): boolean {
  if (sendAlways) return true;
  return tier === undefined || isBelow(tier, 'low');
}

/**
 * Measure locally and report straight to the recipients, no master involved.
 * Resolves null when the result was not worth sending.
 */
export async function runSingle(config: AppConfig, deps: SingleDeps = {}): Promise<DigestRunResult | null> {
  const { nodeId, sendAlways, displayName, location, description } = config.single;
  const now = deps.now ?? (() => new Date());
  const runner = deps.runner ?? new SpeedtestRunner(config.speedtest);

  const store = new InMemoryNodeStateStore([nodeId]);
  const aggregator = new DataAggregator({
    nodes: [{ id: nodeId, displayName, location, description }],
    thresholds: config.thresholds,
    stalenessMinutes: SINGLE_STALENESS_MINUTES,
  });

  const result = await runner.run();
  let tier: Tier | undefined;
  if (result.success) {
    const { measurement } = result;
    const measuredAt = now();
    store.put({
      nodeId,
      downloadMbps: measurement.downloadMbps,
      uploadMbps: measurement.uploadMbps,
      pingMs: measurement.pingMs,
      testServer: measurement.testServer,
      isp: measurement.isp,
      location,
      description,
      osInfo: describeHost(),
      reportedAt: measuredAt,
      receivedAt: measuredAt,
    });
    tier = classify(measurement.downloadMbps, measurement.uploadMbps, measurement.pingMs, config.thresholds);
  } else {
    log.error(`Speedtest failed: ${result.error}`, 'single');
    store.recordFailure(nodeId, result.error);
  }

  if (!shouldNotify(sendAlways, tier)) {
    log.info(`Speed is ${tier ?? 'unknown'}, nothing to send`, 'single');
    return null;
  }

  const digests = new DigestService({
    store,
    aggregator,
    preferences: deps.preferences ?? new InMemoryPreferenceStore(new DefaultsResolver(config.recipients)),
    dispatcher: deps.dispatcher ?? new TelegramClient({ botToken: config.telegram.botToken }),
    recipients: config.recipients.map((recipient) => recipient.id),
    now,
  });
  return digests.buildAndDispatch('single');
}
