import { ConfigurationError } from '../errors';
import { buildPayload, ReportClient } from '../services/ReportClient';
import { SpeedtestRunner, type SpeedtestResult } from '../services/SpeedtestRunner';
import type { AppConfig } from '../types/config';
import { log } from '../utils/logger';

export interface NodeDeps {
  runner?: { run(): Promise<SpeedtestResult> };
  client?: Pick<ReportClient, 'send'>;
  now?: () => Date;
}

/**
 * One measurement, one report. Resolves true only when the master accepted it.
 */
export async function runNode(config: AppConfig, deps: NodeDeps = {}): Promise<boolean> {
  const node = config.node;
  if (!node) {
    throw new ConfigurationError('node section missing for node mode');
  }

  const runner = deps.runner ?? new SpeedtestRunner(config.speedtest);
  const client = deps.client ?? new ReportClient(node);
  const now = deps.now ?? (() => new Date());

  log.info(`Node "${node.nodeId}" measuring, master at ${node.masterUrl}`, 'node');
  const result = await runner.run();
  if (!result.success) {
    log.error(`No report sent: ${result.error}`, 'node');
    return false;
  }

  return client.send(buildPayload(node, result.measurement, now()));
}
