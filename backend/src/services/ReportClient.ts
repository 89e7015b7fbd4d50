import axios from 'axios';
import * as os from 'os';
import type { NodeConfig } from '../types/config';
import type { HttpPoster } from './TelegramClient';
import { log } from '../utils/logger';
import type { SpeedtestMeasurement } from './SpeedtestRunner';

const REQUEST_TIMEOUT_MS = 30_000;

/** Wire body accepted by POST /api/v1/report */
export interface ReportPayload {
  node_id: string;
  timestamp: string;
  download_mbps: number;
  upload_mbps: number;
  ping_ms: number;
  test_server?: string;
  isp?: string;
  os_info?: string;
  description?: string;
}

export function describeHost(): string {
  return `${os.type()} ${os.release()} (${os.arch()})`;
}

export function buildPayload(
  node: NodeConfig,
  measurement: SpeedtestMeasurement,
  takenAt: Date = new Date(),
  osInfo: string = describeHost()
): ReportPayload {
  return {
    node_id: node.nodeId,
    timestamp: takenAt.toISOString(),
    download_mbps: measurement.downloadMbps,
    upload_mbps: measurement.uploadMbps,
    ping_ms: measurement.pingMs,
    test_server: measurement.testServer,
    isp: measurement.isp,
    os_info: osInfo,
    description: node.description,
  };
}

/**
 * Sends one node's measurement to the master
 */
export class ReportClient {
  private http: HttpPoster;

  constructor(
    private readonly node: NodeConfig,
    http?: HttpPoster
  ) {
    this.http = http ?? axios.create({ timeout: REQUEST_TIMEOUT_MS });
  }

  /** True when the master accepted the report; failures are logged, not thrown */
  public async send(payload: ReportPayload): Promise<boolean> {
    try {
      const response = await this.http.post(this.node.masterUrl, payload, {
        headers: { Authorization: `Bearer ${this.node.apiToken}` },
        validateStatus: () => true,
      });
      if (response.status === 200) {
        log.info(`Report for ${payload.node_id} accepted by master`, 'ReportClient');
        return true;
      }
      log.error(
        `Master rejected report for ${payload.node_id}: HTTP ${response.status} ${JSON.stringify(response.data)}`,
        'ReportClient'
      );
      return false;
    } catch (error) {
      log.error(`Error sending report to ${this.node.masterUrl}:`, 'ReportClient', error);
      return false;
    }
  }
}
