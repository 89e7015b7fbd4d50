import * as crypto from 'crypto';
import { AuthenticationError, ValidationError } from '../errors';
import type { SpeedReport } from '../types/report';
import { log } from '../utils/logger';
import type { NodeStateStore } from './NodeStateStore';

export interface IngestResult {
  nodeId: string;
  receivedAt: Date;
}

const MEASUREMENT_FIELDS = ['download_mbps', 'upload_mbps', 'ping_ms'] as const;
const TEXT_FIELDS = ['isp', 'location', 'os_info', 'test_server', 'description'] as const;
const MAX_TEXT_LENGTH = 256;

/**
 * Constant-time token check. Both sides are hashed first so the comparison
 * does not leak the configured token's length either.
 */
export function tokensMatch(presented: string | undefined, expected: string): boolean {
  if (presented === undefined) return false;
  const a = crypto.createHash('sha256').update(presented).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readMeasurement(body: Record<string, unknown>, field: (typeof MEASUREMENT_FIELDS)[number]): number {
  const value = body[field];
  if (value === undefined || value === null) {
    throw new ValidationError(`missing required field: ${field}`);
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number`);
  }
  if (value < 0) {
    throw new ValidationError(`${field} must not be negative`);
  }
  return value;
}

function readText(body: Record<string, unknown>, field: (typeof TEXT_FIELDS)[number]): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  // Cut by code point so an emoji at the limit is never split in half
  return trimmed ? Array.from(trimmed).slice(0, MAX_TEXT_LENGTH).join('') : undefined;
}

function readTimestamp(body: Record<string, unknown>): Date | undefined {
  const value = body.timestamp;
  if (value === undefined || value === null) return undefined;
  const parsed = typeof value === 'string' ? new Date(value) : undefined;
  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new ValidationError('timestamp must be an ISO 8601 string');
  }
  return parsed;
}

/**
 * Validates a submitted report and records it against server time.
 * Check order: token, node_id, measurements, optional fields.
 */
export function parseReport(body: unknown, receivedAt: Date): SpeedReport {
  if (!isRecord(body)) {
    throw new ValidationError('body must be a JSON object');
  }

  const nodeId = typeof body.node_id === 'string' ? body.node_id.trim() : '';
  if (!nodeId) {
    throw new ValidationError('node_id must be a non-empty string');
  }

  const [downloadMbps, uploadMbps, pingMs] = MEASUREMENT_FIELDS.map((field) => readMeasurement(body, field));

  return Object.freeze({
    nodeId,
    downloadMbps,
    uploadMbps,
    pingMs,
    isp: readText(body, 'isp'),
    location: readText(body, 'location'),
    osInfo: readText(body, 'os_info'),
    testServer: readText(body, 'test_server'),
    description: readText(body, 'description'),
    reportedAt: readTimestamp(body),
    receivedAt,
  });
}

export class ReportIngestor {
  constructor(
    private readonly store: NodeStateStore,
    private readonly apiToken: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  public authorizes(token: string | undefined): boolean {
    return tokensMatch(token, this.apiToken);
  }

  public ingest(token: string | undefined, body: unknown): IngestResult {
    if (!this.authorizes(token)) {
      throw new AuthenticationError();
    }

    const report = parseReport(body, this.now());
    this.store.put(report);

    log.info(
      `Report recorded for node "${report.nodeId}": ${report.downloadMbps.toFixed(1)}/${report.uploadMbps.toFixed(1)} Mbps, ${report.pingMs.toFixed(1)} ms`,
      'ReportIngestor'
    );
    return { nodeId: report.nodeId, receivedAt: report.receivedAt };
  }
}
