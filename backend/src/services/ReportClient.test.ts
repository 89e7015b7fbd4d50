import { AxiosError } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import type { NodeConfig } from '../types/config';
import { buildPayload, ReportClient } from './ReportClient';

const node: NodeConfig = {
  nodeId: 'fin',
  masterUrl: 'http://master.test/api/v1/report',
  apiToken: 'test-secret',
  description: 'Office uplink',
};

const payload = buildPayload(
  node,
  { downloadMbps: 100, uploadMbps: 50, pingMs: 11.5, isp: 'Example Telecom' },
  new Date('2026-03-01T12:00:00Z'),
  'Linux 6.1 (x64)'
);

describe('buildPayload', () => {
  it('uses the wire field names', () => {
    expect(payload).toEqual({
      node_id: 'fin',
      timestamp: '2026-03-01T12:00:00.000Z',
      download_mbps: 100,
      upload_mbps: 50,
      ping_ms: 11.5,
      test_server: undefined,
      isp: 'Example Telecom',
      os_info: 'Linux 6.1 (x64)',
      description: 'Office uplink',
    });
  });
});

describe('ReportClient', () => {
  it('posts with a bearer token and reports acceptance', async () => {
    const post = vi.fn().mockResolvedValue({ status: 200, data: { status: 'ok' } });
    const client = new ReportClient(node, { post });

    await expect(client.send(payload)).resolves.toBe(true);
    expect(post).toHaveBeenCalledWith('http://master.test/api/v1/report', payload, {
      headers: { Authorization: 'Bearer test-secret' },
      validateStatus: expect.any(Function),
    });
  });

  it('returns false when the master rejects the report', async () => {
    const post = vi.fn().mockResolvedValue({ status: 401, data: { error: 'Unauthorized' } });
    await expect(new ReportClient(node, { post }).send(payload)).resolves.toBe(false);
  });

  it('returns false on network errors', async () => {
    const post = vi.fn().mockRejectedValue(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));
    await expect(new ReportClient(node, { post }).send(payload)).resolves.toBe(false);
  });
});
