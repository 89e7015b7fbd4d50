import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { loadConfig, parseConfig } from './appConfig';

function masterRaw(master: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    mode: 'master',
    telegram: { botToken: 'test-bot-token' },
    recipients: [{ id: '100' }],
    master: {
      apiToken: 'test-secret',
      databaseUrl: 'postgres://localhost/speedwatch_test',
      nodes: [{ id: 'fin', flag: '🇫🇮', displayName: 'Helsinki' }],
      ...master,
    },
  };
}

describe('parseConfig', () => {
  it('fills master defaults', () => {
    const config = parseConfig(masterRaw({ schedule: {} }), {});

    expect(config.mode).toBe('master');
    expect(config.thresholds).toEqual({ very_low: 50, low: 200, medium: 500, good: 1000 });
    expect(config.master).toEqual({
      listenHost: '0.0.0.0',
      port: 8080,
      apiToken: 'test-secret',
      stalenessMinutes: 120,
      nodes: [{ id: 'fin', flag: '🇫🇮', displayName: 'Helsinki' }],
      schedule: { intervalMinutes: 60, sendImmediately: false },
      databaseUrl: 'postgres://localhost/speedwatch_test',
    });
    expect(config.recipients).toEqual([{ id: '100', defaultLanguage: 'en', defaultViewMode: 'compact' }]);
    expect(config.speedtest).toEqual({ timeoutSeconds: 60, retryCount: 3, retryDelaySeconds: 5 });
    expect(config.single).toEqual({ sendAlways: false, nodeId: 'local' });
  });

  it('sends on every update when the schedule section is absent', () => {
    const config = parseConfig(masterRaw({ aggregationIntervalMinutes: 30 }), {});
    expect(config.master?.schedule).toEqual({ intervalMinutes: 30, sendImmediately: true });
  });

  it('lets environment variables override the file', () => {
    const config = parseConfig(masterRaw(), {
      PORT: '9090',
      LISTEN_HOST: '127.0.0.1',
      API_TOKEN: 'env-secret',
      TELEGRAM_BOT_TOKEN: 'env-bot-token',
      DATABASE_URL: 'postgres://db/env',
      LOG_LEVEL: 'debug',
    });

    expect(config.master?.port).toBe(9090);
    expect(config.master?.listenHost).toBe('127.0.0.1');
    expect(config.master?.apiToken).toBe('env-secret');
    expect(config.master?.databaseUrl).toBe('postgres://db/env');
    expect(config.telegram.botToken).toBe('env-bot-token');
    expect(config.logLevel).toBe('debug');
  });

  it('accepts bare recipient ids', () => {
    const config = parseConfig({ ...masterRaw(), recipients: [123, { id: '-100', defaultLanguage: 'ru' }] }, {});
    expect(config.recipients).toEqual([
      { id: '123', defaultLanguage: 'en', defaultViewMode: 'compact' },
      { id: '-100', defaultLanguage: 'ru', defaultViewMode: 'compact' },
    ]);
  });

  it('reads an optional excellent threshold', () => {
    const config = parseConfig({ ...masterRaw(), thresholds: { excellent: 2000 } }, {});
    expect(config.thresholds.excellent).toBe(2000);
  });

  it.each([
    ['thresholds that do not increase', { ...masterRaw(), thresholds: { low: 40 } }],
    ['an unsupported language', { ...masterRaw(), recipients: [{ id: '1', defaultLanguage: 'de' }] }],
    ['duplicate recipients', { ...masterRaw(), recipients: ['1', 1] }],
    ['duplicate nodes', masterRaw({ nodes: [{ id: 'fin' }, { id: 'fin' }] })],
    ['a missing api token', masterRaw({ apiToken: undefined })],
    ['a missing database url', masterRaw({ databaseUrl: undefined })],
    ['no recipients', { ...masterRaw(), recipients: [] }],
    ['an unknown mode', { ...masterRaw(), mode: 'relay' }],
    ['a non-positive interval', masterRaw({ schedule: { intervalMinutes: 0 } })],
  ])('rejects %s', (_name, raw) => {
    expect(() => parseConfig(raw, {})).toThrow(ConfigurationError);
  });

  it('needs no bot token or recipients in node mode', () => {
    const config = parseConfig(
      { mode: 'node', node: { nodeId: 'fin', masterUrl: 'http://master/api/v1/report', apiToken: 'test-secret' } },
      {}
    );
    expect(config.node).toEqual({
      nodeId: 'fin',
      masterUrl: 'http://master/api/v1/report',
      apiToken: 'test-secret',
      description: undefined,
    });
    expect(config.master).toBeUndefined();
  });

  it('requires a master url in node mode', () => {
    expect(() => parseConfig({ mode: 'node', node: { nodeId: 'fin', apiToken: 'test-secret' } }, {})).toThrow(
      'node.masterUrl (or MASTER_URL) is required in node mode'
    );
  });

  it('takes the mode from APP_MODE', () => {
    const config = parseConfig(
      { telegram: { botToken: 'test-bot-token' }, recipients: ['1'], single: { sendAlways: true } },
      { APP_MODE: 'single' }
    );
    expect(config.mode).toBe('single');
    expect(config.single.sendAlways).toBe(true);
  });

  it('reads the single-mode host identity and drops blank fields', () => {
    const config = parseConfig(
      {
        mode: 'single',
        telegram: { botToken: 'test-bot-token' },
        recipients: ['1'],
        single: { displayName: ' Office ', location: 'Riga', description: '  ' },
      },
      {}
    );
    expect(config.single).toEqual({ sendAlways: false, nodeId: 'local', displayName: 'Office', location: 'Riga' });
  });
});

describe('loadConfig', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function tempFile(contents: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'speedwatch-config-'));
    dirs.push(dir);
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, contents);
    return file;
  }

  it('reads the file named by CONFIG_PATH', () => {
    const file = tempFile(JSON.stringify(masterRaw()));
    expect(loadConfig(undefined, { CONFIG_PATH: file }).master?.apiToken).toBe('test-secret');
  });

  it('fails on a missing file', () => {
    expect(() => loadConfig('/nonexistent/speedwatch.json', {})).toThrow(ConfigurationError);
  });

  it('fails on invalid JSON', () => {
    const file = tempFile('{ not json');
    expect(() => loadConfig(file, {})).toThrow('Configuration file is not valid JSON');
  });
});
