/**
 * Application configuration
 *
 * Structure (node display metadata, recipients, thresholds, schedule) comes
 * from a JSON file; secrets and ports come from the environment, which dotenv
 * has populated by the time loadConfig() runs. Environment values win.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../errors';
import type {
  AppConfig,
  AppMode,
  MasterConfig,
  NodeConfig,
  NodeMetaConfig,
  RecipientConfig,
  ScheduleConfig,
  SingleConfig,
  SpeedtestConfig,
} from '../types/config';
import { DEFAULT_LANGUAGE, DEFAULT_VIEW_MODE, isLanguage, isViewMode } from '../types/preferences';
import type { Thresholds } from '../types/report';

export const DEFAULT_CONFIG_PATH = 'config.json';

export const DEFAULT_THRESHOLDS: Thresholds = {
  very_low: 50,
  low: 200,
  medium: 500,
  good: 1000,
};

const DEFAULT_PORT = 8080;
const DEFAULT_STALENESS_MINUTES = 120;
const DEFAULT_INTERVAL_MINUTES = 60;

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string): RawObject {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isObject(value)) {
    throw new ConfigurationError(`"${key}" must be an object`);
  }
  return value;
}

function optionalString(raw: RawObject, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${where}.${key} must be a string`);
  }
  return value;
}

function numberOr(raw: RawObject, key: string, fallback: number, where: string): number {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${where}.${key} must be a finite number`);
  }
  return value;
}

function positive(value: number, name: string): number {
  if (value <= 0) {
    throw new ConfigurationError(`${name} must be positive`);
  }
  return value;
}

function booleanOr(raw: RawObject, key: string, fallback: boolean, where: string): boolean {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${where}.${key} must be a boolean`);
  }
  return value;
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer`);
  }
  return parsed;
}

function parseMode(value: unknown): AppMode {
  if (value === undefined || value === null || value === '') return 'master';
  if (value === 'master' || value === 'node' || value === 'single') return value;
  throw new ConfigurationError(`mode must be one of master, node, single (got "${String(value)}")`);
}

export function parseThresholds(raw: RawObject): Thresholds {
  const thresholds: Thresholds = {
    very_low: numberOr(raw, 'very_low', DEFAULT_THRESHOLDS.very_low, 'thresholds'),
    low: numberOr(raw, 'low', DEFAULT_THRESHOLDS.low, 'thresholds'),
    medium: numberOr(raw, 'medium', DEFAULT_THRESHOLDS.medium, 'thresholds'),
    good: numberOr(raw, 'good', DEFAULT_THRESHOLDS.good, 'thresholds'),
  };
  if (raw.excellent !== undefined && raw.excellent !== null) {
    thresholds.excellent = numberOr(raw, 'excellent', 0, 'thresholds');
  }

  const bounds = [thresholds.very_low, thresholds.low, thresholds.medium, thresholds.good];
  if (thresholds.excellent !== undefined) bounds.push(thresholds.excellent);

  if (bounds.some((bound) => bound <= 0)) {
    throw new ConfigurationError('All thresholds must be positive');
  }
  for (let i = 1; i < bounds.length; i++) {
    if (bounds[i] <= bounds[i - 1]) {
      throw new ConfigurationError('Thresholds must increase strictly from very_low to excellent');
    }
  }
  return thresholds;
}

function parseRecipients(value: unknown): RecipientConfig[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigurationError('"recipients" must be an array');
  }

  const seen = new Set<string>();
  return value.map((entry, index): RecipientConfig => {
    const where = `recipients[${index}]`;
    // Bare chat ids are accepted as shorthand
    const item: RawObject = isObject(entry) ? entry : { id: entry };
    const rawId = item.id;
    if ((typeof rawId !== 'string' && typeof rawId !== 'number') || String(rawId).trim() === '') {
      throw new ConfigurationError(`${where}.id is required`);
    }
    const id = String(rawId).trim();
    if (seen.has(id)) {
      throw new ConfigurationError(`Duplicate recipient id "${id}"`);
    }
    seen.add(id);

    const language = item.defaultLanguage ?? DEFAULT_LANGUAGE;
    if (!isLanguage(language)) {
      throw new ConfigurationError(`${where}.defaultLanguage "${String(language)}" is not supported`);
    }
    const viewMode = item.defaultViewMode ?? DEFAULT_VIEW_MODE;
    if (!isViewMode(viewMode)) {
      throw new ConfigurationError(`${where}.defaultViewMode must be compact or detailed`);
    }
    return { id, defaultLanguage: language, defaultViewMode: viewMode };
  });
}

function parseNodes(value: unknown): NodeMetaConfig[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigurationError('"master.nodes" must be an array');
  }

  const seen = new Set<string>();
  return value.map((entry, index): NodeMetaConfig => {
    const where = `master.nodes[${index}]`;
    if (!isObject(entry)) {
      throw new ConfigurationError(`${where} must be an object`);
    }
    const id = optionalString(entry, 'id', where)?.trim();
    if (!id) {
      throw new ConfigurationError(`${where}.id is required`);
    }
    if (seen.has(id)) {
      throw new ConfigurationError(`Duplicate node id "${id}"`);
    }
    seen.add(id);
    return {
      id,
      flag: optionalString(entry, 'flag', where),
      displayName: optionalString(entry, 'displayName', where),
    };
  });
}

function parseSchedule(master: RawObject): ScheduleConfig {
  if (master.schedule === undefined || master.schedule === null) {
    // Older configs only carried aggregationIntervalMinutes and sent on every report
    return {
      intervalMinutes: positive(
        numberOr(master, 'aggregationIntervalMinutes', DEFAULT_INTERVAL_MINUTES, 'master'),
        'master.aggregationIntervalMinutes'
      ),
      sendImmediately: true,
    };
  }
  const schedule = section(master, 'schedule');
  return {
    intervalMinutes: positive(
      numberOr(schedule, 'intervalMinutes', DEFAULT_INTERVAL_MINUTES, 'master.schedule'),
      'master.schedule.intervalMinutes'
    ),
    sendImmediately: booleanOr(schedule, 'sendImmediately', false, 'master.schedule'),
  };
}

function parseMaster(raw: RawObject, env: NodeJS.ProcessEnv): MasterConfig {
  const master = section(raw, 'master');
  const apiToken = env.API_TOKEN || optionalString(master, 'apiToken', 'master') || '';
  if (!apiToken) {
    throw new ConfigurationError('master.apiToken (or API_TOKEN) is required in master mode');
  }

  const databaseUrl = env.DATABASE_URL || optionalString(master, 'databaseUrl', 'master') || '';
  if (!databaseUrl) {
    throw new ConfigurationError('master.databaseUrl (or DATABASE_URL) is required in master mode');
  }

  return {
    listenHost: env.LISTEN_HOST || optionalString(master, 'listenHost', 'master') || '0.0.0.0',
    port: envNumber(env, 'PORT') ?? positive(numberOr(master, 'port', DEFAULT_PORT, 'master'), 'master.port'),
    apiToken,
    stalenessMinutes: positive(
      numberOr(master, 'stalenessMinutes', DEFAULT_STALENESS_MINUTES, 'master'),
      'master.stalenessMinutes'
    ),
    nodes: parseNodes(master.nodes),
    schedule: parseSchedule(master),
    databaseUrl,
  };
}

function parseNode(raw: RawObject, env: NodeJS.ProcessEnv): NodeConfig {
  const node = section(raw, 'node');
  const nodeId = env.NODE_ID || optionalString(node, 'nodeId', 'node') || '';
  const masterUrl = env.MASTER_URL || optionalString(node, 'masterUrl', 'node') || '';
  const apiToken = env.API_TOKEN || optionalString(node, 'apiToken', 'node') || '';

  if (!nodeId) throw new ConfigurationError('node.nodeId (or NODE_ID) is required in node mode');
  if (!masterUrl) throw new ConfigurationError('node.masterUrl (or MASTER_URL) is required in node mode');
  if (!apiToken) throw new ConfigurationError('node.apiToken (or API_TOKEN) is required in node mode');

  return { nodeId, masterUrl, apiToken, description: optionalString(node, 'description', 'node') };
}

function parseSpeedtest(raw: RawObject): SpeedtestConfig {
  const speedtest = section(raw, 'speedtest');
  const config: SpeedtestConfig = {
    timeoutSeconds: positive(numberOr(speedtest, 'timeoutSeconds', 60, 'speedtest'), 'speedtest.timeoutSeconds'),
    retryCount: positive(numberOr(speedtest, 'retryCount', 3, 'speedtest'), 'speedtest.retryCount'),
    retryDelaySeconds: numberOr(speedtest, 'retryDelaySeconds', 5, 'speedtest'),
  };
  if (speedtest.serverId !== undefined && speedtest.serverId !== null) {
    config.serverId = numberOr(speedtest, 'serverId', 0, 'speedtest');
  }
  return config;
}

function parseSingle(raw: RawObject, env: NodeJS.ProcessEnv): SingleConfig {
  const single = section(raw, 'single');
  const config: SingleConfig = {
    sendAlways: booleanOr(single, 'sendAlways', false, 'single'),
    nodeId: env.NODE_ID || optionalString(single, 'nodeId', 'single') || 'local',
  };

  const displayName = optionalString(single, 'displayName', 'single')?.trim();
  const location = optionalString(single, 'location', 'single')?.trim();
  const description = optionalString(single, 'description', 'single')?.trim();
  if (displayName) config.displayName = displayName;
  if (location) config.location = location;
  if (description) config.description = description;
  return config;
}

/**
 * Validate a raw config object and merge environment overrides
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (!isObject(raw)) {
    throw new ConfigurationError('Configuration must be a JSON object');
  }

  const mode = parseMode(env.APP_MODE || raw.mode);
  const telegram = section(raw, 'telegram');
  const botToken = env.TELEGRAM_BOT_TOKEN || optionalString(telegram, 'botToken', 'telegram') || '';
  const recipients = parseRecipients(raw.recipients);

  if (mode !== 'node') {
    if (!botToken) {
      throw new ConfigurationError('TELEGRAM_BOT_TOKEN is required in master and single modes');
    }
    if (recipients.length === 0) {
      throw new ConfigurationError('At least one entry is required under "recipients"');
    }
  }

  return {
    mode,
    logLevel: env.LOG_LEVEL || optionalString(raw, 'logLevel', 'config'),
    thresholds: parseThresholds(section(raw, 'thresholds')),
    speedtest: parseSpeedtest(raw),
    telegram: { botToken },
    master: mode === 'master' ? parseMaster(raw, env) : undefined,
    node: mode === 'node' ? parseNode(raw, env) : undefined,
    single: parseSingle(raw, env),
    recipients,
  };
}

/**
 * Locate and load the config file. Precedence: explicit path, CONFIG_PATH, ./config.json.
 */
export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configPath = path.resolve(explicitPath || env.CONFIG_PATH || DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Configuration file is not valid JSON: ${configPath}`, { cause: error });
  }

  return parseConfig(raw, env);
}
