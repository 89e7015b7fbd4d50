import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { describeError } from '../errors';
import type { SpeedtestConfig } from '../types/config';
import { log } from '../utils/logger';

const execFileAsync = promisify(execFile);

export const SPEEDTEST_COMMANDS = ['speedtest', 'speedtest-cli'] as const;
const FALLBACK_DIRS = ['/usr/bin', '/usr/local/bin', '/opt/homebrew/bin'];
const BYTES_PER_SECOND_PER_MBPS = 125_000;
const VERSION_CHECK_TIMEOUT_MS = 5_000;

export interface SpeedtestMeasurement {
  downloadMbps: number;
  uploadMbps: number;
  pingMs: number;
  testServer?: string;
  isp?: string;
}

export type SpeedtestResult =
  | { success: true; measurement: SpeedtestMeasurement; command: string }
  | { success: false; error: string };

export type CommandExecutor = (file: string, args: string[], timeoutMs: number) => Promise<string>;

export interface SpeedtestRunnerOptions {
  exec?: CommandExecutor;
  commands?: string[];
  sleep?: (ms: number) => Promise<void>;
}

const defaultExec: CommandExecutor = async (file, args, timeoutMs) => {
  const { stdout } = await execFileAsync(file, args, { timeout: timeoutMs, maxBuffer: 1024 * 1024 });
  return stdout;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(source: unknown, key: string): unknown {
  return isRecord(source) ? source[key] : undefined;
}

function numberField(source: unknown, key: string): number | undefined {
  const value = field(source, key);
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function stringField(source: unknown, key: string): string | undefined {
  const value = field(source, key);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function parseOoklaJson(output: string): SpeedtestMeasurement | null {
  let data: unknown;
  try {
    data = JSON.parse(output);
  } catch {
    return null;
  }

  const download = numberField(field(data, 'download'), 'bandwidth');
  const upload = numberField(field(data, 'upload'), 'bandwidth');
  if (download === undefined || upload === undefined) return null;

  const server = field(data, 'server');
  const name = stringField(server, 'name');
  const location = stringField(server, 'location');
  return {
    downloadMbps: download / BYTES_PER_SECOND_PER_MBPS,
    uploadMbps: upload / BYTES_PER_SECOND_PER_MBPS,
    pingMs: numberField(field(data, 'ping'), 'latency') ?? 0,
    testServer: name && location ? `${name} (${location})` : name ?? location,
    isp: stringField(data, 'isp'),
  };
}

const SIMPLE_PATTERN = /Ping:\s+([\d.]+)\s+ms.*?Download:\s+([\d.]+)\s+Mbit\/s.*?Upload:\s+([\d.]+)\s+Mbit\/s/is;
const LINE_PATTERNS = {
  download: /download:\s+([\d.]+)\s+(?:Mbit\/s|Mbps)/i,
  upload: /upload:\s+([\d.]+)\s+(?:Mbit\/s|Mbps)/i,
  ping: /(?:latency|ping):\s+([\d.]+)\s+ms/i,
};

function matchNumber(pattern: RegExp, line: string): number | undefined {
  const match = pattern.exec(line);
  if (!match) return undefined;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

function parseText(output: string): SpeedtestMeasurement | null {
  const simple = SIMPLE_PATTERN.exec(output);
  if (simple) {
    return { pingMs: Number(simple[1]), downloadMbps: Number(simple[2]), uploadMbps: Number(simple[3]) };
  }

  let download: number | undefined;
  let upload: number | undefined;
  let ping: number | undefined;
  let testServer: string | undefined;
  let isp: string | undefined;

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    download = matchNumber(LINE_PATTERNS.download, line) ?? download;
    upload = matchNumber(LINE_PATTERNS.upload, line) ?? upload;
    ping = matchNumber(LINE_PATTERNS.ping, line) ?? ping;
    if (line.startsWith('Server:')) testServer = line.slice('Server:'.length).trim() || testServer;
    if (line.startsWith('ISP:')) isp = line.slice('ISP:'.length).trim() || isp;
  }

  if (download === undefined || upload === undefined) return null;
  return {
    downloadMbps: download,
    uploadMbps: upload,
    pingMs: ping ?? 0,
    testServer,
    isp,
  };
}

/**
 * Parse output from the official Ookla CLI (JSON or text) or speedtest-cli
 * (--simple or default text). Returns null when no download and upload
 * figures can be found.
 */
export function parseSpeedtestOutput(output: string): SpeedtestMeasurement | null {
  const trimmed = output.trim();
  if (trimmed.startsWith('{')) {
    const parsed = parseOoklaJson(trimmed);
    if (parsed) return parsed;
    log.debug('Speedtest output looked like JSON but did not parse', 'SpeedtestRunner');
  }
  return parseText(trimmed);
}

/**
 * Speedtest binaries on PATH first, then the usual install locations
 */
export function findSpeedtestCommands(envPath: string = process.env.PATH ?? ''): string[] {
  const dirs = [...envPath.split(path.delimiter).filter(Boolean), ...FALLBACK_DIRS];
  const found: string[] = [];
  for (const command of SPEEDTEST_COMMANDS) {
    for (const dir of dirs) {
      const candidate = path.join(dir, command);
      if (!found.includes(candidate) && fs.existsSync(candidate)) {
        found.push(candidate);
        break;
      }
    }
  }
  return found;
}

function isSpeedtestCli(command: string): boolean {
  return path.basename(command) === 'speedtest-cli';
}

export class SpeedtestRunner {
  private readonly exec: CommandExecutor;
  private readonly sleep: (ms: number) => Promise<void>;
  private commands: string[] | null;

  constructor(
    private readonly config: SpeedtestConfig,
    options: SpeedtestRunnerOptions = {}
  ) {
    this.exec = options.exec ?? defaultExec;
    this.sleep = options.sleep ?? defaultSleep;
    this.commands = options.commands ?? null;
  }

  /**
   * Up to retryCount attempts, each trying every discovered command.
   * Never throws; failures come back as { success: false }.
   */
  public async run(): Promise<SpeedtestResult> {
    const commands = (this.commands ??= findSpeedtestCommands());
    if (commands.length === 0) {
      const error = 'No speedtest command found. Install speedtest or speedtest-cli';
      log.error(error, 'SpeedtestRunner');
      return { success: false, error };
    }

    let lastError = 'unknown error';
    for (let attempt = 1; attempt <= this.config.retryCount; attempt++) {
      for (const command of commands) {
        log.info(`Running speedtest (attempt ${attempt}/${this.config.retryCount}) with ${command}`, 'SpeedtestRunner');
        try {
          const args = await this.buildArgs(command);
          const output = await this.exec(command, args, this.config.timeoutSeconds * 1000);
          const measurement = parseSpeedtestOutput(output);
          if (measurement) {
            log.info(
              `Speedtest finished: ${measurement.downloadMbps.toFixed(2)}/${measurement.uploadMbps.toFixed(2)} Mbps, ${measurement.pingMs.toFixed(2)} ms`,
              'SpeedtestRunner'
            );
            return { success: true, measurement, command };
          }
          lastError = `could not parse output of ${command}`;
          log.warn(lastError, 'SpeedtestRunner');
        } catch (error) {
          lastError = describeError(error);
          log.warn(`Speedtest with ${command} failed: ${lastError}`, 'SpeedtestRunner');
        }
      }

      if (attempt < this.config.retryCount) {
        log.info(`Waiting ${this.config.retryDelaySeconds}s before retrying`, 'SpeedtestRunner');
        await this.sleep(this.config.retryDelaySeconds * 1000);
      }
    }

    const error = `All speedtest attempts failed. Last error: ${lastError}`;
    log.error(error, 'SpeedtestRunner');
    return { success: false, error };
  }

  private async buildArgs(command: string): Promise<string[]> {
    const { serverId } = this.config;
    if (isSpeedtestCli(command)) {
      return serverId !== undefined ? ['--simple', '--server', String(serverId)] : ['--simple'];
    }

    const args = serverId !== undefined ? [`--server-id=${serverId}`] : [];
    if (await this.supportsJson(command)) {
      args.push('--format=json', '--accept-license', '--accept-gdpr');
    }
    return args;
  }

  // Ookla builds before 1.1 have no JSON output
  private async supportsJson(command: string): Promise<boolean> {
    try {
      const version = await this.exec(command, ['--version'], VERSION_CHECK_TIMEOUT_MS);
      const match = /(\d+)\.(\d+)/.exec(version);
      if (!match) return false;
      const major = Number(match[1]);
      return major > 1 || (major === 1 && Number(match[2]) >= 1);
    } catch (error) {
      log.debug(`Version check for ${command} failed: ${describeError(error)}`, 'SpeedtestRunner');
      return false;
    }
  }
}
