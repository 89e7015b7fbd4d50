import type { Thresholds } from './report';
import type { Language, ViewMode } from './preferences';

export type AppMode = 'master' | 'node' | 'single';

export interface NodeMetaConfig {
  id: string;
  flag?: string;
  displayName?: string;
  location?: string;
  description?: string;
}

export interface RecipientConfig {
  id: string;
  defaultLanguage: Language;
  defaultViewMode: ViewMode;
}

export interface ScheduleConfig {
  intervalMinutes: number;
  sendImmediately: boolean;
}

export interface MasterConfig {
  listenHost: string;
  port: number;
  apiToken: string;
  stalenessMinutes: number;
  /** Array order is the presentation order */
  nodes: NodeMetaConfig[];
  schedule: ScheduleConfig;
  databaseUrl: string;
}

export interface NodeConfig {
  nodeId: string;
  masterUrl: string;
  apiToken: string;
  description?: string;
}

export interface SpeedtestConfig {
  timeoutSeconds: number;
  retryCount: number;
  retryDelaySeconds: number;
  serverId?: number;
}

export interface TelegramConfig {
  botToken: string;
}

export interface SingleConfig {
  sendAlways: boolean;
  nodeId: string;
  /** Identity of the measured host, shown in place of the bare node id */
  displayName?: string;
  location?: string;
  description?: string;
}

export interface AppConfig {
  mode: AppMode;
  logLevel?: string;
  thresholds: Thresholds;
  speedtest: SpeedtestConfig;
  telegram: TelegramConfig;
  master?: MasterConfig;
  node?: NodeConfig;
  single: SingleConfig;
  recipients: RecipientConfig[];
}
