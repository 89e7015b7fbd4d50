import type { Server } from 'http';
import type { Express } from 'express';
import createApp from '../app';
import Database from '../database/database';
import { ConfigurationError } from '../errors';
import { APP_VERSION } from '../routes/health';
import { DataAggregator } from '../services/DataAggregator';
import { DigestScheduler } from '../services/DigestScheduler';
import { DigestService } from '../services/DigestService';
import { InMemoryNodeStateStore } from '../services/NodeStateStore';
import { DefaultsResolver, PostgresPreferenceStore, type PreferenceStore } from '../services/PreferenceStore';
import { ReportIngestor } from '../services/ReportIngestor';
import { TelegramClient, type BotApi } from '../services/TelegramClient';
import { TelegramUpdatePoller } from '../services/TelegramUpdatePoller';
import type { AppConfig } from '../types/config';
import { log } from '../utils/logger';

export interface MasterOverrides {
  preferences?: PreferenceStore;
  bot?: BotApi;
  pollUpdates?: boolean;
}

export interface MasterRuntime {
  server: Server;
  store: InMemoryNodeStateStore;
  scheduler: DigestScheduler;
  digests: DigestService;
  poller: TelegramUpdatePoller;
  stop(): Promise<void>;
}

function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Wire the master: state store, aggregator, preference store, Telegram
 * client, digest scheduler, update poller and the HTTP API.
 */
export async function startMaster(config: AppConfig, overrides: MasterOverrides = {}): Promise<MasterRuntime> {
  const master = config.master;
  if (!master) {
    throw new ConfigurationError('master section missing for master mode');
  }

  log.info('Initializing speedwatch master...', 'master');

  let db: Database | null = null;
  let preferences = overrides.preferences;
  if (!preferences) {
    db = Database.getInstance(master.databaseUrl);
    await db.initialize();
    preferences = new PostgresPreferenceStore(db, new DefaultsResolver(config.recipients));
  }

  const recipientIds = config.recipients.map((recipient) => recipient.id);
  const store = new InMemoryNodeStateStore(master.nodes.map((node) => node.id));
  const aggregator = new DataAggregator({
    nodes: master.nodes,
    thresholds: config.thresholds,
    stalenessMinutes: master.stalenessMinutes,
  });
  const bot = overrides.bot ?? new TelegramClient({ botToken: config.telegram.botToken });
  const digests = new DigestService({ store, aggregator, preferences, dispatcher: bot, recipients: recipientIds });
  const scheduler = new DigestScheduler(digests, store, master.schedule);
  const poller = new TelegramUpdatePoller(bot, preferences, digests, recipientIds);
  const ingestor = new ReportIngestor(store, master.apiToken);

  const app = createApp({
    ingestor,
    health: { mode: 'master', store, configuredNodes: master.nodes.length, version: APP_VERSION },
  });
  const server = await listen(app, master.port, master.listenHost);

  scheduler.start();
  if (overrides.pollUpdates !== false) {
    poller.start();
  }

  log.success(`Speedwatch master listening on http://${master.listenHost}:${master.port}`, 'master');
  log.info(`Report endpoint: POST /api/v1/report, health check: GET /health`, 'master');
  log.info(`Watching ${master.nodes.length} nodes for ${recipientIds.length} recipients`, 'master');

  return {
    server,
    store,
    scheduler,
    digests,
    poller,
    async stop() {
      await scheduler.stop();
      if (poller.isRunning()) {
        await poller.stop();
      }
      await closeServer(server);
      store.cleanup();
      if (db) {
        await db.close();
      }
      log.info('Master stopped', 'master');
    },
  };
}
