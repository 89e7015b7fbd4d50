// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
dotenv.config();

import { parseCliArgs, USAGE } from './cli';
import { loadConfig } from './config/appConfig';
import { startMaster, type MasterRuntime } from './modes/master';
import { runNode } from './modes/node';
import { runSingle } from './modes/single';
import { APP_VERSION } from './routes/health';
import { log, logger } from './utils/logger';

function handleShutdown(runtime: MasterRuntime): void {
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, shutting down speedwatch master...`, 'index');
    try {
      await runtime.stop();
      process.exit(0);
    } catch (error) {
      log.error('Error during cleanup:', 'index', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return;
  }
  if (cli.version) {
    console.log(`speedwatch ${APP_VERSION}`);
    return;
  }

  const config = loadConfig(cli.configPath);
  const logLevel = cli.logLevel ?? config.logLevel;
  if (logLevel) {
    logger.setLogLevel(logLevel);
  }
  log.info(`Starting in ${config.mode} mode (log level ${logger.getLogLevelString()})`, 'index');

  switch (config.mode) {
    case 'master': {
      const runtime = await startMaster(config);
      handleShutdown(runtime);
      break;
    }
    case 'node': {
      const sent = await runNode(config);
      process.exitCode = sent ? 0 : 1;
      break;
    }
    case 'single': {
      const result = await runSingle(config);
      process.exitCode = result && result.failed.length > 0 ? 1 : 0;
      break;
    }
  }
}

main().catch((error: unknown) => {
  log.error('Failed to start:', 'index', error);
  process.exit(1);
});
