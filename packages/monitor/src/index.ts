#!/usr/bin/env node

import { USAGE, createMonitor, parseCliArgs } from './app';
import { assertLogFileWritable } from './services/event-log';
import { getConfig, isDevelopment } from './utils/config';
import { createEventLoggers, logger } from './utils/logger';

async function main() {
  const cli = parseCliArgs(process.argv.slice(2));
  const config = getConfig();
  const target = cli.host ?? config.PINGWATCH_TARGET;

  if (!target) {
    console.error('You forgot to provide the IP address or hostname to be pinged');
    console.error(USAGE);
    process.exit(1);
  }

  await assertLogFileWritable(config.PINGWATCH_LOG_FILE);

  const eventLog = createEventLoggers({
    logFile: config.PINGWATCH_LOG_FILE,
    trace: cli.trace ?? config.PINGWATCH_TRACE,
    console: isDevelopment()
  });

  const monitor = createMonitor(config, target, { loggers: eventLog.loggers });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    eventLog.loggers.ERROR.log(`Captured ${signal}, exiting`);
    monitor.stop();
    await eventLog.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch(error => {
      logger.error('Shutdown failed', { error });
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  monitor.start();
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Failed to start pingwatch', { error });
    process.exit(1);
  });
}
