import dotenv from 'dotenv';
import { AppConfig, loadConfig } from './config/env';
import { createApp } from './app';
import { SubscriberStore } from './services/notifications/SubscriberStore';
import { TelegramClient } from './services/notifications/TelegramClient';
import { TelegramNotifier } from './services/notifications/TelegramNotifier';
import {
  AppointmentMonitor,
  CycleReport,
  LocationPoller,
  PollingEventType,
  RedirectWalker,
} from './services/polling';
import { CommandRouter } from './services/bot/CommandRouter';
import { TelegramUpdateListener } from './services/bot/TelegramUpdateListener';
import { ConfigError } from './utils/errors';
import logger from './utils/logger';

dotenv.config();

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ variable: error.variable }, error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function start() {
  const config = readConfig();

  const subscribers = new SubscriberStore(config.subscribersFile);
  if (config.defaultChatId !== null && subscribers.add(config.defaultChatId)) {
    logger.info({ chatId: config.defaultChatId }, 'subscribed default chat');
  }
  logger.info({ subscribers: subscribers.size }, 'loaded subscribers');

  const telegram = new TelegramClient(config.telegramBotToken);
  const notifier = new TelegramNotifier(telegram, subscribers);

  const poller = new LocationPoller(new RedirectWalker(), undefined, {
    concurrency: config.pollConcurrency,
  });
  const monitor = new AppointmentMonitor(poller, notifier);

  monitor.on(PollingEventType.CYCLE_COMPLETE, (report: CycleReport) => {
    logger.debug(
      { overallStatus: report.aggregate.overallStatus, notified: report.notified.length },
      'cycle complete'
    );
  });

  const commands = new CommandRouter({
    sender: telegram,
    subscribers,
    checker: monitor,
    intervalMinutes: config.checkIntervalMinutes,
  });
  const listener = new TelegramUpdateListener(telegram, commands);

  const app = createApp({ monitor, subscribers });

  monitor.start(config.checkIntervalMinutes);
  listener.start();

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, 'server started');
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('shutting down');

    // Force exit after 10 seconds if something hangs
    // Use unref() so this timer doesn't keep the process alive
    const forceExitTimer = setTimeout(() => {
      logger.warn('forcing exit after timeout');
      process.exit(0);
    }, 10000);
    forceExitTimer.unref();

    await listener.stop();
    await monitor.shutdown();

    server.close(() => {
      logger.info('server closed');
      process.exit(0);
    });
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error({ err: error }, 'error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

start().catch((error) => {
  logger.fatal({ err: error }, 'failed to start');
  process.exit(1);
});
