/**
 * Tracker service entry point
 */

import { createApp } from './app';
import { getConfig } from './config';
import logger from './logger';
import { FileKeyValueStore } from './services/key-value-store.service';
import { SymptomsService } from './services/health/symptoms.service';
import { WeightService } from './services/health/weight.service';
import { InventoryService } from './services/inventory/inventory.service';
import { LoggingService } from './services/logging/logging.service';
import { OfflineLoggingService } from './services/logging/offline-logging.service';
import { DailyRolloverService } from './services/notifications/daily-rollover.service';
import { NotificationIndexStore } from './services/notifications/notification-index-store.service';
import { NotificationSettingsService } from './services/notifications/notification-settings.service';
import { TimerReminderPlugin } from './services/notifications/reminder-plugin';
import { ReminderService } from './services/notifications/reminder.service';
import { ProgressService } from './services/progress/progress.service';
import { QolService } from './services/qol/qol.service';
import { ScheduleService } from './services/schedule/schedule.service';
import { getFirestore } from './services/store.service';
import { errorMessage } from './utils/error-utils';

async function main(): Promise<void> {
  const config = getConfig();
  const db = getFirestore();
  const localStore = new FileKeyValueStore(config.localStorePath);

  const plugin = new TimerReminderPlugin();
  const indexStore = new NotificationIndexStore(localStore);
  const settings = new NotificationSettingsService(localStore);
  const reminders = new ReminderService(plugin, indexStore, settings, config.reminders);

  const schedules = new ScheduleService(db);
  const logging = new LoggingService(db);
  const offline = new OfflineLoggingService(localStore, logging, { schedules });

  // Index entries are per day; yesterday's are never read again
  await indexStore.clearAllForYesterday();

  const rollover = new DailyRolloverService(indexStore, {
    onRollover: async (userId, petId) => {
      const active = await schedules.listSchedules(userId, petId, { activeOnly: true });
      await reminders.rescheduleAll(userId, petId, { schedules: active });
    },
  });
  rollover.start();

  const app = createApp({
    serviceName: config.serviceName,
    schedules,
    logging,
    offline,
    reminders,
    settings,
    progress: new ProgressService(db, schedules),
    qol: new QolService(db),
    weight: new WeightService(db),
    symptoms: new SymptomsService(db),
    inventory: new InventoryService(db, plugin),
  });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, nodeEnv: config.nodeEnv }, `${config.serviceName} listening`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    rollover.stop();
    plugin
      .cancelAll()
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Failed to cancel pending reminders');
      })
      .finally(() => {
        server.close(() => process.exit(0));
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.fatal(
    { error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined },
    'Failed to start tracker service'
  );
  process.exit(1);
});
