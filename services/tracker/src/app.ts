/**
 * Tracker HTTP application
 * Builds the controllers from their services and mounts every route
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import logger from './logger';
import { InventoryController } from './controllers/inventory.controller';
import { LoggingController } from './controllers/logging.controller';
import { NotificationSettingsController } from './controllers/notification-settings.controller';
import { ProgressController } from './controllers/progress.controller';
import { QolController } from './controllers/qol.controller';
import { ReminderController } from './controllers/reminder.controller';
import { ScheduleController } from './controllers/schedule.controller';
import { SymptomsController } from './controllers/symptoms.controller';
import { SyncController } from './controllers/sync.controller';
import { WeightController } from './controllers/weight.controller';
import { createInventoryRoutes, createPetInventoryRoutes } from './routes/inventory.routes';
import { createLoggingRoutes } from './routes/logging.routes';
import { createNotificationSettingsRoutes } from './routes/notification-settings.routes';
import { createProgressRoutes } from './routes/progress.routes';
import { createQolRoutes } from './routes/qol.routes';
import { createPetReminderRoutes, createReminderRoutes } from './routes/reminder.routes';
import { createScheduleRoutes } from './routes/schedule.routes';
import { createSymptomsRoutes } from './routes/symptoms.routes';
import { createSyncRoutes } from './routes/sync.routes';
import { createWeightRoutes } from './routes/weight.routes';
import type { SymptomsService } from './services/health/symptoms.service';
import type { WeightService } from './services/health/weight.service';
import type { InventoryService } from './services/inventory/inventory.service';
import type { LoggingService } from './services/logging/logging.service';
import type { OfflineLoggingService } from './services/logging/offline-logging.service';
import type { NotificationSettingsService } from './services/notifications/notification-settings.service';
import type { ReminderService } from './services/notifications/reminder.service';
import type { ProgressService } from './services/progress/progress.service';
import type { QolService } from './services/qol/qol.service';
import type { ScheduleService } from './services/schedule/schedule.service';
import { errorMessage } from './utils/error-utils';

const log = logger.child({ module: 'app' });

export interface AppDependencies {
  serviceName: string;
  schedules: ScheduleService;
  logging: LoggingService;
  offline: OfflineLoggingService;
  reminders: ReminderService;
  settings: NotificationSettingsService;
  progress: ProgressService;
  qol: QolService;
  weight: WeightService;
  symptoms: SymptomsService;
  inventory: InventoryService;
  now?: () => Date;
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

export function createApp(deps: AppDependencies): Express {
  const now = deps.now ?? (() => new Date());
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.status(StatusCodes.OK).json({
      status: 'healthy',
      service: deps.serviceName,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  const pets = express.Router({ mergeParams: true });
  pets.use(createScheduleRoutes(new ScheduleController(deps.schedules, deps.reminders)));
  pets.use(
    createLoggingRoutes(
      new LoggingController({
        logging: deps.logging,
        schedules: deps.schedules,
        offline: deps.offline,
        reminders: deps.reminders,
        inventory: deps.inventory,
        now,
      })
    )
  );
  pets.use(createProgressRoutes(new ProgressController(deps.progress, now)));
  pets.use(createQolRoutes(new QolController(deps.qol, now)));
  pets.use(createWeightRoutes(new WeightController(deps.weight, now)));
  pets.use(createSymptomsRoutes(new SymptomsController(deps.symptoms)));
  const inventoryController = new InventoryController(deps.inventory, deps.schedules, now);
  pets.use(createPetInventoryRoutes(inventoryController));

  const reminderController = new ReminderController(deps.reminders, deps.schedules);
  pets.use(createPetReminderRoutes(reminderController));

  app.use('/users/:userId/pets/:petId', pets);
  app.use(
    '/users/:userId',
    createNotificationSettingsRoutes(new NotificationSettingsController(deps.settings))
  );
  app.use('/users/:userId', createInventoryRoutes(inventoryController));
  app.use(createReminderRoutes(reminderController));
  app.use('/users/:userId/sync', createSyncRoutes(new SyncController(deps.offline)));

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isBodyParseError(error)) {
      res.status(StatusCodes.BAD_REQUEST).json({ error: 'Malformed JSON body' });
      return;
    }

    log.error(
      { error: errorMessage(error), path: req.path, method: req.method },
      'Unhandled request error'
    );
    res.status(StatusCodes.INTERNAL_SERVER_ERROR).json({ error: 'Internal server error' });
  });

  return app;
}
