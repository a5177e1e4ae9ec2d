import { Router } from 'express';
import type { NotificationSettingsController } from '../controllers/notification-settings.controller';

export function createNotificationSettingsRoutes(
  controller: NotificationSettingsController
): Router {
  const router = Router({ mergeParams: true });

  router.get('/notification-settings', controller.get);
  router.put('/notification-settings', controller.update);

  return router;
}
