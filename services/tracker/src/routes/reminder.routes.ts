import { Router } from 'express';
import type { ReminderController } from '../controllers/reminder.controller';

/**
 * Per-pet reminder routes; mounted under /users/:userId/pets/:petId
 */
export function createPetReminderRoutes(controller: ReminderController): Router {
  const router = Router({ mergeParams: true });

  router.get('/reminders/today', controller.listToday);
  router.delete('/reminders/today', controller.cancelToday);
  router.post('/reminders/schedule-today', controller.scheduleToday);
  router.post('/reminders/reschedule', controller.reschedule);
  router.post('/reminders/reconcile', controller.reconcile);

  return router;
}

/**
 * Snooze is addressed by the reminder's own payload, so it is not nested under a pet
 */
export function createReminderRoutes(controller: ReminderController): Router {
  const router = Router();

  router.post('/reminders/snooze', controller.snooze);

  return router;
}
