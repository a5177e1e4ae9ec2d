import { Router } from 'express';
import type { ScheduleController } from '../controllers/schedule.controller';

export function createScheduleRoutes(controller: ScheduleController): Router {
  const router = Router({ mergeParams: true });

  router.get('/schedules', controller.list);
  router.post('/schedules', controller.create);
  router.put('/schedules/:scheduleId', controller.update);
  router.delete('/schedules/:scheduleId', controller.remove);

  return router;
}
