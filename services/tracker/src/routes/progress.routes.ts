import { Router } from 'express';
import type { ProgressController } from '../controllers/progress.controller';

export function createProgressRoutes(controller: ProgressController): Router {
  const router = Router({ mergeParams: true });

  router.get('/progress/week', controller.getWeek);

  return router;
}
