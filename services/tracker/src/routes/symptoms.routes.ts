import { Router } from 'express';
import type { SymptomsController } from '../controllers/symptoms.controller';

export function createSymptomsRoutes(controller: SymptomsController): Router {
  const router = Router({ mergeParams: true });

  router.get('/symptoms', controller.recent);
  router.put('/symptoms/:date', controller.save);
  router.get('/symptoms/:date', controller.get);
  router.delete('/symptoms/:date', controller.clear);

  return router;
}
