import { Router } from 'express';
import type { QolController } from '../controllers/qol.controller';

export function createQolRoutes(controller: QolController): Router {
  const router = Router({ mergeParams: true });

  router.post('/qol-assessments', controller.submit);
  router.get('/qol-assessments', controller.list);
  // Before '/:date' so 'trend' is not read as a date
  router.get('/qol-assessments/trend', controller.trend);
  router.get('/qol-assessments/:date', controller.get);
  router.delete('/qol-assessments/:date', controller.remove);

  return router;
}
