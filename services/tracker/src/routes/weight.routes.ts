import { Router } from 'express';
import type { WeightController } from '../controllers/weight.controller';

export function createWeightRoutes(controller: WeightController): Router {
  const router = Router({ mergeParams: true });

  router.post('/weights', controller.create);
  router.get('/weights', controller.history);
  router.get('/weights/latest', controller.latest);
  router.put('/weights/:date', controller.update);
  router.delete('/weights/:date', controller.remove);

  return router;
}
