import { Router } from 'express';
import type { SyncController } from '../controllers/sync.controller';

export function createSyncRoutes(controller: SyncController): Router {
  const router = Router({ mergeParams: true });

  router.get('/queue', controller.getQueue);
  router.delete('/queue', controller.clear);
  router.post('/', controller.sync);
  router.post('/operations/:operationId/retry', controller.retry);
  router.delete('/operations/:operationId', controller.removeOperation);

  return router;
}
