import { Router } from 'express';
import type { LoggingController } from '../controllers/logging.controller';

export function createLoggingRoutes(controller: LoggingController): Router {
  const router = Router({ mergeParams: true });

  router.post('/medication-sessions', controller.logMedication);
  router.put('/medication-sessions/:sessionId', controller.updateMedication);
  router.post('/fluid-sessions', controller.logFluid);
  router.put('/fluid-sessions/:sessionId', controller.updateFluid);
  router.post('/quick-log', controller.quickLog);

  return router;
}
