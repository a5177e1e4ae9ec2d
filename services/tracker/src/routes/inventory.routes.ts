import { Router } from 'express';
import type { InventoryController } from '../controllers/inventory.controller';

/**
 * The stock is per user; mounted under /users/:userId
 */
export function createInventoryRoutes(controller: InventoryController): Router {
  const router = Router({ mergeParams: true });

  router.get('/inventory', controller.get);
  router.post('/inventory', controller.create);
  router.post('/inventory/refills', controller.refill);
  router.put('/inventory/volume', controller.adjust);

  return router;
}

/**
 * Mounted under /users/:userId/pets/:petId
 */
export function createPetInventoryRoutes(controller: InventoryController): Router {
  const router = Router({ mergeParams: true });

  router.get('/inventory', controller.metrics);

  return router;
}
