import { Router } from 'express';
import { createAdminController } from '../controllers/adminController';
import type { Engines } from '../engines';
import { requireAdmin } from '../middleware/auth';

export function createAdminRoutes(engines: Engines): Router {
  const router = Router();
  const AdminController = createAdminController(engines);

  router.use(requireAdmin);

  router.post('/adjustments/balance', AdminController.adjustBalance);
  router.post('/adjustments/inventory', AdminController.adjustInventory);

  return router;
}

export function createGiftRoutes(engines: Engines): Router {
  const router = Router();
  const AdminController = createAdminController(engines);

  router.use(requireAdmin);

  router.get('/', AdminController.listGifts);
  router.get('/pending', AdminController.listTeamsWithoutGift);
  router.post('/', AdminController.grantGift);

  return router;
}
