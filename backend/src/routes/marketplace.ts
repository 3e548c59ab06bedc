import { Router } from 'express';
import { createMarketplaceController } from '../controllers/marketplaceController';
import type { Engines } from '../engines';
import { requireActor } from '../middleware/auth';

export function createMarketplaceRoutes(engines: Engines): Router {
  const router = Router();
  const MarketplaceController = createMarketplaceController(engines);

  router.use(requireActor);

  router.get('/offers', MarketplaceController.list);
  router.post('/offers', MarketplaceController.create);
  router.post('/offers/:offerId/accept', MarketplaceController.accept);
  router.post('/offers/:offerId/cancel', MarketplaceController.cancel);
  router.post('/offers/:offerId/price', MarketplaceController.reprice);

  return router;
}
