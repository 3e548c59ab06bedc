import { Router } from 'express';
import { createTradeRequestController } from '../controllers/tradeRequestController';
import type { Engines } from '../engines';
import { requireActor } from '../middleware/auth';

export function createTradeRequestRoutes(engines: Engines): Router {
  const router = Router();
  const TradeRequestController = createTradeRequestController(engines);

  router.use(requireActor);

  // Requests visible to the caller (secret deals of other teams filtered out)
  router.get('/', TradeRequestController.list);
  router.post('/', TradeRequestController.create);
  router.post('/:requestId/accept', TradeRequestController.accept);
  router.post('/:requestId/reject', TradeRequestController.reject);
  router.post('/:requestId/cancel', TradeRequestController.cancel);

  return router;
}
