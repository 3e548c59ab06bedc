import { Router } from 'express';
import { createTeamController } from '../controllers/teamController';
import type { Engines } from '../engines';
import { requireActor } from '../middleware/auth';

export function createTeamRoutes(engines: Engines): Router {
  const router = Router();
  const TeamController = createTeamController(engines);

  router.get('/', TeamController.list);
  router.get('/:id', requireActor, TeamController.get);
  router.get('/:id/production', requireActor, TeamController.production);
  router.get('/:id/gift', requireActor, TeamController.gift);
  router.get('/:id/offers', requireActor, TeamController.offers);

  return router;
}

export function createProductionRoutes(engines: Engines): Router {
  const router = Router();
  const TeamController = createTeamController(engines);

  router.post('/', requireActor, TeamController.produce);

  return router;
}
