import { Router } from 'express';
import { createGameController } from '../controllers/gameController';
import type { Engines } from '../engines';
import { requireAdmin } from '../middleware/auth';

export function createGameRoutes(engines: Engines): Router {
  const router = Router();
  const GameController = createGameController(engines);

  // Current status
  router.get('/', GameController.getStatus);

  // Status transition: setup -> running <-> paused -> ended
  router.post('/status', requireAdmin, GameController.setStatus);

  // Create teams (explicit list or the bundled roster)
  router.post('/setup', requireAdmin, GameController.setupTeams);

  // Re-roll raw units for every team
  router.post('/reallocate', requireAdmin, GameController.reallocate);

  return router;
}
