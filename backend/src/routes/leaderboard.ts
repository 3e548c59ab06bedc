import { Router } from 'express';
import { createLeaderboardController } from '../controllers/leaderboardController';
import type { Engines } from '../engines';
import { requireActor } from '../middleware/auth';

export function createLeaderboardRoutes(engines: Engines, cacheSeconds: number): Router {
  const router = Router();
  const LeaderboardController = createLeaderboardController(engines, cacheSeconds);

  router.use(requireActor);

  router.get('/', LeaderboardController.getLeaderboard);
  router.get('/deals', LeaderboardController.getRecentDeals);

  return router;
}
