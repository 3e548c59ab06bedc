import type { Request, Response } from 'express';
import { deleteCache, getCache, setCache } from '../config/redis';
import type { Engines } from '../engines';
import { actorOf } from '../middleware/auth';
import { sendResult } from '../middleware/errorHandler';
import { parseInput } from '../middleware/validate';
import { dealsQuery } from '../validation/schemas';
import { handle } from './handler';

export const LEADERBOARD_CACHE_KEY = 'leaderboard:v1';

/** Drops the cached leaderboard after anything that moves it. */
export async function invalidateLeaderboard(): Promise<void> {
  await deleteCache(LEADERBOARD_CACHE_KEY);
}

export function createLeaderboardController(engines: Engines, cacheSeconds: number) {
  /**
   * Rows are identical for every caller, so the serialized response is cached
   * for a few seconds and shared.
   */
  const getLeaderboard = handle(async (req: Request, res: Response) => {
    const actor = actorOf(req);

    const cached = await getCache(LEADERBOARD_CACHE_KEY);
    if (cached) {
      res.type('application/json').send(cached);
      return;
    }

    const result = await engines.leaderboard.getLeaderboard(actor);
    if (result.success) {
      const body = JSON.stringify({ success: true, data: result.data });
      await setCache(LEADERBOARD_CACHE_KEY, body, cacheSeconds);
      res.type('application/json').send(body);
      return;
    }
    sendResult(res, result);
  });

  const getRecentDeals = handle(async (req: Request, res: Response) => {
    const { limit } = parseInput(dealsQuery, req.query);
    sendResult(res, await engines.leaderboard.getRecentDeals(actorOf(req), limit));
  });

  return { getLeaderboard, getRecentDeals };
}
