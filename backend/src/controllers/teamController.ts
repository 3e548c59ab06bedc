import type { Request, Response } from 'express';
import type { Engines } from '../engines';
import { actorOf } from '../middleware/auth';
import { HttpError, sendResult } from '../middleware/errorHandler';
import { parseInput } from '../middleware/validate';
import { idParams, produceBody, productionQuery } from '../validation/schemas';
import { handle } from './handler';
import { invalidateLeaderboard } from './leaderboardController';

export function createTeamController(engines: Engines) {
  // Public roster
  const list = handle(async (_req: Request, res: Response) => {
    sendResult(res, await engines.teams.listTeams());
  });

  // Balance and inventory (the team itself or admin)
  const get = handle(async (req: Request, res: Response) => {
    const { id } = parseInput(idParams, req.params);
    sendResult(res, await engines.teams.getTeamSnapshot(actorOf(req), id));
  });

  // Raw requirements for ?quantity= plus recent production runs
  const production = handle(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const { id } = parseInput(idParams, req.params);
    const { quantity, limit } = parseInput(productionQuery, req.query);
    if (actor.role === 'team' && actor.teamId !== id) {
      throw new HttpError(403, 'Teams can only view their own production');
    }

    const requirements = await engines.production.getRequirements(id, quantity);
    if (!requirements.success) {
      sendResult(res, requirements);
      return;
    }
    const history = await engines.production.getHistory(id, limit);
    if (!history.success) {
      sendResult(res, history);
      return;
    }
    sendResult(res, { success: true, data: { ...requirements.data, history: history.data } });
  });

  // Whether the team already received its gift
  const gift = handle(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const { id } = parseInput(idParams, req.params);
    if (actor.role === 'team' && actor.teamId !== id) {
      throw new HttpError(403, 'Teams can only view their own gift status');
    }
    sendResult(res, await engines.gifts.getGiftStatus(id));
  });

  // Every offer the team posted
  const offers = handle(async (req: Request, res: Response) => {
    actorOf(req);
    const { id } = parseInput(idParams, req.params);
    sendResult(res, await engines.marketplace.listTeamOffers(id));
  });

  // Convert raw units into own material
  const produce = handle(async (req: Request, res: Response) => {
    const { quantity } = parseInput(produceBody, req.body);
    const result = await engines.production.produce(actorOf(req), quantity);
    if (result.success) await invalidateLeaderboard();
    sendResult(res, result, 201);
  });

  return { list, get, production, gift, offers, produce };
}
