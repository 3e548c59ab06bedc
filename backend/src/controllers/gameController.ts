import type { Request, Response } from 'express';
import type { Engines } from '../engines';
import { actorOf } from '../middleware/auth';
import { sendResult } from '../middleware/errorHandler';
import { parseInput } from '../middleware/validate';
import { defaultRoster, toSeeds } from '../services/roster';
import { reallocateBody, setupBody, statusBody } from '../validation/schemas';
import { handle } from './handler';
import { invalidateLeaderboard } from './leaderboardController';

export function createGameController(engines: Engines) {
  // Get game status
  const getStatus = handle(async (_req: Request, res: Response) => {
    sendResult(res, await engines.admin.getStatus());
  });

  // Move the game to another status (admin)
  const setStatus = handle(async (req: Request, res: Response) => {
    const { status } = parseInput(statusBody, req.body);
    sendResult(res, await engines.admin.setStatus(actorOf(req), status));
  });

  // Create the teams (admin, setup only)
  const setupTeams = handle(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const body = parseInput(setupBody, req.body);
    const teams = 'teams' in body ? body.teams : defaultRoster(body.password);

    const result = await engines.admin.setupTeams(actor, await toSeeds(teams));
    if (result.success) await invalidateLeaderboard();
    sendResult(res, result, 201);
  });

  // Re-roll raw units for every team (admin)
  const reallocate = handle(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const bounds = parseInput(reallocateBody, req.body ?? {});
    sendResult(res, await engines.admin.reallocateRawUnits(actor, bounds));
  });

  return { getStatus, setStatus, setupTeams, reallocate };
}
