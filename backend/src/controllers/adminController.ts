import type { Request, Response } from 'express';
import type { Engines } from '../engines';
import { actorOf } from '../middleware/auth';
import { sendResult } from '../middleware/errorHandler';
import { parseInput } from '../middleware/validate';
import { balanceAdjustmentBody, grantGiftBody, inventoryAdjustmentBody } from '../validation/schemas';
import { handle } from './handler';
import { invalidateLeaderboard } from './leaderboardController';

export function createAdminController(engines: Engines) {
  const adjustBalance = handle(async (req: Request, res: Response) => {
    const body = parseInput(balanceAdjustmentBody, req.body);
    const result = await engines.admin.adjustBalance(actorOf(req), body.team_id, body.delta, body.reason);
    if (result.success) await invalidateLeaderboard();
    sendResult(res, result, 201);
  });

  const adjustInventory = handle(async (req: Request, res: Response) => {
    const body = parseInput(inventoryAdjustmentBody, req.body);
    const result = await engines.admin.adjustInventory(
      actorOf(req),
      body.team_id,
      body.industry,
      body.kind,
      body.delta,
      body.reason
    );
    sendResult(res, result, 201);
  });

  const listGifts = handle(async (req: Request, res: Response) => {
    sendResult(res, await engines.gifts.listGifts(actorOf(req)));
  });

  const listTeamsWithoutGift = handle(async (req: Request, res: Response) => {
    sendResult(res, await engines.gifts.listTeamsWithoutGift(actorOf(req)));
  });

  const grantGift = handle(async (req: Request, res: Response) => {
    const { team_id, quantity } = parseInput(grantGiftBody, req.body);
    sendResult(res, await engines.gifts.grantGift(actorOf(req), team_id, quantity), 201);
  });

  return { adjustBalance, adjustInventory, listGifts, listTeamsWithoutGift, grantGift };
}
