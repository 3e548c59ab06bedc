import type { Request, Response } from 'express';
import type { Engines } from '../engines';
import { actorOf } from '../middleware/auth';
import { sendResult } from '../middleware/errorHandler';
import { parseInput } from '../middleware/validate';
import { createTradeRequestBody, requestParams } from '../validation/schemas';
import { handle } from './handler';
import { invalidateLeaderboard } from './leaderboardController';

export function createTradeRequestController(engines: Engines) {
  const list = handle(async (req: Request, res: Response) => {
    sendResult(res, await engines.tradeRequests.listVisible(actorOf(req)));
  });

  const create = handle(async (req: Request, res: Response) => {
    const body = parseInput(createTradeRequestBody, req.body);
    const result = await engines.tradeRequests.createRequest(actorOf(req), {
      counterpartyId: body.counterparty_team_id,
      industry: body.industry,
      quantity: body.quantity,
      unitPrice: body.unit_price,
      secret: body.is_secret,
    });
    sendResult(res, result, 201);
  });

  const accept = handle(async (req: Request, res: Response) => {
    const { requestId } = parseInput(requestParams, req.params);
    const result = await engines.tradeRequests.accept(actorOf(req), requestId);
    if (result.success) await invalidateLeaderboard();
    sendResult(res, result);
  });

  const reject = handle(async (req: Request, res: Response) => {
    const { requestId } = parseInput(requestParams, req.params);
    sendResult(res, await engines.tradeRequests.reject(actorOf(req), requestId));
  });

  const cancel = handle(async (req: Request, res: Response) => {
    const { requestId } = parseInput(requestParams, req.params);
    sendResult(res, await engines.tradeRequests.cancel(actorOf(req), requestId));
  });

  return { list, create, accept, reject, cancel };
}
