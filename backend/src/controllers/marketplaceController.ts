import type { Request, Response } from 'express';
import type { Engines } from '../engines';
import { actorOf } from '../middleware/auth';
import { sendResult } from '../middleware/errorHandler';
import { parseInput } from '../middleware/validate';
import {
  acceptOfferBody,
  createOfferBody,
  offerParams,
  offersQuery,
  repriceOfferBody,
} from '../validation/schemas';
import { handle } from './handler';
import { invalidateLeaderboard } from './leaderboardController';

export function createMarketplaceController(engines: Engines) {
  // Open offers, cheapest first (?industry=, ?exclude_own=true)
  const list = handle(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const query = parseInput(offersQuery, req.query);
    const excludeTeamId = query.exclude_own === 'true' && actor.role === 'team' ? actor.teamId : undefined;
    sendResult(res, await engines.marketplace.listOpenOffers({ industry: query.industry, excludeTeamId }));
  });

  const create = handle(async (req: Request, res: Response) => {
    const { quantity, unit_price } = parseInput(createOfferBody, req.body);
    sendResult(res, await engines.marketplace.createOffer(actorOf(req), quantity, unit_price), 201);
  });

  const accept = handle(async (req: Request, res: Response) => {
    const { offerId } = parseInput(offerParams, req.params);
    const { quantity } = parseInput(acceptOfferBody, req.body);
    const result = await engines.marketplace.acceptOffer(actorOf(req), offerId, quantity);
    if (result.success) await invalidateLeaderboard();
    sendResult(res, result);
  });

  const cancel = handle(async (req: Request, res: Response) => {
    const { offerId } = parseInput(offerParams, req.params);
    sendResult(res, await engines.marketplace.cancelOffer(actorOf(req), offerId));
  });

  const reprice = handle(async (req: Request, res: Response) => {
    const { offerId } = parseInput(offerParams, req.params);
    const { unit_price } = parseInput(repriceOfferBody, req.body);
    sendResult(res, await engines.marketplace.repriceOffer(actorOf(req), offerId, unit_price));
  });

  return { list, create, accept, cancel, reprice };
}
