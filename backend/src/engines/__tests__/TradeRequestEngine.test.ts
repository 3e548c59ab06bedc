import { describe, it, expect, beforeEach } from '@jest/globals';
import type { Actor } from '../../types';
import {
  ADMIN,
  asTeam,
  createTestGame,
  expectFailure,
  expectSuccess,
  getTeam,
  setBalance,
  setUnits,
  UNKNOWN_ID,
} from './fixtures';
import type { TestGame } from './fixtures';

describe('TradeRequestEngine', () => {
  let game: TestGame;
  let alpha: Actor;
  let bravo: Actor;
  let charlie: Actor;

  beforeEach(async () => {
    game = await createTestGame();
    alpha = asTeam(game.teams.alpha);
    bravo = asTeam(game.teams.bravo);
    charlie = asTeam(game.teams.charlie);
    await setUnits(game.store, game.teams.alpha.id, 'Iron', 'material_units', 5);
  });

  const propose = (quantity: number, unitPrice: number, secret = false) =>
    game.engines.tradeRequests.createRequest(alpha, {
      counterpartyId: game.teams.charlie.id,
      industry: 'Iron',
      quantity,
      unitPrice,
      secret,
    });

  describe('createRequest', () => {
    it('escrows the proposer\'s units', async () => {
      const request = expectSuccess(await propose(2, 5));

      expect(request).toMatchObject({
        proposer_team_id: game.teams.alpha.id,
        counterparty_team_id: game.teams.charlie.id,
        industry: 'Iron',
        quantity: 2,
        unit_price: 5,
        is_secret: false,
        status: 'pending',
      });
      const team = await getTeam(game.store, game.teams.alpha.id);
      expect(team.inventory.Iron.material_units).toBe(3);
    });

    it('only sells the proposer\'s own industry', async () => {
      const failure = expectFailure(
        await game.engines.tradeRequests.createRequest(alpha, {
          counterpartyId: game.teams.charlie.id,
          industry: 'Cement',
          quantity: 1,
          unitPrice: 5,
          secret: false,
        }),
        'IndustryMismatch'
      );
      expect(failure.message).toBe('Alpha Forge can only sell Iron, not Cement');
    });

    it('rejects self trades, unknown counterparties and short inventory', async () => {
      expectFailure(
        await game.engines.tradeRequests.createRequest(alpha, {
          counterpartyId: game.teams.alpha.id,
          industry: 'Iron',
          quantity: 1,
          unitPrice: 1,
          secret: false,
        }),
        'SelfTrade'
      );
      expectFailure(
        await game.engines.tradeRequests.createRequest(alpha, {
          counterpartyId: UNKNOWN_ID,
          industry: 'Iron',
          quantity: 1,
          unitPrice: 1,
          secret: false,
        }),
        'TeamNotFound'
      );
      expectFailure(await propose(6, 1), 'InsufficientInventory');
      expectFailure(await propose(0, 1), 'InvalidQuantity');
      expectFailure(await propose(1, -3), 'InvalidPrice');
      expectFailure(await propose(3, 2 ** 52), 'InvalidPrice');
    });

    it('only runs while the game is running', async () => {
      expectSuccess(await game.engines.admin.setStatus(ADMIN, 'paused'));
      expectFailure(await propose(1, 1), 'GameNotRunning');
    });
  });

  describe('accept', () => {
    it('settles the whole request', async () => {
      const request = expectSuccess(await propose(2, 5));

      const { request: accepted, settlement } = expectSuccess(
        await game.engines.tradeRequests.accept(charlie, request.id)
      );

      expect(accepted.status).toBe('accepted');
      expect(settlement).toMatchObject({
        source: 'trade_request',
        source_id: request.id,
        buyer_team_id: game.teams.charlie.id,
        seller_team_id: game.teams.alpha.id,
        quantity: 2,
        unit_price: 5,
        total_amount: 10,
        is_secret: false,
      });
      const seller = await getTeam(game.store, game.teams.alpha.id);
      const buyer = await getTeam(game.store, game.teams.charlie.id);
      expect(seller.balance).toBe(1010);
      expect(seller.inventory.Iron.material_units).toBe(3);
      expect(buyer.balance).toBe(990);
      expect(buyer.inventory.Iron.material_units).toBe(2);
    });

    it('is reserved for the counterparty', async () => {
      const request = expectSuccess(await propose(2, 5));

      expectFailure(await game.engines.tradeRequests.accept(bravo, request.id), 'NotCounterparty');
      expectFailure(await game.engines.tradeRequests.accept(alpha, request.id), 'NotCounterparty');
      expectFailure(await game.engines.tradeRequests.accept(charlie, UNKNOWN_ID), 'RequestNotFound');
    });

    it('keeps the request pending when the buyer cannot pay', async () => {
      await setBalance(game.store, game.teams.charlie.id, 9);
      const request = expectSuccess(await propose(2, 5));

      expectFailure(await game.engines.tradeRequests.accept(charlie, request.id), 'InsufficientFunds');

      const [listed] = expectSuccess(await game.engines.tradeRequests.listVisible(ADMIN));
      expect(listed.status).toBe('pending');
      const seller = await getTeam(game.store, game.teams.alpha.id);
      expect(seller.inventory.Iron.material_units).toBe(3);
    });

    it('settles once when accepted twice at the same time', async () => {
      const request = expectSuccess(await propose(2, 5));

      const [first, second] = await Promise.all([
        game.engines.tradeRequests.accept(charlie, request.id),
        game.engines.tradeRequests.accept(charlie, request.id),
      ]);

      expect(first.success).toBe(true);
      expectFailure(second, 'RequestNotPending');
      const buyer = await getTeam(game.store, game.teams.charlie.id);
      expect(buyer.balance).toBe(990);
    });
  });

  describe('reject and cancel', () => {
    it('refunds the proposer when the counterparty rejects', async () => {
      const request = expectSuccess(await propose(2, 5));

      expectFailure(await game.engines.tradeRequests.reject(alpha, request.id), 'NotCounterparty');
      const rejected = expectSuccess(await game.engines.tradeRequests.reject(charlie, request.id));
      expect(rejected.status).toBe('rejected');

      expectFailure(await game.engines.tradeRequests.reject(charlie, request.id), 'RequestNotPending');
      expectFailure(await game.engines.tradeRequests.cancel(alpha, request.id), 'RequestNotPending');

      const seller = await getTeam(game.store, game.teams.alpha.id);
      expect(seller.inventory.Iron.material_units).toBe(5);
    });

    it('refunds the proposer when it cancels', async () => {
      const request = expectSuccess(await propose(2, 5));

      expectFailure(await game.engines.tradeRequests.cancel(charlie, request.id), 'NotProposer');
      const cancelled = expectSuccess(await game.engines.tradeRequests.cancel(alpha, request.id));
      expect(cancelled.status).toBe('cancelled');
      expectFailure(await game.engines.tradeRequests.accept(charlie, request.id), 'RequestNotPending');

      const seller = await getTeam(game.store, game.teams.alpha.id);
      expect(seller.inventory.Iron.material_units).toBe(5);
    });
  });

  describe('listVisible', () => {
    it('hides secret deals from teams outside them', async () => {
      const secret = expectSuccess(await propose(2, 5, true));
      expectSuccess(await game.engines.tradeRequests.accept(charlie, secret.id));

      const forAdmin = expectSuccess(await game.engines.tradeRequests.listVisible(ADMIN));
      const forParty = expectSuccess(await game.engines.tradeRequests.listVisible(charlie));
      const forOutsider = expectSuccess(await game.engines.tradeRequests.listVisible(bravo));

      expect(forAdmin.map((r) => r.id)).toEqual([secret.id]);
      expect(forParty.map((r) => r.id)).toEqual([secret.id]);
      expect(forOutsider).toEqual([]);
    });

    it('shows outsiders accepted public deals but not pending ones', async () => {
      const accepted = expectSuccess(await propose(1, 5));
      expectSuccess(await game.engines.tradeRequests.accept(charlie, accepted.id));
      const pending = expectSuccess(await propose(1, 5));

      const forOutsider = expectSuccess(await game.engines.tradeRequests.listVisible(bravo));
      expect(forOutsider.map((r) => r.id)).toEqual([accepted.id]);

      const forProposer = expectSuccess(await game.engines.tradeRequests.listVisible(alpha));
      expect(forProposer.map((r) => r.id)).toEqual([pending.id, accepted.id]);
    });
  });
});
