import { describe, it, expect, beforeEach } from '@jest/globals';
import { createEngines, createGameContext } from '..';
import { MemoryLedgerStore } from '../../store/MemoryLedgerStore';
import type { GameStatus, TeamSeed } from '../../types';
import { STATUS_TRANSITIONS } from '../AdminControl';
import { MAX_UNITS } from '../BaseEngine';
import {
  ADMIN,
  asTeam,
  createTestGame,
  expectFailure,
  expectSuccess,
  getTeam,
  totalCurrency,
  UNKNOWN_ID,
} from './fixtures';
import type { TestGame } from './fixtures';

const seed = (name: string, username: string): TeamSeed => ({
  name,
  username,
  industry: 'Aluminium',
  password_hash: 'test-hash',
});

describe('AdminControl', () => {
  describe('status', () => {
    const statuses: GameStatus[] = ['setup', 'running', 'paused', 'ended'];
    const pathTo: Record<GameStatus, GameStatus[]> = {
      setup: [],
      running: ['running'],
      paused: ['running', 'paused'],
      ended: ['running', 'ended'],
    };

    for (const from of statuses) {
      for (const to of statuses) {
        const allowed = STATUS_TRANSITIONS[from].includes(to);
        it(`${allowed ? 'allows' : 'refuses'} ${from} -> ${to}`, async () => {
          const game = await createTestGame({ start: false });
          for (const step of pathTo[from]) {
            expectSuccess(await game.engines.admin.setStatus(ADMIN, step));
          }

          const result = await game.engines.admin.setStatus(ADMIN, to);
          if (allowed) {
            expect(expectSuccess(result).status).toBe(to);
          } else {
            expectFailure(result, 'InvalidStatusTransition');
            expect(expectSuccess(await game.engines.admin.getStatus()).status).toBe(from);
          }
        });
      }
    }

    it('is admin only', async () => {
      const game = await createTestGame({ start: false });
      expectFailure(await game.engines.admin.setStatus(asTeam(game.teams.alpha), 'running'), 'AdminOnly');
    });
  });

  describe('adjustments', () => {
    let game: TestGame;

    beforeEach(async () => {
      game = await createTestGame();
    });

    it('adds to a balance and records why', async () => {
      const { team, adjustment } = expectSuccess(
        await game.engines.admin.adjustBalance(ADMIN, game.teams.alpha.id, -1200, '  penalty  ')
      );

      expect(team.balance).toBe(-200);
      expect(adjustment).toMatchObject({
        team_id: game.teams.alpha.id,
        kind: 'balance',
        industry: null,
        delta: -1200,
        reason: 'penalty',
      });
      expect(await totalCurrency(game.store)).toBe(2800);
    });

    it('requires a non-zero integer delta and a reason', async () => {
      expectFailure(await game.engines.admin.adjustBalance(ADMIN, game.teams.alpha.id, 0, 'noop'), 'InvalidAdjustment');
      expectFailure(await game.engines.admin.adjustBalance(ADMIN, game.teams.alpha.id, 1.5, 'half'), 'InvalidAdjustment');
      expectFailure(await game.engines.admin.adjustBalance(ADMIN, game.teams.alpha.id, 5, '   '), 'InvalidAdjustment');
      expectFailure(await game.engines.admin.adjustBalance(ADMIN, UNKNOWN_ID, 5, 'bonus'), 'TeamNotFound');
      expectFailure(
        await game.engines.admin.adjustBalance(asTeam(game.teams.alpha), game.teams.alpha.id, 5, 'bonus'),
        'AdminOnly'
      );
    });

    it('keeps balances and counts within their numeric range', async () => {
      const balance = await game.engines.admin.adjustBalance(
        ADMIN,
        game.teams.alpha.id,
        Number.MAX_SAFE_INTEGER,
        'windfall'
      );
      expectFailure(balance, 'InvalidAdjustment');
      const units = await game.engines.admin.adjustInventory(
        ADMIN,
        game.teams.alpha.id,
        'Wood',
        'raw_units',
        MAX_UNITS + 1,
        'windfall'
      );
      const failure = expectFailure(units, 'InvalidAdjustment');
      expect(failure.message).toBe('Alpha Forge would hold 2147483648 Wood raw_units, above 2147483647');

      const after = await getTeam(game.store, game.teams.alpha.id);
      expect(after.balance).toBe(1000);
      expect(after.inventory.Wood.raw_units).toBe(0);
    });

    it('never takes inventory below zero', async () => {
      const { team } = expectSuccess(
        await game.engines.admin.adjustInventory(ADMIN, game.teams.alpha.id, 'Wood', 'raw_units', 3, 'top up')
      );
      expect(team.inventory.Wood.raw_units).toBe(3);

      const failure = expectFailure(
        await game.engines.admin.adjustInventory(ADMIN, game.teams.alpha.id, 'Wood', 'raw_units', -4, 'take back'),
        'InsufficientInventory'
      );
      expect(failure.message).toBe('Alpha Forge holds 3 Wood raw_units, cannot remove 4');

      const after = await getTeam(game.store, game.teams.alpha.id);
      expect(after.inventory.Wood.raw_units).toBe(3);
    });

    it('stops once the game has ended', async () => {
      expectSuccess(await game.engines.admin.setStatus(ADMIN, 'ended'));

      expectFailure(await game.engines.admin.adjustBalance(ADMIN, game.teams.alpha.id, 5, 'late'), 'GameEnded');
      expectFailure(
        await game.engines.admin.adjustInventory(ADMIN, game.teams.alpha.id, 'Iron', 'material_units', 1, 'late'),
        'GameEnded'
      );
    });
  });

  describe('setupTeams', () => {
    it('gives each team the starting balance and a random raw allocation', async () => {
      const rolls = [0, 0.5, 0.999];
      let call = 0;
      const store = new MemoryLedgerStore();
      const engines = createEngines(
        createGameContext(store, { initialBalance: 500, rawUnitsMin: 10, rawUnitsMax: 50 }, () => rolls[call++ % 3])
      );

      const [team] = expectSuccess(await engines.admin.setupTeams(ADMIN, [seed('Echo Metals', 'echo')]));

      expect(team.balance).toBe(500);
      expect(team.initial_balance).toBe(500);
      expect(team.position).toBe(1);
      expect(team.inventory).toEqual({
        Cement: { raw_units: 10, material_units: 0 },
        Energy: { raw_units: 30, material_units: 0 },
        Iron: { raw_units: 50, material_units: 0 },
        Aluminium: { raw_units: 10, material_units: 0 },
        Wood: { raw_units: 30, material_units: 0 },
      });
    });

    it('refuses duplicate names or usernames', async () => {
      const game = await createTestGame({ start: false });

      expectFailure(await game.engines.admin.setupTeams(ADMIN, [seed('Alpha Forge', 'fresh')]), 'DuplicateTeam');
      expectFailure(await game.engines.admin.setupTeams(ADMIN, [seed('Fresh', 'alpha')]), 'DuplicateTeam');
      expectFailure(
        await game.engines.admin.setupTeams(ADMIN, [seed('Echo', 'echo'), seed('Echo', 'echo2')]),
        'DuplicateTeam'
      );
      expect(expectSuccess(await game.engines.teams.listTeams())).toHaveLength(4);
    });

    it('needs at least one team and a game in setup', async () => {
      const game = await createTestGame({ start: false });
      expectFailure(await game.engines.admin.setupTeams(ADMIN, []), 'InvalidQuantity');

      expectSuccess(await game.engines.admin.setStatus(ADMIN, 'running'));
      expectFailure(await game.engines.admin.setupTeams(ADMIN, [seed('Echo', 'echo')]), 'GameNotInSetup');
    });
  });

  describe('reallocateRawUnits', () => {
    it('re-rolls every team within the given bounds', async () => {
      const game = await createTestGame();

      const teams = expectSuccess(await game.engines.admin.reallocateRawUnits(ADMIN, { min: 7, max: 7 }));

      expect(teams).toHaveLength(4);
      for (const team of teams) {
        expect(Object.values(team.inventory).map((entry) => entry.raw_units)).toEqual([7, 7, 7, 7, 7]);
      }
    });

    it('falls back to the configured bounds and validates the range', async () => {
      const game = await createTestGame({ config: { rawUnitsMin: 3, rawUnitsMax: 9 } });

      // random() is 0 in the fixture, so every roll lands on min
      const teams = expectSuccess(await game.engines.admin.reallocateRawUnits(ADMIN, { min: 4 }));
      expect(teams[0].inventory.Cement.raw_units).toBe(4);

      expectFailure(await game.engines.admin.reallocateRawUnits(ADMIN, { min: 10 }), 'InvalidQuantity');
      expectFailure(await game.engines.admin.reallocateRawUnits(ADMIN, { min: -1, max: 2 }), 'InvalidQuantity');

      expectSuccess(await game.engines.admin.setStatus(ADMIN, 'ended'));
      expectFailure(await game.engines.admin.reallocateRawUnits(ADMIN), 'GameEnded');
    });
  });
});
