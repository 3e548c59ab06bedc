import { INDUSTRIES, perIndustry } from '../types';
import type {
  Actor,
  Adjustment,
  GameState,
  GameStatus,
  Industry,
  TeamSeed,
  TeamSnapshot,
  UnitKind,
} from '../types';
import type { LedgerTransaction } from '../store/LedgerStore';
import {
  BaseEngine,
  loadTeam,
  MAX_UNITS,
  requireAdminActor,
  requireNotEnded,
  requirePositiveInt,
  requireSafeBalance,
  requireUnitsFit,
  toSnapshot,
} from './BaseEngine';
import { EngineError } from './errors';
import type { EngineResult } from './errors';

/** Allowed moves of the game status machine. `ended` is terminal. */
export const STATUS_TRANSITIONS: Record<GameStatus, readonly GameStatus[]> = {
  setup: ['running'],
  running: ['paused', 'ended'],
  paused: ['running', 'ended'],
  ended: [],
};

export interface AdjustmentResult {
  team: TeamSnapshot;
  adjustment: Adjustment;
}

export interface RawUnitRange {
  min: number;
  max: number;
}

function requireReason(reason: string): string {
  const trimmed = reason.trim();
  if (trimmed === '') {
    throw new EngineError('InvalidAdjustment', 'An adjustment needs a reason');
  }
  return trimmed;
}

function requireDelta(delta: number): number {
  if (!Number.isSafeInteger(delta) || delta === 0) {
    throw new EngineError('InvalidAdjustment', `Delta must be a non-zero safe integer, got ${delta}`);
  }
  return delta;
}

export class AdminControl extends BaseEngine {
  protected readonly tag = 'Admin';

  setStatus(actor: Actor, next: GameStatus): Promise<EngineResult<GameState>> {
    return this.execute('setStatus', async (tx) => {
      requireAdminActor(actor);
      const game = await tx.getGame();
      if (!STATUS_TRANSITIONS[game.status].includes(next)) {
        throw new EngineError('InvalidStatusTransition', `Cannot move from ${game.status} to ${next}`);
      }

      console.log(`[Admin] Game ${game.status} -> ${next}`);
      return tx.setGameStatus(next);
    });
  }

  getStatus(): Promise<EngineResult<GameState>> {
    return this.query((reader) => reader.getGame());
  }

  /** Adds `delta` to a team's balance. The balance may go negative. */
  adjustBalance(
    actor: Actor,
    teamId: string,
    delta: number,
    reason: string
  ): Promise<EngineResult<AdjustmentResult>> {
    return this.execute('adjustBalance', async (tx) => {
      requireAdminActor(actor);
      await requireNotEnded(tx);
      requireDelta(delta);
      const why = requireReason(reason);

      const team = await loadTeam(tx, teamId);
      requireSafeBalance(team, delta, 'InvalidAdjustment');
      await tx.adjustBalance(teamId, delta);
      const adjustment = await tx.insertAdjustment({
        team_id: teamId,
        kind: 'balance',
        industry: null,
        delta,
        reason: why,
      });

      console.log(`[Admin] Balance of ${team.name} ${delta > 0 ? '+' : ''}${delta}: ${why}`);
      return { team: toSnapshot(await loadTeam(tx, teamId)), adjustment };
    });
  }

  /** Adds `delta` raw or material units. The count may not go below zero. */
  adjustInventory(
    actor: Actor,
    teamId: string,
    industry: Industry,
    kind: UnitKind,
    delta: number,
    reason: string
  ): Promise<EngineResult<AdjustmentResult>> {
    return this.execute('adjustInventory', async (tx) => {
      requireAdminActor(actor);
      await requireNotEnded(tx);
      requireDelta(delta);
      const why = requireReason(reason);

      const team = await loadTeam(tx, teamId);
      const current = team.inventory[industry][kind];
      if (current + delta < 0) {
        throw new EngineError(
          'InsufficientInventory',
          `${team.name} holds ${current} ${industry} ${kind}, cannot remove ${-delta}`
        );
      }
      requireUnitsFit(team, industry, kind, delta, 'InvalidAdjustment');

      await tx.adjustInventory(teamId, industry, kind, delta);
      const adjustment = await tx.insertAdjustment({ team_id: teamId, kind, industry, delta, reason: why });

      console.log(`[Admin] ${industry} ${kind} of ${team.name} ${delta > 0 ? '+' : ''}${delta}: ${why}`);
      return { team: toSnapshot(await loadTeam(tx, teamId)), adjustment };
    });
  }

  /**
   * Creates the teams of a new game with the configured starting balance and
   * a random raw allocation per industry. Only while the game is in setup.
   */
  setupTeams(actor: Actor, seeds: TeamSeed[]): Promise<EngineResult<TeamSnapshot[]>> {
    return this.execute('setupTeams', async (tx) => {
      requireAdminActor(actor);
      const game = await tx.getGame();
      if (game.status !== 'setup') {
        throw new EngineError('GameNotInSetup', `Teams can only be created in setup, game is ${game.status}`);
      }
      requirePositiveInt(seeds.length, 'Team count');

      const existing = await tx.listTeams();
      const names = new Set(existing.map((t) => t.name));
      const usernames = new Set(existing.map((t) => t.username));
      for (const seed of seeds) {
        if (names.has(seed.name) || usernames.has(seed.username)) {
          throw new EngineError('DuplicateTeam', `Team ${seed.name} (${seed.username}) already exists`);
        }
        names.add(seed.name);
        usernames.add(seed.username);
      }

      const range = this.defaultRange();
      const created: TeamSnapshot[] = [];
      for (const seed of seeds) {
        const team = await tx.insertTeam({
          ...seed,
          initial_balance: this.ctx.config.initialBalance,
          raw_units: perIndustry(() => this.roll(range)),
        });
        created.push(toSnapshot(team));
      }

      console.log(`[Admin] Created ${created.length} teams`);
      return created;
    });
  }

  /** Re-rolls every team's raw units. Missing bounds come from the config. */
  reallocateRawUnits(actor: Actor, bounds: Partial<RawUnitRange> = {}): Promise<EngineResult<TeamSnapshot[]>> {
    return this.execute('reallocateRawUnits', async (tx) => {
      requireAdminActor(actor);
      const defaults = this.defaultRange();
      const range = { min: bounds.min ?? defaults.min, max: bounds.max ?? defaults.max };
      await requireNotEnded(tx);
      const { min, max } = range;
      if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < min || max > MAX_UNITS) {
        throw new EngineError('InvalidQuantity', `Invalid raw unit range ${range.min}..${range.max}`);
      }

      const teams = await tx.listTeams();
      for (const team of teams) {
        await this.reroll(tx, team.id, range);
      }

      const updated: TeamSnapshot[] = [];
      for (const team of teams) {
        updated.push(toSnapshot(await loadTeam(tx, team.id)));
      }

      console.log(`[Admin] Reallocated raw units for ${teams.length} teams (${range.min}..${range.max})`);
      return updated;
    });
  }

  private async reroll(tx: LedgerTransaction, teamId: string, range: RawUnitRange): Promise<void> {
    for (const industry of INDUSTRIES) {
      await tx.setRawUnits(teamId, industry, this.roll(range));
    }
  }

  private defaultRange(): RawUnitRange {
    return { min: this.ctx.config.rawUnitsMin, max: this.ctx.config.rawUnitsMax };
  }

  // Uniform integer in [min, max]
  private roll({ min, max }: RawUnitRange): number {
    return min + Math.floor(this.ctx.random() * (max - min + 1));
  }
}
