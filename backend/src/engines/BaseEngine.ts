import type { Actor, GameState, Industry, Team, TeamSnapshot, UnitKind } from '../types';
import type { LedgerReader, LedgerTransaction } from '../store/LedgerStore';
import { EngineError } from './errors';
import type { EngineResult, FailureCode } from './errors';
import type { GameContext } from './GameContext';

/**
 * Base for every engine.
 *
 * Commands run through `execute`: one ledger transaction per call. Rule
 * violations are thrown as EngineError from inside the transaction so the
 * store rolls back, then come back out as a failed EngineResult. Anything
 * else (a lost database connection, a bug) propagates to the caller.
 */
export abstract class BaseEngine {
  /** Log prefix, e.g. "Marketplace". */
  protected abstract readonly tag: string;

  constructor(protected readonly ctx: GameContext) {}

  protected async execute<T>(
    operation: string,
    work: (tx: LedgerTransaction) => Promise<T>
  ): Promise<EngineResult<T>> {
    try {
      const data = await this.ctx.store.transaction(work);
      return { success: true, data };
    } catch (error) {
      if (error instanceof EngineError) {
        console.log(`[${this.tag}] ${operation} rejected: ${error.code} (${error.message})`);
        return { success: false, error: error.toFailure() };
      }
      console.error(`[${this.tag}] ${operation} failed:`, error);
      throw error;
    }
  }

  /** Same contract as `execute`, over a read-only view of the ledger. */
  protected async query<T>(work: (reader: LedgerReader) => Promise<T>): Promise<EngineResult<T>> {
    try {
      const data = await this.ctx.store.read(work);
      return { success: true, data };
    } catch (error) {
      if (error instanceof EngineError) {
        return { success: false, error: error.toFailure() };
      }
      throw error;
    }
  }
}

// ============================================================================
// GUARDS (throw inside a transaction)
// ============================================================================

export function requireTeamActor(actor: Actor): string {
  if (actor.role !== 'team') {
    throw new EngineError('TeamOnly', 'Only a team can do this');
  }
  return actor.teamId;
}

export function requireAdminActor(actor: Actor): void {
  if (actor.role !== 'admin') {
    throw new EngineError('AdminOnly', 'Only the admin can do this');
  }
}

export async function requireRunning(reader: LedgerReader): Promise<GameState> {
  const game = await reader.getGame();
  if (game.status !== 'running') {
    throw new EngineError('GameNotRunning', `Game is ${game.status}, not running`);
  }
  return game;
}

export async function requireNotEnded(reader: LedgerReader): Promise<GameState> {
  const game = await reader.getGame();
  if (game.status === 'ended') {
    throw new EngineError('GameEnded', 'Game has ended');
  }
  return game;
}

export async function loadTeam(reader: LedgerReader, teamId: string): Promise<Team> {
  const team = await reader.getTeam(teamId);
  if (!team) {
    throw new EngineError('TeamNotFound', `Team ${teamId} not found`);
  }
  return team;
}

/** Largest unit count a team or offer can hold (32-bit INTEGER columns). */
export const MAX_UNITS = 2_147_483_647;

export function requirePositiveInt(value: number, what = 'Quantity'): number {
  if (!Number.isSafeInteger(value) || value <= 0 || value > MAX_UNITS) {
    throw new EngineError('InvalidQuantity', `${what} must be an integer from 1 to ${MAX_UNITS}, got ${value}`);
  }
  return value;
}

export function requirePrice(value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EngineError('InvalidPrice', `Unit price must be a non-negative safe integer, got ${value}`);
  }
  return value;
}

/** `quantity * unitPrice`, refused with InvalidPrice past the safe integer range. */
export function requireSafeTotal(quantity: number, unitPrice: number): number {
  const total = quantity * unitPrice;
  if (!Number.isSafeInteger(total)) {
    throw new EngineError('InvalidPrice', `Total of ${quantity} @ ${unitPrice} exceeds ${Number.MAX_SAFE_INTEGER}`);
  }
  return total;
}

/** The balance after adding `delta`, refused with `code` past the safe integer range. */
export function requireSafeBalance(
  team: Team,
  delta: number,
  code: Extract<FailureCode, 'InvalidPrice' | 'InvalidAdjustment'>
): number {
  const balance = team.balance + delta;
  if (!Number.isSafeInteger(balance)) {
    throw new EngineError(code, `Balance of ${team.name} would reach ${balance}`);
  }
  return balance;
}

/** The unit count after adding `delta`, refused with `code` above MAX_UNITS. */
export function requireUnitsFit(
  team: Team,
  industry: Industry,
  kind: UnitKind,
  delta: number,
  code: Extract<FailureCode, 'InvalidQuantity' | 'InvalidAdjustment'>
): number {
  const units = team.inventory[industry][kind] + delta;
  if (units > MAX_UNITS) {
    throw new EngineError(code, `${team.name} would hold ${units} ${industry} ${kind}, above ${MAX_UNITS}`);
  }
  return units;
}

export function toSnapshot(team: Team): TeamSnapshot {
  const { password_hash: _passwordHash, ...snapshot } = team;
  return snapshot;
}
