import { createEngines, createGameContext } from '..';
import type { EngineFailure, EngineResult, Engines, FailureCode, GameConfig } from '..';
import { toSnapshot } from '../BaseEngine';
import { MemoryLedgerStore } from '../../store/MemoryLedgerStore';
import type { Actor, Industry, TeamSnapshot, UnitKind } from '../../types';

export const ADMIN: Actor = { role: 'admin' };

/** Well-formed id that matches no row. */
export const UNKNOWN_ID = '00000000-0000-4000-8000-000000000000';

export function asTeam(team: { id: string }): Actor {
  return { role: 'team', teamId: team.id };
}

export function expectSuccess<T>(result: EngineResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.data;
}

export function expectFailure<T>(result: EngineResult<T>, code: FailureCode): EngineFailure {
  if (result.success) {
    throw new Error(`Expected ${code}, got success`);
  }
  if (result.error.code !== code) {
    throw new Error(`Expected ${code}, got ${result.error.code}: ${result.error.message}`);
  }
  return result.error;
}

export interface TestGame {
  store: MemoryLedgerStore;
  engines: Engines;
  /** Teams by short name: alpha (Iron), bravo (Cement), charlie (Energy), delta (Wood). */
  teams: Record<'alpha' | 'bravo' | 'charlie' | 'delta', TeamSnapshot>;
}

const ROSTER: Array<{ key: keyof TestGame['teams']; name: string; industry: Industry }> = [
  { key: 'alpha', name: 'Alpha Forge', industry: 'Iron' },
  { key: 'bravo', name: 'Bravo Kilns', industry: 'Cement' },
  { key: 'charlie', name: 'Charlie Power', industry: 'Energy' },
  { key: 'delta', name: 'Delta Timber', industry: 'Wood' },
];

/**
 * Four teams with 1000 currency and no raw units, status `running` unless
 * `start` is false. The clock ticks one second per call so creation order
 * is visible in timestamps.
 */
export async function createTestGame(
  options: { start?: boolean; config?: Partial<GameConfig> } = {}
): Promise<TestGame> {
  let tick = Date.UTC(2026, 0, 1);
  const store = new MemoryLedgerStore(() => new Date((tick += 1000)));
  const ctx = createGameContext(
    store,
    {
      initialBalance: 1000,
      rawUnitsMin: 0,
      rawUnitsMax: 0,
      rawUnitCost: 0,
      profitValuation: 'fixed',
      ...options.config,
    },
    () => 0
  );
  const engines = createEngines(ctx);

  const created = expectSuccess(
    await engines.admin.setupTeams(
      ADMIN,
      ROSTER.map(({ key, name, industry }) => ({ name, username: key, industry, password_hash: 'test-hash' }))
    )
  );
  const byName = (name: string): TeamSnapshot => {
    const team = created.find((t) => t.name === name);
    if (!team) throw new Error(`missing fixture team ${name}`);
    return team;
  };

  if (options.start !== false) {
    expectSuccess(await engines.admin.setStatus(ADMIN, 'running'));
  }

  return {
    store,
    engines,
    teams: {
      alpha: byName('Alpha Forge'),
      bravo: byName('Bravo Kilns'),
      charlie: byName('Charlie Power'),
      delta: byName('Delta Timber'),
    },
  };
}

/** Sets one inventory count directly in the ledger. */
export async function setUnits(
  store: MemoryLedgerStore,
  teamId: string,
  industry: Industry,
  kind: UnitKind,
  units: number
): Promise<void> {
  await store.transaction(async (tx) => {
    const team = await tx.getTeam(teamId);
    if (!team) throw new Error(`no team ${teamId}`);
    await tx.adjustInventory(teamId, industry, kind, units - team.inventory[industry][kind]);
  });
}

export async function setBalance(store: MemoryLedgerStore, teamId: string, balance: number): Promise<void> {
  await store.transaction(async (tx) => {
    const team = await tx.getTeam(teamId);
    if (!team) throw new Error(`no team ${teamId}`);
    await tx.adjustBalance(teamId, balance - team.balance);
  });
}

export async function getTeam(store: MemoryLedgerStore, teamId: string): Promise<TeamSnapshot> {
  const team = await store.read((reader) => reader.getTeam(teamId));
  if (!team) throw new Error(`no team ${teamId}`);
  return toSnapshot(team);
}

export async function totalCurrency(store: MemoryLedgerStore): Promise<number> {
  const teams = await store.read((reader) => reader.listTeams());
  return teams.reduce((sum, t) => sum + t.balance, 0);
}
