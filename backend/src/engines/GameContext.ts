import { env } from '../config/env';
import type { LedgerStore } from '../store/LedgerStore';

export interface GameConfig {
  initialBalance: number;
  rawUnitsMin: number;
  rawUnitsMax: number;
  rawUnitCost: number;
  profitValuation: 'fixed' | 'market';
}

/**
 * Everything an engine needs, passed to its constructor. One context per game;
 * tests build their own around a fresh MemoryLedgerStore.
 */
export interface GameContext {
  store: LedgerStore;
  config: GameConfig;
  /** Returns a float in [0, 1), like Math.random. */
  random: () => number;
}

export const defaultGameConfig: GameConfig = {
  initialBalance: env.initialBalance,
  rawUnitsMin: env.rawUnitsMin,
  rawUnitsMax: env.rawUnitsMax,
  rawUnitCost: env.rawUnitCost,
  profitValuation: env.profitValuation,
};

export function createGameContext(
  store: LedgerStore,
  config: Partial<GameConfig> = {},
  random: () => number = Math.random
): GameContext {
  return { store, config: { ...defaultGameConfig, ...config }, random };
}
