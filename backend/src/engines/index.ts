/**
 * Engine wiring: every engine of one game shares a single GameContext.
 * Build once at startup (server.ts) or per test.
 */
import { ExportService } from '../services/exportService';
import { AdminControl } from './AdminControl';
import type { GameContext } from './GameContext';
import { GiftEngine } from './GiftEngine';
import { LeaderboardEngine } from './LeaderboardEngine';
import { MarketplaceEngine } from './MarketplaceEngine';
import { ProductionEngine } from './ProductionEngine';
import { TeamDirectory } from './TeamDirectory';
import { TradeRequestEngine } from './TradeRequestEngine';
import { valuationFromConfig } from './valuation';
import type { RawMaterialValuation } from './valuation';

export interface Engines {
  admin: AdminControl;
  teams: TeamDirectory;
  production: ProductionEngine;
  marketplace: MarketplaceEngine;
  tradeRequests: TradeRequestEngine;
  gifts: GiftEngine;
  leaderboard: LeaderboardEngine;
  exports: ExportService;
}

export function createEngines(
  ctx: GameContext,
  valuation: RawMaterialValuation = valuationFromConfig(ctx.config)
): Engines {
  return {
    admin: new AdminControl(ctx),
    teams: new TeamDirectory(ctx),
    production: new ProductionEngine(ctx),
    marketplace: new MarketplaceEngine(ctx),
    tradeRequests: new TradeRequestEngine(ctx),
    gifts: new GiftEngine(ctx),
    leaderboard: new LeaderboardEngine(ctx, valuation),
    exports: new ExportService(ctx.store, valuation),
  };
}

export { createGameContext } from './GameContext';
export type { GameConfig, GameContext } from './GameContext';
export { EngineError } from './errors';
export type { EngineFailure, EngineResult, FailureCode } from './errors';
