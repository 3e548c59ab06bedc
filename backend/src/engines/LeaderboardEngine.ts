import { otherIndustries } from '../types';
import type { Actor, Industry, LedgerSnapshot, Settlement } from '../types';
import { readSnapshot } from '../store/snapshot';
import { BaseEngine, loadTeam } from './BaseEngine';
import type { EngineResult } from './errors';
import type { GameContext } from './GameContext';
import type { RawMaterialValuation } from './valuation';

export interface LeaderboardRow {
  rank: number;
  team_id: string;
  team_name: string;
  industry: Industry;
  revenue: number;
  raw_material_cost: number;
  profit: number;
  total_production: number;
  total_purchases: number;
  balance: number;
}

export interface Deal {
  id: string;
  source: Settlement['source'];
  industry: Industry;
  quantity: number;
  unit_price: number;
  total_amount: number;
  is_secret: boolean;
  buyer_team_id: string;
  buyer_name: string;
  seller_team_id: string;
  seller_name: string;
  created_at: Date;
}

const RANKING_KEYS = ['revenue', 'profit', 'total_production', 'total_purchases'] as const;

/**
 * Ranks every team from a ledger snapshot. Secret settlements count like any
 * other. Sorted descending by revenue, profit, total production, then total
 * purchases; teams equal on all four stay in creation order.
 */
export function computeLeaderboard(
  snapshot: LedgerSnapshot,
  valuation: RawMaterialValuation
): LeaderboardRow[] {
  const unitCosts = valuation.unitCosts(snapshot);

  const rows = [...snapshot.teams]
    .sort((a, b) => a.position - b.position)
    .map((team) => {
      let revenue = 0;
      let totalPurchases = 0;
      for (const s of snapshot.settlements) {
        if (s.seller_team_id === team.id) revenue += s.total_amount;
        if (s.buyer_team_id === team.id) totalPurchases += s.total_amount;
      }

      const costPerUnit = otherIndustries(team.industry).reduce((sum, i) => sum + unitCosts[i], 0);
      let totalProduction = 0;
      for (const log of snapshot.productionLogs) {
        if (log.team_id === team.id) totalProduction += log.units_produced;
      }
      const rawMaterialCost = totalProduction * costPerUnit;

      return {
        rank: 0,
        team_id: team.id,
        team_name: team.name,
        industry: team.industry,
        revenue,
        raw_material_cost: rawMaterialCost,
        profit: revenue - rawMaterialCost,
        total_production: totalProduction,
        total_purchases: totalPurchases,
        balance: team.balance,
      };
    });

  rows.sort((a, b) => {
    for (const key of RANKING_KEYS) {
      if (a[key] !== b[key]) return b[key] - a[key];
    }
    return 0;
  });

  return rows.map((row, index) => ({ ...row, rank: index + 1 }));
}

export class LeaderboardEngine extends BaseEngine {
  protected readonly tag = 'Leaderboard';

  constructor(
    ctx: GameContext,
    private readonly valuation: RawMaterialValuation
  ) {
    super(ctx);
  }

  /** Same rows for the admin and for every team. */
  getLeaderboard(actor: Actor): Promise<EngineResult<LeaderboardRow[]>> {
    return this.query(async (reader) => {
      if (actor.role === 'team') await loadTeam(reader, actor.teamId);
      return computeLeaderboard(await readSnapshot(reader), this.valuation);
    });
  }

  /**
   * Completed exchanges, newest first. A team sees public deals and the secret
   * ones it took part in; the admin sees everything.
   */
  getRecentDeals(actor: Actor, limit = 20): Promise<EngineResult<Deal[]>> {
    return this.query(async (reader) => {
      const teams = await reader.listTeams();
      const names = new Map(teams.map((t) => [t.id, t.name]));
      const settlements = (await reader.listSettlements()).reverse();

      const viewer = actor.role === 'team' ? actor.teamId : null;
      const visible =
        viewer === null
          ? settlements
          : settlements.filter(
              (s) => !s.is_secret || s.buyer_team_id === viewer || s.seller_team_id === viewer
            );

      return visible.slice(0, limit).map((s) => ({
        id: s.id,
        source: s.source,
        industry: s.industry,
        quantity: s.quantity,
        unit_price: s.unit_price,
        total_amount: s.total_amount,
        is_secret: s.is_secret,
        buyer_team_id: s.buyer_team_id,
        buyer_name: names.get(s.buyer_team_id) ?? 'Unknown',
        seller_team_id: s.seller_team_id,
        seller_name: names.get(s.seller_team_id) ?? 'Unknown',
        created_at: s.created_at,
      }));
    });
  }
}
