import { perIndustry } from '../types';
import type { Industry, LedgerSnapshot } from '../types';
import type { GameConfig } from './GameContext';

/**
 * Prices the raw units consumed in production, which is the cost side of
 * leaderboard profit. Returns one unit cost per industry.
 */
export interface RawMaterialValuation {
  readonly name: string;
  unitCosts(snapshot: LedgerSnapshot): Record<Industry, number>;
}

/** Every raw unit costs the same, whatever its industry. */
export function fixedCostValuation(unitCost: number): RawMaterialValuation {
  return {
    name: `fixed(${unitCost})`,
    unitCosts: () => perIndustry(() => unitCost),
  };
}

/**
 * Volume-weighted average settlement price of each industry's material,
 * rounded to an integer. Industries that never traded cost `fallback`.
 */
export function marketPriceValuation(fallback: number): RawMaterialValuation {
  return {
    name: `market(fallback ${fallback})`,
    unitCosts: (snapshot) => {
      const volume = perIndustry(() => ({ units: 0, amount: 0 }));
      for (const s of snapshot.settlements) {
        volume[s.industry].units += s.quantity;
        volume[s.industry].amount += s.total_amount;
      }
      return perIndustry((industry) => {
        const { units, amount } = volume[industry];
        return units > 0 ? Math.round(amount / units) : fallback;
      });
    },
  };
}

export function valuationFromConfig(config: GameConfig): RawMaterialValuation {
  return config.profitValuation === 'market'
    ? marketPriceValuation(config.rawUnitCost)
    : fixedCostValuation(config.rawUnitCost);
}
