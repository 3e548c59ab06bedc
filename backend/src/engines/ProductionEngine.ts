import { otherIndustries } from '../types';
import type { Actor, Industry, ProductionLog, TeamSnapshot } from '../types';
import {
  BaseEngine,
  loadTeam,
  requirePositiveInt,
  requireRunning,
  requireTeamActor,
  requireUnitsFit,
  toSnapshot,
} from './BaseEngine';
import { EngineError } from './errors';
import type { EngineResult } from './errors';

export interface ProductionResult {
  team: TeamSnapshot;
  log: ProductionLog;
}

export interface RawRequirement {
  industry: Industry;
  required: number;
  available: number;
  sufficient: boolean;
}

export interface ProductionRequirements {
  industry: Industry;
  quantity: number;
  can_produce: boolean;
  requirements: RawRequirement[];
}

/**
 * Production: one material unit of a team's own industry costs one raw unit
 * from each of the four other industries.
 */
export class ProductionEngine extends BaseEngine {
  protected readonly tag = 'Production';

  produce(actor: Actor, quantity: number): Promise<EngineResult<ProductionResult>> {
    return this.execute('produce', async (tx) => {
      const teamId = requireTeamActor(actor);
      await requireRunning(tx);
      requirePositiveInt(quantity);

      const team = await loadTeam(tx, teamId);
      const inputs = otherIndustries(team.industry);
      const short = inputs.filter((industry) => team.inventory[industry].raw_units < quantity);
      if (short.length > 0) {
        throw new EngineError(
          'InsufficientRawMaterials',
          `Producing ${quantity} ${team.industry} needs ${quantity} raw units of ${short.join(', ')}`
        );
      }
      requireUnitsFit(team, team.industry, 'material_units', quantity, 'InvalidQuantity');

      for (const industry of inputs) {
        await tx.adjustInventory(teamId, industry, 'raw_units', -quantity);
      }
      await tx.adjustInventory(teamId, team.industry, 'material_units', quantity);

      const log = await tx.insertProductionLog({
        team_id: teamId,
        industry: team.industry,
        units_produced: quantity,
        raw_units_consumed: quantity * inputs.length,
      });

      console.log(`[Production] ${team.name} produced ${quantity} ${team.industry}`);
      return { team: toSnapshot(await loadTeam(tx, teamId)), log };
    });
  }

  getRequirements(teamId: string, quantity: number): Promise<EngineResult<ProductionRequirements>> {
    return this.query(async (reader) => {
      requirePositiveInt(quantity);
      const team = await loadTeam(reader, teamId);

      const requirements = otherIndustries(team.industry).map((industry) => {
        const available = team.inventory[industry].raw_units;
        return { industry, required: quantity, available, sufficient: available >= quantity };
      });

      return {
        industry: team.industry,
        quantity,
        can_produce: requirements.every((r) => r.sufficient),
        requirements,
      };
    });
  }

  /** Most recent production runs of a team, newest first. */
  getHistory(teamId: string, limit = 10): Promise<EngineResult<ProductionLog[]>> {
    return this.query(async (reader) => {
      requirePositiveInt(limit, 'Limit');
      await loadTeam(reader, teamId);
      const logs = await reader.listProductionLogs();
      return logs
        .filter((log) => log.team_id === teamId)
        .reverse()
        .slice(0, limit);
    });
  }
}
