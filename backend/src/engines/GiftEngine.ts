import type { Actor, Gift, TeamSnapshot, TeamSummary } from '../types';
import {
  BaseEngine,
  loadTeam,
  requireAdminActor,
  requireNotEnded,
  requirePositiveInt,
  requireUnitsFit,
  toSnapshot,
} from './BaseEngine';
import { EngineError } from './errors';
import type { EngineResult } from './errors';

export interface GrantedGift {
  gift: Gift;
  team: TeamSnapshot;
}

export interface GiftStatus {
  team_id: string;
  received: boolean;
  gift: Gift | null;
}

export class GiftEngine extends BaseEngine {
  protected readonly tag = 'Gift';

  /** One-shot grant of own-industry material units. Allowed until the game ends. */
  grantGift(actor: Actor, teamId: string, quantity: number): Promise<EngineResult<GrantedGift>> {
    return this.execute('grantGift', async (tx) => {
      requireAdminActor(actor);
      await requireNotEnded(tx);
      requirePositiveInt(quantity);

      const team = await loadTeam(tx, teamId);
      const previous = await tx.findGiftByTeam(teamId);
      if (previous) {
        throw new EngineError('GiftAlreadyGranted', `${team.name} already received a gift`);
      }

      requireUnitsFit(team, team.industry, 'material_units', quantity, 'InvalidQuantity');
      await tx.adjustInventory(teamId, team.industry, 'material_units', quantity);
      const gift = await tx.insertGift({ team_id: teamId, industry: team.industry, units: quantity });

      console.log(`[Gift] ${team.name} received ${quantity} ${team.industry}`);
      return { gift, team: toSnapshot(await loadTeam(tx, teamId)) };
    });
  }

  listGifts(actor: Actor): Promise<EngineResult<Gift[]>> {
    return this.query(async (reader) => {
      requireAdminActor(actor);
      return reader.listGifts();
    });
  }

  listTeamsWithoutGift(actor: Actor): Promise<EngineResult<TeamSummary[]>> {
    return this.query(async (reader) => {
      requireAdminActor(actor);
      const gifted = new Set((await reader.listGifts()).map((g) => g.team_id));
      const teams = await reader.listTeams();
      return teams
        .filter((t) => !gifted.has(t.id))
        .map(({ id, name, industry, position }) => ({ id, name, industry, position }));
    });
  }

  getGiftStatus(teamId: string): Promise<EngineResult<GiftStatus>> {
    return this.query(async (reader) => {
      await loadTeam(reader, teamId);
      const gift = await reader.findGiftByTeam(teamId);
      return { team_id: teamId, received: gift !== null, gift };
    });
  }
}
