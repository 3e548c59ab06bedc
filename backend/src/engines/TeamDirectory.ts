import type { Actor, TeamSnapshot, TeamSummary } from '../types';
import { BaseEngine, loadTeam, toSnapshot } from './BaseEngine';
import { EngineError } from './errors';
import type { EngineResult } from './errors';

export interface TeamCredentials {
  teamId: string;
  passwordHash: string;
}

export class TeamDirectory extends BaseEngine {
  protected readonly tag = 'Teams';

  /** Full balance and inventory, for the team itself or the admin. */
  getTeamSnapshot(actor: Actor, teamId: string): Promise<EngineResult<TeamSnapshot>> {
    return this.query(async (reader) => {
      if (actor.role === 'team' && actor.teamId !== teamId) {
        throw new EngineError('NotTeamMember', 'Teams can only view their own holdings');
      }
      return toSnapshot(await loadTeam(reader, teamId));
    });
  }

  /** Public roster in creation order. */
  listTeams(): Promise<EngineResult<TeamSummary[]>> {
    return this.query(async (reader) => {
      const teams = await reader.listTeams();
      return teams
        .sort((a, b) => a.position - b.position)
        .map(({ id, name, industry, position }) => ({ id, name, industry, position }));
    });
  }

  // Login lookup
  async findCredentials(username: string): Promise<TeamCredentials | null> {
    const team = await this.ctx.store.read((reader) => reader.findTeamByUsername(username));
    return team ? { teamId: team.id, passwordHash: team.password_hash } : null;
  }
}
