import bcrypt from 'bcryptjs';
import rosterJson from '../data/teams.json';
import type { TeamSeed } from '../types';
import { rosterFile } from '../validation/schemas';

export interface TeamInput {
  name: string;
  username: string;
  industry: TeamSeed['industry'];
  password: string;
}

const BCRYPT_ROUNDS = 10;

/** The bundled twenty-team roster, four teams per industry. */
export function defaultRoster(password: string): TeamInput[] {
  return rosterFile.parse(rosterJson).map((team) => ({ ...team, password }));
}

/** Hashes passwords so plaintext never reaches the ledger. */
export async function toSeeds(teams: TeamInput[], rounds = BCRYPT_ROUNDS): Promise<TeamSeed[]> {
  return Promise.all(
    teams.map(async ({ password, ...team }) => ({
      ...team,
      password_hash: await bcrypt.hash(password, rounds),
    }))
  );
}
