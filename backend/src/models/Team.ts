import type { Row, SqlClient } from '../config/database';
import { INDUSTRIES, perIndustry } from '../types';
import type { Industry, InventoryEntry, Team, UnitKind } from '../types';
import type { NewTeam } from '../store/LedgerStore';

type TeamRow = Omit<Team, 'inventory'>;

type InventoryRow = {
  team_id: string;
  industry: Industry;
  raw_units: number;
  material_units: number;
};

const TEAM_COLUMNS =
  'id, name, username, password_hash, industry, initial_balance, balance, position, created_at';

function withInventory(row: TeamRow, inventoryRows: InventoryRow[]): Team {
  const inventory = perIndustry((industry): InventoryEntry => {
    const entry = inventoryRows.find((r) => r.team_id === row.id && r.industry === industry);
    return {
      raw_units: entry ? entry.raw_units : 0,
      material_units: entry ? entry.material_units : 0,
    };
  });
  return { ...row, inventory };
}

export class TeamModel {
  // Create a team with one inventory row per industry
  static async create(client: SqlClient, seed: NewTeam): Promise<Team> {
    const result = await client.query<Row<TeamRow>>(
      `INSERT INTO teams (name, username, password_hash, industry, initial_balance, balance)
       VALUES ($1, $2, $3, $4, $5, $5)
       RETURNING ${TEAM_COLUMNS}`,
      [seed.name, seed.username, seed.password_hash, seed.industry, seed.initial_balance]
    );
    const team = result.rows[0];

    const inventory = await client.query<InventoryRow>(
      `INSERT INTO inventory (team_id, industry, raw_units, material_units)
       SELECT $1, industry, raw_units, 0
       FROM UNNEST($2::varchar[], $3::int[]) AS seed(industry, raw_units)
       RETURNING team_id, industry, raw_units, material_units`,
      [team.id, [...INDUSTRIES], INDUSTRIES.map((i) => seed.raw_units[i])]
    );

    return withInventory(team, inventory.rows);
  }

  // Get team by ID; lock = hold the team and its inventory rows until commit
  static async findById(client: SqlClient, id: string, lock = false): Promise<Team | null> {
    const suffix = lock ? ' FOR UPDATE' : '';
    const result = await client.query<Row<TeamRow>>(
      `SELECT ${TEAM_COLUMNS} FROM teams WHERE id = $1${suffix}`,
      [id]
    );
    const row = result.rows[0];
    if (!row) return null;

    const inventory = await client.query<InventoryRow>(
      `SELECT team_id, industry, raw_units, material_units FROM inventory WHERE team_id = $1${suffix}`,
      [id]
    );
    return withInventory(row, inventory.rows);
  }

  // Get team by login name
  static async findByUsername(client: SqlClient, username: string): Promise<Team | null> {
    const result = await client.query<{ id: string }>(
      'SELECT id FROM teams WHERE username = $1',
      [username]
    );
    const row = result.rows[0];
    return row ? TeamModel.findById(client, row.id) : null;
  }

  // Get all teams in creation order
  static async findAll(client: SqlClient): Promise<Team[]> {
    const teams = await client.query<Row<TeamRow>>(`SELECT ${TEAM_COLUMNS} FROM teams ORDER BY position`);
    const inventory = await client.query<InventoryRow>(
      'SELECT team_id, industry, raw_units, material_units FROM inventory'
    );
    return teams.rows.map((row) => withInventory(row, inventory.rows));
  }

  // Add (or with a negative delta, remove) currency
  static async adjustBalance(client: SqlClient, id: string, delta: number): Promise<void> {
    await client.query('UPDATE teams SET balance = balance + $1 WHERE id = $2', [delta, id]);
  }

  // Add or remove raw/material units; the CHECK constraint rejects negatives
  static async adjustInventory(
    client: SqlClient,
    id: string,
    industry: Industry,
    kind: UnitKind,
    delta: number
  ): Promise<void> {
    const column = kind === 'raw_units' ? 'raw_units' : 'material_units';
    await client.query(
      `UPDATE inventory SET ${column} = ${column} + $1, updated_at = NOW()
       WHERE team_id = $2 AND industry = $3`,
      [delta, id, industry]
    );
  }

  // Overwrite raw units (admin reallocation)
  static async setRawUnits(client: SqlClient, id: string, industry: Industry, units: number): Promise<void> {
    await client.query(
      `UPDATE inventory SET raw_units = $1, updated_at = NOW()
       WHERE team_id = $2 AND industry = $3`,
      [units, id, industry]
    );
  }
}
