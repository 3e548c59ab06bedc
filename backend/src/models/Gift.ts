import type { Row, SqlClient } from '../config/database';
import type { Gift } from '../types';
import type { NewGift } from '../store/LedgerStore';

export class GiftModel {
  // Record a gift (gifts.team_id is UNIQUE)
  static async create(client: SqlClient, gift: NewGift): Promise<Gift> {
    const result = await client.query<Row<Gift>>(
      `INSERT INTO gifts (team_id, industry, units)
       VALUES ($1, $2, $3)
       RETURNING id, team_id, industry, units, created_at`,
      [gift.team_id, gift.industry, gift.units]
    );
    return result.rows[0];
  }

  // Get the gift a team received, if any
  static async findByTeam(client: SqlClient, teamId: string): Promise<Gift | null> {
    const result = await client.query<Row<Gift>>(
      'SELECT id, team_id, industry, units, created_at FROM gifts WHERE team_id = $1',
      [teamId]
    );
    return result.rows[0] || null;
  }

  // Get all gifts
  static async findAll(client: SqlClient): Promise<Gift[]> {
    const result = await client.query<Row<Gift>>(
      'SELECT id, team_id, industry, units, created_at FROM gifts ORDER BY created_at, id'
    );
    return result.rows;
  }
}
