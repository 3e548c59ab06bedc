import type { Row, SqlClient } from '../config/database';
import type { Adjustment } from '../types';
import type { NewAdjustment } from '../store/LedgerStore';

export class AdjustmentModel {
  // Log an admin correction
  static async create(client: SqlClient, adjustment: NewAdjustment): Promise<Adjustment> {
    const result = await client.query<Row<Adjustment>>(
      `INSERT INTO adjustments (team_id, kind, industry, delta, reason)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id, team_id, kind, industry, delta, reason, created_at`,
      [adjustment.team_id, adjustment.kind, adjustment.industry, adjustment.delta, adjustment.reason]
    );
    return result.rows[0];
  }

  // Get all adjustments
  static async findAll(client: SqlClient): Promise<Adjustment[]> {
    const result = await client.query<Row<Adjustment>>(
      'SELECT id, team_id, kind, industry, delta, reason, created_at FROM adjustments ORDER BY created_at, id'
    );
    return result.rows;
  }
}
