import type { Row, SqlClient } from '../config/database';
import type { ProductionLog } from '../types';
import type { NewProductionLog } from '../store/LedgerStore';

export class ProductionLogModel {
  // Log a production run
  static async create(client: SqlClient, log: NewProductionLog): Promise<ProductionLog> {
    const result = await client.query<Row<ProductionLog>>(
      `INSERT INTO production_logs (team_id, industry, units_produced, raw_units_consumed)
       VALUES ($1, $2, $3, $4)
       RETURNING id, team_id, industry, units_produced, raw_units_consumed, created_at`,
      [log.team_id, log.industry, log.units_produced, log.raw_units_consumed]
    );
    return result.rows[0];
  }

  // Get all production logs, oldest first
  static async findAll(client: SqlClient): Promise<ProductionLog[]> {
    const result = await client.query<Row<ProductionLog>>(
      `SELECT id, team_id, industry, units_produced, raw_units_consumed, created_at
       FROM production_logs ORDER BY created_at, id`
    );
    return result.rows;
  }
}
