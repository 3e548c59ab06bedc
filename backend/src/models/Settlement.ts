import type { Row, SqlClient } from '../config/database';
import type { Settlement } from '../types';
import type { NewSettlement } from '../store/LedgerStore';

const SETTLEMENT_COLUMNS =
  'id, source, source_id, buyer_team_id, seller_team_id, industry, quantity, unit_price, total_amount, is_secret, created_at';

export class SettlementModel {
  // Record a completed exchange
  static async create(client: SqlClient, settlement: NewSettlement): Promise<Settlement> {
    const result = await client.query<Row<Settlement>>(
      `INSERT INTO settlements
       (source, source_id, buyer_team_id, seller_team_id, industry, quantity, unit_price, total_amount, is_secret)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${SETTLEMENT_COLUMNS}`,
      [
        settlement.source,
        settlement.source_id,
        settlement.buyer_team_id,
        settlement.seller_team_id,
        settlement.industry,
        settlement.quantity,
        settlement.unit_price,
        settlement.quantity * settlement.unit_price,
        settlement.is_secret,
      ]
    );
    return result.rows[0];
  }

  // Get every settlement, oldest first
  static async findAll(client: SqlClient): Promise<Settlement[]> {
    const result = await client.query<Row<Settlement>>(
      `SELECT ${SETTLEMENT_COLUMNS} FROM settlements ORDER BY created_at, id`
    );
    return result.rows;
  }
}
