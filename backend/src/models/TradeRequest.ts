import type { Row, SqlClient } from '../config/database';
import type { TradeRequest, TradeRequestStatus } from '../types';
import type { NewTradeRequest } from '../store/LedgerStore';

const REQUEST_COLUMNS =
  'id, proposer_team_id, counterparty_team_id, industry, quantity, unit_price, is_secret, status, created_at, updated_at';

export class TradeRequestModel {
  // Create a pending request
  static async create(client: SqlClient, request: NewTradeRequest): Promise<TradeRequest> {
    const result = await client.query<Row<TradeRequest>>(
      `INSERT INTO trade_requests
       (proposer_team_id, counterparty_team_id, industry, quantity, unit_price, is_secret, status)
       VALUES ($1, $2, $3, $4, $5, $6, 'pending')
       RETURNING ${REQUEST_COLUMNS}`,
      [
        request.proposer_team_id,
        request.counterparty_team_id,
        request.industry,
        request.quantity,
        request.unit_price,
        request.is_secret,
      ]
    );
    return result.rows[0];
  }

  // Get request by ID
  static async findById(client: SqlClient, id: string, lock = false): Promise<TradeRequest | null> {
    const result = await client.query<Row<TradeRequest>>(
      `SELECT ${REQUEST_COLUMNS} FROM trade_requests WHERE id = $1${lock ? ' FOR UPDATE' : ''}`,
      [id]
    );
    return result.rows[0] || null;
  }

  // Get all requests, oldest first
  static async findAll(client: SqlClient): Promise<TradeRequest[]> {
    const result = await client.query<Row<TradeRequest>>(
      `SELECT ${REQUEST_COLUMNS} FROM trade_requests ORDER BY created_at, id`
    );
    return result.rows;
  }

  // Move a request to a terminal status
  static async updateStatus(client: SqlClient, id: string, status: TradeRequestStatus): Promise<TradeRequest> {
    const result = await client.query<Row<TradeRequest>>(
      `UPDATE trade_requests SET status = $1, updated_at = NOW()
       WHERE id = $2
       RETURNING ${REQUEST_COLUMNS}`,
      [status, id]
    );
    return result.rows[0];
  }
}
