import type { Row, SqlClient } from '../config/database';
import type { GameState, GameStatus } from '../types';

export class GameStateModel {
  /**
   * Read the singleton game row. With `lock`, the row stays locked until the
   * surrounding transaction ends, which serializes every engine command.
   */
  static async get(client: SqlClient, lock = false): Promise<GameState> {
    const result = await client.query<Row<GameState>>(
      `SELECT status, updated_at FROM game_state WHERE id = 1${lock ? ' FOR UPDATE' : ''}`
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('game_state row missing; run the database migrations');
    }
    return row;
  }

  // Update game status
  static async setStatus(client: SqlClient, status: GameStatus): Promise<GameState> {
    const result = await client.query<Row<GameState>>(
      `UPDATE game_state SET status = $1, updated_at = NOW() WHERE id = 1
       RETURNING status, updated_at`,
      [status]
    );
    return result.rows[0];
  }
}
