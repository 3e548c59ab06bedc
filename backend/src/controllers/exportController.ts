import type { Request, Response } from 'express';
import type { Engines } from '../engines';
import { parseInput } from '../middleware/validate';
import { exportQuery } from '../validation/schemas';
import { handle } from './handler';

export function createExportController(engines: Engines) {
  /**
   * Everything in the ledger as JSON, secret trades included (admin)
   */
  const getSnapshot = handle(async (_req: Request, res: Response) => {
    res.json({ success: true, data: await engines.exports.snapshot() });
  });

  /**
   * One table as CSV. Query param: type = teams | inventory | offers |
   * trade_requests | settlements | production | gifts | adjustments | leaderboard
   */
  const exportCSV = handle(async (req: Request, res: Response) => {
    const { type } = parseInput(exportQuery, req.query);
    const { filename, body } = await engines.exports.csv(type);
    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    res.send(body);
  });

  return { getSnapshot, exportCSV };
}
