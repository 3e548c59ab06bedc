import { Router } from 'express';
import { createExportController } from '../controllers/exportController';
import type { Engines } from '../engines';
import { requireAdmin } from '../middleware/auth';

export function createExportRoutes(engines: Engines): Router {
  const router = Router();
  const ExportController = createExportController(engines);

  // Whole ledger as JSON, secret trades included (admin only)
  router.get('/snapshot', requireAdmin, ExportController.getSnapshot);

  // One table as CSV (admin only)
  // Query param: type = 'teams' | 'inventory' | 'offers' | 'trade_requests' | ...
  router.get('/csv', requireAdmin, ExportController.exportCSV);

  return router;
}
