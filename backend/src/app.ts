import express from 'express';
import cors from 'cors';
import type { Engines } from './engines';
import { authenticate } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { createAdminRoutes, createGiftRoutes } from './routes/admin';
import { createExportRoutes } from './routes/export';
import { createGameRoutes } from './routes/game';
import { createLeaderboardRoutes } from './routes/leaderboard';
import { createMarketplaceRoutes } from './routes/marketplace';
import { createProductionRoutes, createTeamRoutes } from './routes/teams';
import { createTradeRequestRoutes } from './routes/tradeRequests';
import type { ApiResponse } from './types';

export interface AppOptions {
  corsOrigins: string[];
  /** Bcrypt hash or plaintext; empty disables admin access. */
  adminPassword: string;
  leaderboardCacheSeconds: number;
}

export function createApp(engines: Engines, options: AppOptions): express.Express {
  const app = express();

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl)
      if (!origin) return callback(null, true);
      return callback(null, options.corsOrigins.includes(origin));
    },
    credentials: true,
  }));
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(authenticate({
    adminPassword: options.adminPassword,
    findCredentials: (username) => engines.teams.findCredentials(username),
  }));

  // API Routes
  app.use('/api/game', createGameRoutes(engines));
  app.use('/api/teams', createTeamRoutes(engines));
  app.use('/api/production', createProductionRoutes(engines));
  app.use('/api/marketplace', createMarketplaceRoutes(engines));
  app.use('/api/trade-requests', createTradeRequestRoutes(engines));
  app.use('/api/gifts', createGiftRoutes(engines));
  app.use('/api/admin', createAdminRoutes(engines));
  app.use('/api/leaderboard', createLeaderboardRoutes(engines, options.leaderboardCacheSeconds));
  app.use('/api/export', createExportRoutes(engines));

  // 404 handler
  app.use((_req, res) => {
    const body: ApiResponse = { success: false, error: 'Route not found', code: 'NOT_FOUND' };
    res.status(404).json(body);
  });

  app.use(errorHandler);

  return app;
}
