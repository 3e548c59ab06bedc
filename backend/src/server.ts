import http from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { connectRedis, disconnectRedis } from './config/redis';
import { createEngines, createGameContext } from './engines';
import type { LedgerStore } from './store/LedgerStore';
import { MemoryLedgerStore } from './store/MemoryLedgerStore';

// The pg pool is only created when a database is configured
async function openStore(): Promise<LedgerStore> {
  if (!env.databaseUrl) {
    console.warn('[Server] DATABASE_URL not set, using the in-memory ledger (state is lost on restart)');
    return new MemoryLedgerStore();
  }
  const { pool } = await import('./config/database');
  const { PostgresLedgerStore } = await import('./store/PostgresLedgerStore');
  return new PostgresLedgerStore(pool);
}

async function main(): Promise<void> {
  const store = await openStore();
  await connectRedis();

  const ctx = createGameContext(store);
  const engines = createEngines(ctx);
  const app = createApp(engines, {
    corsOrigins: env.corsOrigin.split(',').map((o) => o.trim()).filter(Boolean),
    adminPassword: env.adminPassword,
    leaderboardCacheSeconds: env.leaderboardCacheSeconds,
  });

  if (!env.adminPassword) {
    console.warn('[Server] ADMIN_PASSWORD not set, admin endpoints are disabled');
  }

  const server = http.createServer(app);
  server.listen(env.port, () => {
    console.log(`Server running on http://localhost:${env.port}`);
    console.log(`Environment: ${env.nodeEnv}`);
    console.log(`Profit valuation: ${ctx.config.profitValuation}, raw unit cost ${ctx.config.rawUnitCost}`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('\nShutting down gracefully...');

    await new Promise<void>((resolve) => server.close(() => resolve()));
    console.log('HTTP server closed');

    try {
      await store.close();
      console.log('Ledger store closed');
    } catch (err) {
      console.error('Error closing ledger store:', err);
    }

    try {
      await disconnectRedis();
      console.log('Redis connection closed');
    } catch (err) {
      console.error('Error closing Redis:', err);
    }

    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
