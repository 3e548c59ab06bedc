import { config } from 'dotenv';
config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

function valuationFromEnv(): 'fixed' | 'market' {
  const raw = process.env.PROFIT_VALUATION ?? 'fixed';
  if (raw !== 'fixed' && raw !== 'market') {
    throw new Error(`PROFIT_VALUATION must be "fixed" or "market", got "${raw}"`);
  }
  return raw;
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: intFromEnv('PORT', 3000),
  databaseUrl: process.env.DATABASE_URL,
  redisUrl: process.env.REDIS_URL,
  corsOrigin: process.env.CORS_ORIGIN ?? 'http://localhost:5173',
  adminPassword: process.env.ADMIN_PASSWORD ?? '',
  initialBalance: intFromEnv('INITIAL_BALANCE', 250000),
  rawUnitsMin: intFromEnv('RAW_UNITS_MIN', 10),
  rawUnitsMax: intFromEnv('RAW_UNITS_MAX', 50),
  rawUnitCost: intFromEnv('RAW_UNIT_COST', 0),
  profitValuation: valuationFromEnv(),
  leaderboardCacheSeconds: intFromEnv('LEADERBOARD_CACHE_SECONDS', 5),
} as const;
