// ============================================================================
// GAME CONSTANTS
// ============================================================================

export const INDUSTRIES = ['Cement', 'Energy', 'Iron', 'Aluminium', 'Wood'] as const;

export type Industry = (typeof INDUSTRIES)[number];

export type GameStatus = 'setup' | 'running' | 'paused' | 'ended';

export type OfferStatus = 'open' | 'filled' | 'cancelled';

export type TradeRequestStatus = 'pending' | 'accepted' | 'rejected' | 'cancelled';

export type UnitKind = 'raw_units' | 'material_units';

export function isIndustry(value: unknown): value is Industry {
  return typeof value === 'string' && (INDUSTRIES as readonly string[]).includes(value);
}

/** Builds a record keyed by every industry. */
export function perIndustry<T>(value: (industry: Industry) => T): Record<Industry, T> {
  return {
    Cement: value('Cement'),
    Energy: value('Energy'),
    Iron: value('Iron'),
    Aluminium: value('Aluminium'),
    Wood: value('Wood'),
  };
}

/** The four industries whose raw units a team consumes to produce its own material. */
export function otherIndustries(industry: Industry): Industry[] {
  return INDUSTRIES.filter((i) => i !== industry);
}

// ============================================================================
// LEDGER TYPES
// ============================================================================

export interface InventoryEntry {
  raw_units: number;
  material_units: number;
}

export type Inventory = Record<Industry, InventoryEntry>;

export interface GameState {
  status: GameStatus;
  updated_at: Date;
}

export interface Team {
  id: string;
  name: string;
  username: string;
  password_hash: string;
  industry: Industry;
  initial_balance: number;
  balance: number;
  position: number;
  inventory: Inventory;
  created_at: Date;
}

/** A team as shown to callers: never carries the password hash. */
export type TeamSnapshot = Omit<Team, 'password_hash'>;

export interface TeamSummary {
  id: string;
  name: string;
  industry: Industry;
  position: number;
}

export interface MarketplaceOffer {
  id: string;
  seller_team_id: string;
  industry: Industry;
  quantity: number;
  remaining: number;
  unit_price: number;
  status: OfferStatus;
  created_at: Date;
  updated_at: Date;
}

export interface TradeRequest {
  id: string;
  proposer_team_id: string;
  counterparty_team_id: string;
  industry: Industry;
  quantity: number;
  unit_price: number;
  is_secret: boolean;
  status: TradeRequestStatus;
  created_at: Date;
  updated_at: Date;
}

export interface Settlement {
  id: string;
  source: 'marketplace' | 'trade_request';
  source_id: string;
  buyer_team_id: string;
  seller_team_id: string;
  industry: Industry;
  quantity: number;
  unit_price: number;
  total_amount: number;
  is_secret: boolean;
  created_at: Date;
}

export interface ProductionLog {
  id: string;
  team_id: string;
  industry: Industry;
  units_produced: number;
  raw_units_consumed: number;
  created_at: Date;
}

export interface Gift {
  id: string;
  team_id: string;
  industry: Industry;
  units: number;
  created_at: Date;
}

export interface Adjustment {
  id: string;
  team_id: string;
  kind: 'balance' | UnitKind;
  industry: Industry | null;
  delta: number;
  reason: string;
  created_at: Date;
}

/** Everything the ledger holds, read in one pass. */
export interface LedgerSnapshot {
  game: GameState;
  teams: Team[];
  offers: MarketplaceOffer[];
  tradeRequests: TradeRequest[];
  settlements: Settlement[];
  productionLogs: ProductionLog[];
  gifts: Gift[];
  adjustments: Adjustment[];
}

// ============================================================================
// CALLERS
// ============================================================================

export type Actor = { role: 'admin' } | { role: 'team'; teamId: string };

// ============================================================================
// API REQUEST/RESPONSE TYPES
// ============================================================================

export interface TeamSeed {
  name: string;
  username: string;
  industry: Industry;
  password_hash: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  message?: string;
}
