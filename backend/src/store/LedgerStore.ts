import type {
  Adjustment,
  GameState,
  GameStatus,
  Gift,
  Industry,
  MarketplaceOffer,
  OfferStatus,
  ProductionLog,
  Settlement,
  Team,
  TradeRequest,
  TradeRequestStatus,
  UnitKind,
} from '../types';

export interface NewTeam {
  name: string;
  username: string;
  password_hash: string;
  industry: Industry;
  initial_balance: number;
  raw_units: Record<Industry, number>;
}

export interface NewOffer {
  seller_team_id: string;
  industry: Industry;
  quantity: number;
  unit_price: number;
}

export interface NewTradeRequest {
  proposer_team_id: string;
  counterparty_team_id: string;
  industry: Industry;
  quantity: number;
  unit_price: number;
  is_secret: boolean;
}

export interface NewSettlement {
  source: Settlement['source'];
  source_id: string;
  buyer_team_id: string;
  seller_team_id: string;
  industry: Industry;
  quantity: number;
  unit_price: number;
  is_secret: boolean;
}

export interface NewProductionLog {
  team_id: string;
  industry: Industry;
  units_produced: number;
  raw_units_consumed: number;
}

export interface NewGift {
  team_id: string;
  industry: Industry;
  units: number;
}

export interface NewAdjustment {
  team_id: string;
  kind: Adjustment['kind'];
  industry: Industry | null;
  delta: number;
  reason: string;
}

/**
 * Read side of the ledger. Inside a transaction, the single-row getters
 * lock what they return until commit or rollback.
 */
export interface LedgerReader {
  getGame(): Promise<GameState>;
  getTeam(id: string): Promise<Team | null>;
  findTeamByUsername(username: string): Promise<Team | null>;
  listTeams(): Promise<Team[]>;
  getOffer(id: string): Promise<MarketplaceOffer | null>;
  listOffers(): Promise<MarketplaceOffer[]>;
  getTradeRequest(id: string): Promise<TradeRequest | null>;
  listTradeRequests(): Promise<TradeRequest[]>;
  listSettlements(): Promise<Settlement[]>;
  listProductionLogs(): Promise<ProductionLog[]>;
  findGiftByTeam(teamId: string): Promise<Gift | null>;
  listGifts(): Promise<Gift[]>;
  listAdjustments(): Promise<Adjustment[]>;
}

export interface LedgerTransaction extends LedgerReader {
  setGameStatus(status: GameStatus): Promise<GameState>;
  insertTeam(team: NewTeam): Promise<Team>;
  adjustBalance(teamId: string, delta: number): Promise<void>;
  adjustInventory(teamId: string, industry: Industry, kind: UnitKind, delta: number): Promise<void>;
  setRawUnits(teamId: string, industry: Industry, units: number): Promise<void>;
  insertOffer(offer: NewOffer): Promise<MarketplaceOffer>;
  updateOffer(id: string, changes: { remaining: number; status: OfferStatus }): Promise<MarketplaceOffer>;
  updateOfferPrice(id: string, unitPrice: number): Promise<MarketplaceOffer>;
  insertTradeRequest(request: NewTradeRequest): Promise<TradeRequest>;
  updateTradeRequestStatus(id: string, status: TradeRequestStatus): Promise<TradeRequest>;
  insertSettlement(settlement: NewSettlement): Promise<Settlement>;
  insertProductionLog(log: NewProductionLog): Promise<ProductionLog>;
  insertGift(gift: NewGift): Promise<Gift>;
  insertAdjustment(adjustment: NewAdjustment): Promise<Adjustment>;
}

/**
 * The authoritative ledger. Every mutating engine call runs inside exactly one
 * `transaction`: applied in full when `work` resolves, rolled back when it
 * throws. Transactions never interleave.
 */
export interface LedgerStore {
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
  read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
