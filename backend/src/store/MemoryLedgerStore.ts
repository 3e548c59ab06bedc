import { randomUUID } from 'crypto';
import { perIndustry } from '../types';
import type {
  Adjustment,
  GameState,
  GameStatus,
  Gift,
  Industry,
  Inventory,
  MarketplaceOffer,
  OfferStatus,
  ProductionLog,
  Settlement,
  Team,
  TradeRequest,
  TradeRequestStatus,
  UnitKind,
} from '../types';
import type {
  LedgerReader,
  LedgerStore,
  LedgerTransaction,
  NewAdjustment,
  NewGift,
  NewOffer,
  NewProductionLog,
  NewSettlement,
  NewTeam,
  NewTradeRequest,
} from './LedgerStore';

interface MemoryState {
  game: GameState;
  teams: Team[];
  offers: MarketplaceOffer[];
  tradeRequests: TradeRequest[];
  settlements: Settlement[];
  productionLogs: ProductionLog[];
  gifts: Gift[];
  adjustments: Adjustment[];
}

function emptyState(now: Date): MemoryState {
  return {
    game: { status: 'setup', updated_at: now },
    teams: [],
    offers: [],
    tradeRequests: [],
    settlements: [],
    productionLogs: [],
    gifts: [],
    adjustments: [],
  };
}

/**
 * Works directly on the store's state object. Every getter hands out a copy
 * so callers only change the ledger through the mutation methods.
 */
class MemoryLedgerTransaction implements LedgerTransaction {
  constructor(
    private readonly state: MemoryState,
    private readonly clock: () => Date
  ) {}

  // ---- reads --------------------------------------------------------------

  async getGame(): Promise<GameState> {
    return structuredClone(this.state.game);
  }

  async getTeam(id: string): Promise<Team | null> {
    const team = this.state.teams.find((t) => t.id === id);
    return team ? structuredClone(team) : null;
  }

  async findTeamByUsername(username: string): Promise<Team | null> {
    const team = this.state.teams.find((t) => t.username === username);
    return team ? structuredClone(team) : null;
  }

  async listTeams(): Promise<Team[]> {
    return structuredClone(this.state.teams);
  }

  async getOffer(id: string): Promise<MarketplaceOffer | null> {
    const offer = this.state.offers.find((o) => o.id === id);
    return offer ? structuredClone(offer) : null;
  }

  async listOffers(): Promise<MarketplaceOffer[]> {
    return structuredClone(this.state.offers);
  }

  async getTradeRequest(id: string): Promise<TradeRequest | null> {
    const request = this.state.tradeRequests.find((r) => r.id === id);
    return request ? structuredClone(request) : null;
  }

  async listTradeRequests(): Promise<TradeRequest[]> {
    return structuredClone(this.state.tradeRequests);
  }

  async listSettlements(): Promise<Settlement[]> {
    return structuredClone(this.state.settlements);
  }

  async listProductionLogs(): Promise<ProductionLog[]> {
    return structuredClone(this.state.productionLogs);
  }

  async findGiftByTeam(teamId: string): Promise<Gift | null> {
    const gift = this.state.gifts.find((g) => g.team_id === teamId);
    return gift ? structuredClone(gift) : null;
  }

  async listGifts(): Promise<Gift[]> {
    return structuredClone(this.state.gifts);
  }

  async listAdjustments(): Promise<Adjustment[]> {
    return structuredClone(this.state.adjustments);
  }

  // ---- writes -------------------------------------------------------------

  async setGameStatus(status: GameStatus): Promise<GameState> {
    this.state.game = { status, updated_at: this.clock() };
    return structuredClone(this.state.game);
  }

  async insertTeam(seed: NewTeam): Promise<Team> {
    const inventory: Inventory = perIndustry((industry) => ({
      raw_units: seed.raw_units[industry],
      material_units: 0,
    }));

    const team: Team = {
      id: randomUUID(),
      name: seed.name,
      username: seed.username,
      password_hash: seed.password_hash,
      industry: seed.industry,
      initial_balance: seed.initial_balance,
      balance: seed.initial_balance,
      position: this.state.teams.length + 1,
      inventory,
      created_at: this.clock(),
    };
    this.state.teams.push(team);
    return structuredClone(team);
  }

  async adjustBalance(teamId: string, delta: number): Promise<void> {
    this.liveTeam(teamId).balance += delta;
  }

  async adjustInventory(teamId: string, industry: Industry, kind: UnitKind, delta: number): Promise<void> {
    const entry = this.liveTeam(teamId).inventory[industry];
    if (entry[kind] + delta < 0) {
      throw new Error(`Inventory for team ${teamId} would go negative (${industry} ${kind})`);
    }
    entry[kind] += delta;
  }

  async setRawUnits(teamId: string, industry: Industry, units: number): Promise<void> {
    this.liveTeam(teamId).inventory[industry].raw_units = units;
  }

  async insertOffer(offer: NewOffer): Promise<MarketplaceOffer> {
    const now = this.clock();
    const created: MarketplaceOffer = {
      id: randomUUID(),
      ...offer,
      remaining: offer.quantity,
      status: 'open',
      created_at: now,
      updated_at: now,
    };
    this.state.offers.push(created);
    return structuredClone(created);
  }

  async updateOffer(id: string, changes: { remaining: number; status: OfferStatus }): Promise<MarketplaceOffer> {
    const offer = this.state.offers.find((o) => o.id === id);
    if (!offer) throw new Error(`Offer ${id} does not exist`);
    offer.remaining = changes.remaining;
    offer.status = changes.status;
    offer.updated_at = this.clock();
    return structuredClone(offer);
  }

  async updateOfferPrice(id: string, unitPrice: number): Promise<MarketplaceOffer> {
    const offer = this.state.offers.find((o) => o.id === id);
    if (!offer) throw new Error(`Offer ${id} does not exist`);
    offer.unit_price = unitPrice;
    offer.updated_at = this.clock();
    return structuredClone(offer);
  }

  async insertTradeRequest(request: NewTradeRequest): Promise<TradeRequest> {
    const now = this.clock();
    const created: TradeRequest = {
      id: randomUUID(),
      ...request,
      status: 'pending',
      created_at: now,
      updated_at: now,
    };
    this.state.tradeRequests.push(created);
    return structuredClone(created);
  }

  async updateTradeRequestStatus(id: string, status: TradeRequestStatus): Promise<TradeRequest> {
    const request = this.state.tradeRequests.find((r) => r.id === id);
    if (!request) throw new Error(`Trade request ${id} does not exist`);
    request.status = status;
    request.updated_at = this.clock();
    return structuredClone(request);
  }

  async insertSettlement(settlement: NewSettlement): Promise<Settlement> {
    const created: Settlement = {
      id: randomUUID(),
      ...settlement,
      total_amount: settlement.quantity * settlement.unit_price,
      created_at: this.clock(),
    };
    this.state.settlements.push(created);
    return structuredClone(created);
  }

  async insertProductionLog(log: NewProductionLog): Promise<ProductionLog> {
    const created: ProductionLog = { id: randomUUID(), ...log, created_at: this.clock() };
    this.state.productionLogs.push(created);
    return structuredClone(created);
  }

  async insertGift(gift: NewGift): Promise<Gift> {
    if (this.state.gifts.some((g) => g.team_id === gift.team_id)) {
      throw new Error(`Team ${gift.team_id} already holds a gift`);
    }
    const created: Gift = { id: randomUUID(), ...gift, created_at: this.clock() };
    this.state.gifts.push(created);
    return structuredClone(created);
  }

  async insertAdjustment(adjustment: NewAdjustment): Promise<Adjustment> {
    const created: Adjustment = { id: randomUUID(), ...adjustment, created_at: this.clock() };
    this.state.adjustments.push(created);
    return structuredClone(created);
  }

  private liveTeam(teamId: string): Team {
    const team = this.state.teams.find((t) => t.id === teamId);
    if (!team) throw new Error(`Team ${teamId} does not exist`);
    return team;
  }
}

/**
 * In-process ledger. Transactions and reads queue behind each other, so no
 * caller ever sees another transaction half applied; a transaction that throws
 * restores the state it started from.
 */
export class MemoryLedgerStore implements LedgerStore {
  private state: MemoryState;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly clock: () => Date = () => new Date()) {
    this.state = emptyState(clock());
  }

  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.enqueue(async () => {
      const backup = structuredClone(this.state);
      try {
        return await work(new MemoryLedgerTransaction(this.state, this.clock));
      } catch (err) {
        this.state = backup;
        throw err;
      }
    });
  }

  read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    return this.enqueue(() => work(new MemoryLedgerTransaction(this.state, this.clock)));
  }

  async close(): Promise<void> {
    await this.queue;
  }

  private enqueue<T>(run: () => Promise<T>): Promise<T> {
    const result = this.queue.then(run, run);
    this.queue = result.catch(() => undefined);
    return result;
  }
}
