import type { PoolClient } from 'pg';
import { z } from 'zod';
import type { SqlClient } from '../config/database';
import { AdjustmentModel } from '../models/Adjustment';
import { GameStateModel } from '../models/GameState';
import { GiftModel } from '../models/Gift';
import { MarketplaceOfferModel } from '../models/MarketplaceOffer';
import { ProductionLogModel } from '../models/ProductionLog';
import { SettlementModel } from '../models/Settlement';
import { TeamModel } from '../models/Team';
import { TradeRequestModel } from '../models/TradeRequest';
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

export type PooledClient = SqlClient & Pick<PoolClient, 'release'>;

/** The part of a pg Pool the store uses. */
export interface ConnectionPool {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

// Ids are UUID columns; anything else cannot match a row
const uuid = z.string().uuid();
const isUuid = (id: string): boolean => uuid.safeParse(id).success;

/**
 * Runs the ledger operations on one client. With `lock`, single-row reads take
 * row locks that last until the surrounding transaction ends.
 */
class PostgresLedgerSession implements LedgerTransaction {
  constructor(
    private readonly client: SqlClient,
    private readonly lock: boolean
  ) {}

  getGame(): Promise<GameState> {
    return GameStateModel.get(this.client, this.lock);
  }

  async getTeam(id: string): Promise<Team | null> {
    if (!isUuid(id)) return null;
    return TeamModel.findById(this.client, id, this.lock);
  }

  findTeamByUsername(username: string): Promise<Team | null> {
    return TeamModel.findByUsername(this.client, username);
  }

  listTeams(): Promise<Team[]> {
    return TeamModel.findAll(this.client);
  }

  async getOffer(id: string): Promise<MarketplaceOffer | null> {
    if (!isUuid(id)) return null;
    return MarketplaceOfferModel.findById(this.client, id, this.lock);
  }

  listOffers(): Promise<MarketplaceOffer[]> {
    return MarketplaceOfferModel.findAll(this.client);
  }

  async getTradeRequest(id: string): Promise<TradeRequest | null> {
    if (!isUuid(id)) return null;
    return TradeRequestModel.findById(this.client, id, this.lock);
  }

  listTradeRequests(): Promise<TradeRequest[]> {
    return TradeRequestModel.findAll(this.client);
  }

  listSettlements(): Promise<Settlement[]> {
    return SettlementModel.findAll(this.client);
  }

  listProductionLogs(): Promise<ProductionLog[]> {
    return ProductionLogModel.findAll(this.client);
  }

  async findGiftByTeam(teamId: string): Promise<Gift | null> {
    if (!isUuid(teamId)) return null;
    return GiftModel.findByTeam(this.client, teamId);
  }

  listGifts(): Promise<Gift[]> {
    return GiftModel.findAll(this.client);
  }

  listAdjustments(): Promise<Adjustment[]> {
    return AdjustmentModel.findAll(this.client);
  }

  setGameStatus(status: GameStatus): Promise<GameState> {
    return GameStateModel.setStatus(this.client, status);
  }

  insertTeam(team: NewTeam): Promise<Team> {
    return TeamModel.create(this.client, team);
  }

  adjustBalance(teamId: string, delta: number): Promise<void> {
    return TeamModel.adjustBalance(this.client, teamId, delta);
  }

  adjustInventory(teamId: string, industry: Industry, kind: UnitKind, delta: number): Promise<void> {
    return TeamModel.adjustInventory(this.client, teamId, industry, kind, delta);
  }

  setRawUnits(teamId: string, industry: Industry, units: number): Promise<void> {
    return TeamModel.setRawUnits(this.client, teamId, industry, units);
  }

  insertOffer(offer: NewOffer): Promise<MarketplaceOffer> {
    return MarketplaceOfferModel.create(this.client, offer);
  }

  updateOffer(id: string, changes: { remaining: number; status: OfferStatus }): Promise<MarketplaceOffer> {
    return MarketplaceOfferModel.update(this.client, id, changes);
  }

  updateOfferPrice(id: string, unitPrice: number): Promise<MarketplaceOffer> {
    return MarketplaceOfferModel.updatePrice(this.client, id, unitPrice);
  }

  insertTradeRequest(request: NewTradeRequest): Promise<TradeRequest> {
    return TradeRequestModel.create(this.client, request);
  }

  updateTradeRequestStatus(id: string, status: TradeRequestStatus): Promise<TradeRequest> {
    return TradeRequestModel.updateStatus(this.client, id, status);
  }

  insertSettlement(settlement: NewSettlement): Promise<Settlement> {
    return SettlementModel.create(this.client, settlement);
  }

  insertProductionLog(log: NewProductionLog): Promise<ProductionLog> {
    return ProductionLogModel.create(this.client, log);
  }

  insertGift(gift: NewGift): Promise<Gift> {
    return GiftModel.create(this.client, gift);
  }

  insertAdjustment(adjustment: NewAdjustment): Promise<Adjustment> {
    return AdjustmentModel.create(this.client, adjustment);
  }
}

export class PostgresLedgerStore implements LedgerStore {
  constructor(private readonly pool: ConnectionPool) {}

  /**
   * One BEGIN/COMMIT on one pooled client. The game_state row is locked first,
   * so commands run one at a time across every server process.
   */
  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await GameStateModel.get(client, true);
      const result = await work(new PostgresLedgerSession(client, true));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * All statements of `work` see one committed state of the ledger, without
   * taking row locks.
   */
  async read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
      const result = await work(new PostgresLedgerSession(client, false));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
