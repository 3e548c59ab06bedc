import type { Row, SqlClient } from '../config/database';
import type { MarketplaceOffer, OfferStatus } from '../types';
import type { NewOffer } from '../store/LedgerStore';

const OFFER_COLUMNS =
  'id, seller_team_id, industry, quantity, remaining, unit_price, status, created_at, updated_at';

export class MarketplaceOfferModel {
  // Create an open offer; the seller's units are escrowed by the caller
  static async create(client: SqlClient, offer: NewOffer): Promise<MarketplaceOffer> {
    const result = await client.query<Row<MarketplaceOffer>>(
      `INSERT INTO marketplace_offers (seller_team_id, industry, quantity, remaining, unit_price, status)
       VALUES ($1, $2, $3, $3, $4, 'open')
       RETURNING ${OFFER_COLUMNS}`,
      [offer.seller_team_id, offer.industry, offer.quantity, offer.unit_price]
    );
    return result.rows[0];
  }

  // Get offer by ID
  static async findById(client: SqlClient, id: string, lock = false): Promise<MarketplaceOffer | null> {
    const result = await client.query<Row<MarketplaceOffer>>(
      `SELECT ${OFFER_COLUMNS} FROM marketplace_offers WHERE id = $1${lock ? ' FOR UPDATE' : ''}`,
      [id]
    );
    return result.rows[0] || null;
  }

  // Get all offers, oldest first
  static async findAll(client: SqlClient): Promise<MarketplaceOffer[]> {
    const result = await client.query<Row<MarketplaceOffer>>(
      `SELECT ${OFFER_COLUMNS} FROM marketplace_offers ORDER BY created_at, id`
    );
    return result.rows;
  }

  // Record a fill or a cancellation
  static async update(
    client: SqlClient,
    id: string,
    changes: { remaining: number; status: OfferStatus }
  ): Promise<MarketplaceOffer> {
    const result = await client.query<Row<MarketplaceOffer>>(
      `UPDATE marketplace_offers SET remaining = $1, status = $2, updated_at = NOW()
       WHERE id = $3
       RETURNING ${OFFER_COLUMNS}`,
      [changes.remaining, changes.status, id]
    );
    return result.rows[0];
  }

  // Change the price of the units still on offer
  static async updatePrice(client: SqlClient, id: string, unitPrice: number): Promise<MarketplaceOffer> {
    const result = await client.query<Row<MarketplaceOffer>>(
      `UPDATE marketplace_offers SET unit_price = $1, updated_at = NOW()
       WHERE id = $2
       RETURNING ${OFFER_COLUMNS}`,
      [unitPrice, id]
    );
    return result.rows[0];
  }
}
