import type { Actor, Industry, MarketplaceOffer, Settlement } from '../types';
import type { LedgerTransaction } from '../store/LedgerStore';
import {
  BaseEngine,
  loadTeam,
  requirePositiveInt,
  requirePrice,
  requireRunning,
  requireSafeBalance,
  requireSafeTotal,
  requireTeamActor,
  requireUnitsFit,
} from './BaseEngine';
import { EngineError } from './errors';
import type { EngineResult } from './errors';

export interface OfferFill {
  offer: MarketplaceOffer;
  settlement: Settlement;
}

export interface OfferFilter {
  industry?: Industry;
  excludeTeamId?: string;
}

async function loadOffer(tx: LedgerTransaction, offerId: string): Promise<MarketplaceOffer> {
  const offer = await tx.getOffer(offerId);
  if (!offer) {
    throw new EngineError('OfferNotFound', `Offer ${offerId} not found`);
  }
  return offer;
}

/**
 * Public sell offers. A seller's units leave its inventory when the offer is
 * posted and stay with the offer until they are bought or the offer is
 * cancelled. Offers fill partially.
 */
export class MarketplaceEngine extends BaseEngine {
  protected readonly tag = 'Marketplace';

  createOffer(actor: Actor, quantity: number, unitPrice: number): Promise<EngineResult<MarketplaceOffer>> {
    return this.execute('createOffer', async (tx) => {
      const sellerId = requireTeamActor(actor);
      await requireRunning(tx);
      requirePositiveInt(quantity);
      requirePrice(unitPrice);
      requireSafeTotal(quantity, unitPrice);

      const seller = await loadTeam(tx, sellerId);
      const held = seller.inventory[seller.industry].material_units;
      if (held < quantity) {
        throw new EngineError(
          'InsufficientInventory',
          `Cannot offer ${quantity} ${seller.industry}, holding ${held}`
        );
      }

      await tx.adjustInventory(sellerId, seller.industry, 'material_units', -quantity);
      const offer = await tx.insertOffer({
        seller_team_id: sellerId,
        industry: seller.industry,
        quantity,
        unit_price: unitPrice,
      });

      console.log(`[Marketplace] ${seller.name} offered ${quantity} ${seller.industry} @ ${unitPrice}`);
      return offer;
    });
  }

  acceptOffer(actor: Actor, offerId: string, quantity: number): Promise<EngineResult<OfferFill>> {
    return this.execute('acceptOffer', async (tx) => {
      const buyerId = requireTeamActor(actor);
      await requireRunning(tx);
      requirePositiveInt(quantity);

      const offer = await loadOffer(tx, offerId);
      if (offer.status !== 'open') {
        throw new EngineError('OfferNotOpen', `Offer ${offerId} is ${offer.status}`);
      }
      if (offer.seller_team_id === buyerId) {
        throw new EngineError('SelfTrade', 'Cannot buy from your own offer');
      }
      if (quantity > offer.remaining) {
        throw new EngineError(
          'InsufficientInventory',
          `Offer ${offerId} has ${offer.remaining} units left, requested ${quantity}`
        );
      }

      const buyer = await loadTeam(tx, buyerId);
      const total = requireSafeTotal(quantity, offer.unit_price);
      if (buyer.balance < total) {
        throw new EngineError('InsufficientFunds', `Purchase costs ${total}, balance is ${buyer.balance}`);
      }
      requireSafeBalance(await loadTeam(tx, offer.seller_team_id), total, 'InvalidPrice');
      requireUnitsFit(buyer, offer.industry, 'material_units', quantity, 'InvalidQuantity');

      await tx.adjustBalance(buyerId, -total);
      await tx.adjustBalance(offer.seller_team_id, total);
      await tx.adjustInventory(buyerId, offer.industry, 'material_units', quantity);

      const remaining = offer.remaining - quantity;
      const updated = await tx.updateOffer(offer.id, {
        remaining,
        status: remaining === 0 ? 'filled' : 'open',
      });
      const settlement = await tx.insertSettlement({
        source: 'marketplace',
        source_id: offer.id,
        buyer_team_id: buyerId,
        seller_team_id: offer.seller_team_id,
        industry: offer.industry,
        quantity,
        unit_price: offer.unit_price,
        is_secret: false,
      });

      console.log(`[Marketplace] ${buyer.name} bought ${quantity} ${offer.industry} @ ${offer.unit_price}`);
      return { offer: updated, settlement };
    });
  }

  /** Withdraws an untouched offer and returns its units to the seller. */
  cancelOffer(actor: Actor, offerId: string): Promise<EngineResult<MarketplaceOffer>> {
    return this.execute('cancelOffer', async (tx) => {
      const sellerId = requireTeamActor(actor);
      await requireRunning(tx);

      const offer = await loadOffer(tx, offerId);
      if (offer.seller_team_id !== sellerId) {
        throw new EngineError('NotOwner', 'Only the seller can cancel an offer');
      }
      if (offer.status !== 'open') {
        throw new EngineError('OfferNotOpen', `Offer ${offerId} is ${offer.status}`);
      }
      if (offer.remaining !== offer.quantity) {
        throw new EngineError(
          'OfferPartiallyFilled',
          `Offer ${offerId} already sold ${offer.quantity - offer.remaining} units`
        );
      }

      const seller = await loadTeam(tx, sellerId);
      requireUnitsFit(seller, offer.industry, 'material_units', offer.remaining, 'InvalidQuantity');
      await tx.adjustInventory(sellerId, offer.industry, 'material_units', offer.remaining);
      return tx.updateOffer(offer.id, { remaining: 0, status: 'cancelled' });
    });
  }

  /** Sets a new price on the units still on offer. Past fills keep their price. */
  repriceOffer(actor: Actor, offerId: string, unitPrice: number): Promise<EngineResult<MarketplaceOffer>> {
    return this.execute('repriceOffer', async (tx) => {
      const sellerId = requireTeamActor(actor);
      await requireRunning(tx);
      requirePrice(unitPrice);

      const offer = await loadOffer(tx, offerId);
      if (offer.seller_team_id !== sellerId) {
        throw new EngineError('NotOwner', 'Only the seller can reprice an offer');
      }
      if (offer.status !== 'open') {
        throw new EngineError('OfferNotOpen', `Offer ${offerId} is ${offer.status}`);
      }
      requireSafeTotal(offer.remaining, unitPrice);

      console.log(`[Marketplace] Offer ${offer.id} repriced ${offer.unit_price} -> ${unitPrice}`);
      return tx.updateOfferPrice(offer.id, unitPrice);
    });
  }

  /** Open offers, cheapest first, then oldest. */
  listOpenOffers(filter: OfferFilter = {}): Promise<EngineResult<MarketplaceOffer[]>> {
    return this.query(async (reader) => {
      const offers = await reader.listOffers();
      return offers
        .filter((o) => o.status === 'open')
        .filter((o) => !filter.industry || o.industry === filter.industry)
        .filter((o) => !filter.excludeTeamId || o.seller_team_id !== filter.excludeTeamId)
        .sort(
          (a, b) =>
            a.unit_price - b.unit_price || a.created_at.getTime() - b.created_at.getTime()
        );
    });
  }

  /** Every offer a team has posted, newest first. */
  listTeamOffers(teamId: string): Promise<EngineResult<MarketplaceOffer[]>> {
    return this.query(async (reader) => {
      await loadTeam(reader, teamId);
      const offers = await reader.listOffers();
      return offers
        .filter((o) => o.seller_team_id === teamId)
        .reverse()
        .sort((a, b) => b.created_at.getTime() - a.created_at.getTime());
    });
  }
}
