import type { Actor, Industry, Settlement, TradeRequest } from '../types';
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

export interface NewRequestInput {
  counterpartyId: string;
  industry: Industry;
  quantity: number;
  unitPrice: number;
  secret: boolean;
}

export interface AcceptedRequest {
  request: TradeRequest;
  settlement: Settlement;
}

async function loadRequest(tx: LedgerTransaction, requestId: string): Promise<TradeRequest> {
  const request = await tx.getTradeRequest(requestId);
  if (!request) {
    throw new EngineError('RequestNotFound', `Trade request ${requestId} not found`);
  }
  return request;
}

function assertPending(request: TradeRequest): void {
  if (request.status !== 'pending') {
    throw new EngineError('RequestNotPending', `Trade request ${request.id} is ${request.status}`);
  }
}

/**
 * Bilateral deals. The proposer always sells its own material to the
 * counterparty; the units are escrowed when the request is made and the deal
 * settles in full or not at all.
 *
 *   pending -> accepted | rejected | cancelled
 */
export class TradeRequestEngine extends BaseEngine {
  protected readonly tag = 'TradeRequest';

  createRequest(actor: Actor, input: NewRequestInput): Promise<EngineResult<TradeRequest>> {
    return this.execute('createRequest', async (tx) => {
      const proposerId = requireTeamActor(actor);
      await requireRunning(tx);
      requirePositiveInt(input.quantity);
      requirePrice(input.unitPrice);
      requireSafeTotal(input.quantity, input.unitPrice);

      if (input.counterpartyId === proposerId) {
        throw new EngineError('SelfTrade', 'Cannot propose a trade to yourself');
      }
      const proposer = await loadTeam(tx, proposerId);
      const counterparty = await loadTeam(tx, input.counterpartyId);

      if (input.industry !== proposer.industry) {
        throw new EngineError(
          'IndustryMismatch',
          `${proposer.name} can only sell ${proposer.industry}, not ${input.industry}`
        );
      }
      const held = proposer.inventory[proposer.industry].material_units;
      if (held < input.quantity) {
        throw new EngineError(
          'InsufficientInventory',
          `Cannot commit ${input.quantity} ${proposer.industry}, holding ${held}`
        );
      }

      await tx.adjustInventory(proposerId, proposer.industry, 'material_units', -input.quantity);
      const request = await tx.insertTradeRequest({
        proposer_team_id: proposerId,
        counterparty_team_id: counterparty.id,
        industry: proposer.industry,
        quantity: input.quantity,
        unit_price: input.unitPrice,
        is_secret: input.secret,
      });

      console.log(
        `[TradeRequest] ${proposer.name} -> ${counterparty.name}: ${input.quantity} ${proposer.industry} @ ${input.unitPrice}${input.secret ? ' (secret)' : ''}`
      );
      return request;
    });
  }

  accept(actor: Actor, requestId: string): Promise<EngineResult<AcceptedRequest>> {
    return this.execute('accept', async (tx) => {
      const buyerId = requireTeamActor(actor);
      await requireRunning(tx);

      const request = await loadRequest(tx, requestId);
      if (request.counterparty_team_id !== buyerId) {
        throw new EngineError('NotCounterparty', 'Only the counterparty can accept');
      }
      assertPending(request);

      const buyer = await loadTeam(tx, buyerId);
      const total = requireSafeTotal(request.quantity, request.unit_price);
      if (buyer.balance < total) {
        throw new EngineError('InsufficientFunds', `Deal costs ${total}, balance is ${buyer.balance}`);
      }
      requireSafeBalance(await loadTeam(tx, request.proposer_team_id), total, 'InvalidPrice');
      requireUnitsFit(buyer, request.industry, 'material_units', request.quantity, 'InvalidQuantity');

      await tx.adjustBalance(buyerId, -total);
      await tx.adjustBalance(request.proposer_team_id, total);
      await tx.adjustInventory(buyerId, request.industry, 'material_units', request.quantity);

      const accepted = await tx.updateTradeRequestStatus(request.id, 'accepted');
      const settlement = await tx.insertSettlement({
        source: 'trade_request',
        source_id: request.id,
        buyer_team_id: buyerId,
        seller_team_id: request.proposer_team_id,
        industry: request.industry,
        quantity: request.quantity,
        unit_price: request.unit_price,
        is_secret: request.is_secret,
      });

      console.log(`[TradeRequest] ${request.id} accepted by ${buyer.name}`);
      return { request: accepted, settlement };
    });
  }

  reject(actor: Actor, requestId: string): Promise<EngineResult<TradeRequest>> {
    return this.execute('reject', async (tx) => {
      const teamId = requireTeamActor(actor);
      await requireRunning(tx);

      const request = await loadRequest(tx, requestId);
      if (request.counterparty_team_id !== teamId) {
        throw new EngineError('NotCounterparty', 'Only the counterparty can reject');
      }
      return this.close(tx, request, 'rejected');
    });
  }

  cancel(actor: Actor, requestId: string): Promise<EngineResult<TradeRequest>> {
    return this.execute('cancel', async (tx) => {
      const teamId = requireTeamActor(actor);
      await requireRunning(tx);

      const request = await loadRequest(tx, requestId);
      if (request.proposer_team_id !== teamId) {
        throw new EngineError('NotProposer', 'Only the proposer can cancel');
      }
      return this.close(tx, request, 'cancelled');
    });
  }

  /**
   * Admin: every request. Team: its own requests, secret or not, and the
   * accepted public deals of everyone else. Newest first.
   */
  listVisible(actor: Actor): Promise<EngineResult<TradeRequest[]>> {
    return this.query(async (reader) => {
      const requests = (await reader.listTradeRequests()).reverse();
      if (actor.role === 'admin') return requests;

      const { teamId } = actor;
      return requests.filter(
        (r) =>
          r.proposer_team_id === teamId ||
          r.counterparty_team_id === teamId ||
          (r.status === 'accepted' && !r.is_secret)
      );
    });
  }

  // Refund the escrow and close the request
  private async close(
    tx: LedgerTransaction,
    request: TradeRequest,
    status: 'rejected' | 'cancelled'
  ): Promise<TradeRequest> {
    assertPending(request);
    const proposer = await loadTeam(tx, request.proposer_team_id);
    requireUnitsFit(proposer, request.industry, 'material_units', request.quantity, 'InvalidQuantity');
    await tx.adjustInventory(request.proposer_team_id, request.industry, 'material_units', request.quantity);
    return tx.updateTradeRequestStatus(request.id, status);
  }
}
