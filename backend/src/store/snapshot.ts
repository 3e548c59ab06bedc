import type { LedgerSnapshot } from '../types';
import type { LedgerReader } from './LedgerStore';

/** Reads the whole ledger. Run it inside one `read` or `transaction`. */
export async function readSnapshot(reader: LedgerReader): Promise<LedgerSnapshot> {
  const game = await reader.getGame();
  const teams = await reader.listTeams();
  const offers = await reader.listOffers();
  const tradeRequests = await reader.listTradeRequests();
  const settlements = await reader.listSettlements();
  const productionLogs = await reader.listProductionLogs();
  const gifts = await reader.listGifts();
  const adjustments = await reader.listAdjustments();

  return { game, teams, offers, tradeRequests, settlements, productionLogs, gifts, adjustments };
}
