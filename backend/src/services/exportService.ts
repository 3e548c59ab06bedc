import { INDUSTRIES } from '../types';
import type { LedgerSnapshot, TeamSnapshot } from '../types';
import { computeLeaderboard } from '../engines/LeaderboardEngine';
import type { LeaderboardRow } from '../engines/LeaderboardEngine';
import type { RawMaterialValuation } from '../engines/valuation';
import type { LedgerStore } from '../store/LedgerStore';
import { readSnapshot } from '../store/snapshot';

export const EXPORT_TABLES = [
  'teams',
  'inventory',
  'offers',
  'trade_requests',
  'settlements',
  'production',
  'gifts',
  'adjustments',
  'leaderboard',
] as const;

export type ExportTable = (typeof EXPORT_TABLES)[number];

export type Cell = string | number | boolean | null;

export interface Table {
  columns: string[];
  rows: Cell[][];
}

/** Full ledger dump for the admin. Secret trades included. */
export interface LedgerExport extends Omit<LedgerSnapshot, 'teams'> {
  exported_at: string;
  valuation: string;
  teams: TeamSnapshot[];
  leaderboard: LeaderboardRow[];
}

function iso(date: Date): string {
  return date.toISOString();
}

/**
 * Flattens one part of the snapshot into columns and rows. Team ids are
 * resolved to names so the sheet reads on its own.
 */
export function buildTable(
  snapshot: LedgerSnapshot,
  table: ExportTable,
  valuation: RawMaterialValuation
): Table {
  const name = (id: string) => snapshot.teams.find((t) => t.id === id)?.name ?? 'Unknown';

  switch (table) {
    case 'teams':
      return {
        columns: ['Position', 'TeamName', 'Username', 'Industry', 'InitialBalance', 'Balance'],
        rows: snapshot.teams.map((t) => [t.position, t.name, t.username, t.industry, t.initial_balance, t.balance]),
      };
    case 'inventory':
      return {
        columns: ['TeamName', 'Industry', 'RawUnits', 'MaterialUnits'],
        rows: snapshot.teams.flatMap((t) =>
          INDUSTRIES.map((i): Cell[] => [t.name, i, t.inventory[i].raw_units, t.inventory[i].material_units])
        ),
      };
    case 'offers':
      return {
        columns: ['OfferId', 'Seller', 'Industry', 'Quantity', 'Remaining', 'UnitPrice', 'Status', 'CreatedAt'],
        rows: snapshot.offers.map((o) => [
          o.id,
          name(o.seller_team_id),
          o.industry,
          o.quantity,
          o.remaining,
          o.unit_price,
          o.status,
          iso(o.created_at),
        ]),
      };
    case 'trade_requests':
      return {
        columns: ['RequestId', 'Proposer', 'Counterparty', 'Industry', 'Quantity', 'UnitPrice', 'Secret', 'Status', 'CreatedAt'],
        rows: snapshot.tradeRequests.map((r) => [
          r.id,
          name(r.proposer_team_id),
          name(r.counterparty_team_id),
          r.industry,
          r.quantity,
          r.unit_price,
          r.is_secret,
          r.status,
          iso(r.created_at),
        ]),
      };
    case 'settlements':
      return {
        columns: ['Source', 'Buyer', 'Seller', 'Industry', 'Quantity', 'UnitPrice', 'TotalAmount', 'Secret', 'Time'],
        rows: snapshot.settlements.map((s) => [
          s.source,
          name(s.buyer_team_id),
          name(s.seller_team_id),
          s.industry,
          s.quantity,
          s.unit_price,
          s.total_amount,
          s.is_secret,
          iso(s.created_at),
        ]),
      };
    case 'production':
      return {
        columns: ['TeamName', 'Industry', 'UnitsProduced', 'RawUnitsConsumed', 'Time'],
        rows: snapshot.productionLogs.map((l) => [
          name(l.team_id),
          l.industry,
          l.units_produced,
          l.raw_units_consumed,
          iso(l.created_at),
        ]),
      };
    case 'gifts':
      return {
        columns: ['TeamName', 'Industry', 'Units', 'Time'],
        rows: snapshot.gifts.map((g) => [name(g.team_id), g.industry, g.units, iso(g.created_at)]),
      };
    case 'adjustments':
      return {
        columns: ['TeamName', 'Kind', 'Industry', 'Delta', 'Reason', 'Time'],
        rows: snapshot.adjustments.map((a) => [
          name(a.team_id),
          a.kind,
          a.industry,
          a.delta,
          a.reason,
          iso(a.created_at),
        ]),
      };
    case 'leaderboard':
      return {
        columns: ['Rank', 'TeamName', 'Industry', 'Revenue', 'RawMaterialCost', 'Profit', 'TotalProduction', 'TotalPurchases', 'Balance'],
        rows: computeLeaderboard(snapshot, valuation).map((r) => [
          r.rank,
          r.team_name,
          r.industry,
          r.revenue,
          r.raw_material_cost,
          r.profit,
          r.total_production,
          r.total_purchases,
          r.balance,
        ]),
      };
  }
}

// Strings are always quoted, embedded quotes doubled
function csvCell(value: Cell): string {
  if (value === null) return '';
  if (typeof value === 'string') return `"${value.replace(/"/g, '""')}"`;
  return String(value);
}

export function toCsv(table: Table): string {
  let csv = table.columns.join(',') + '\n';
  for (const row of table.rows) {
    csv += row.map(csvCell).join(',') + '\n';
  }
  return csv;
}

/** Read-only export of the whole ledger. Never mutates anything. */
export class ExportService {
  constructor(
    private readonly store: LedgerStore,
    private readonly valuation: RawMaterialValuation,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async snapshot(): Promise<LedgerExport> {
    const snapshot = await this.store.read(readSnapshot);
    return {
      ...snapshot,
      exported_at: iso(this.clock()),
      valuation: this.valuation.name,
      teams: snapshot.teams.map(({ password_hash: _passwordHash, ...team }) => team),
      leaderboard: computeLeaderboard(snapshot, this.valuation),
    };
  }

  async csv(table: ExportTable): Promise<{ filename: string; body: string }> {
    const snapshot = await this.store.read(readSnapshot);
    const body = toCsv(buildTable(snapshot, table, this.valuation));
    const filename = `trading_game_${table}_${iso(this.clock()).slice(0, 10)}.csv`;
    console.log(`[Export] ${table}: ${body.split('\n').length - 2} rows`);
    return { filename, body };
  }
}
