import type { BreakdownRow, ChartData, SummaryStats, Transaction } from '@tallybook/shared';
import { monthKey } from './dates.js';
import { formatCents } from './money.js';

export type Totals = {
  incomeCents: number;
  expenseCents: number;
  netCents: number;
  count: number;
};

export type Bucket = {
  key: string; // category name or YYYY-MM
  expenseCents: number;
  incomeCents: number;
};

/** Minimal shape the aggregations read. */
export type AmountRow = Pick<Transaction, 'amountCents' | 'type' | 'date' | 'category'>;

export const UNCATEGORIZED = 'uncategorized';

// Amounts are integer cents throughout, so sums are exact and order-independent.
export function summarize(rows: readonly AmountRow[]): Totals {
  let incomeCents = 0;
  let expenseCents = 0;
  for (const r of rows) {
    if (r.type === 'income') incomeCents += r.amountCents;
    else expenseCents += r.amountCents;
  }
  return { incomeCents, expenseCents, netCents: incomeCents - expenseCents, count: rows.length };
}

function bucketBy(rows: readonly AmountRow[], keyOf: (r: AmountRow) => string): Bucket[] {
  const buckets = new Map<string, Bucket>();
  for (const r of rows) {
    const key = keyOf(r);
    let b = buckets.get(key);
    if (!b) {
      b = { key, expenseCents: 0, incomeCents: 0 };
      buckets.set(key, b);
    }
    if (r.type === 'income') b.incomeCents += r.amountCents;
    else b.expenseCents += r.amountCents;
  }
  return Array.from(buckets.values());
}

/** Per category, largest expense first; ties by name. */
export function breakdownByCategory(rows: readonly AmountRow[]): Bucket[] {
  return bucketBy(rows, r => r.category ?? UNCATEGORIZED).sort(
    (a, b) => b.expenseCents - a.expenseCents || a.key.localeCompare(b.key)
  );
}

/** Per calendar month, oldest first. */
export function breakdownByMonth(rows: readonly AmountRow[]): Bucket[] {
  return bucketBy(rows, r => monthKey(r.date)).sort((a, b) => a.key.localeCompare(b.key));
}

export function toSummaryStats(t: Totals): SummaryStats {
  return {
    income: formatCents(t.incomeCents),
    expenses: formatCents(t.expenseCents),
    net: formatCents(t.netCents),
    transactionCount: t.count,
  };
}

export function toBreakdownRows(buckets: readonly Bucket[]): BreakdownRow[] {
  return buckets.map(b => ({
    label: b.key,
    expenses: formatCents(b.expenseCents),
    income: formatCents(b.incomeCents),
  }));
}

export type MonthlyPage = { months: Bucket[]; page: number; totalPages: number };

/**
 * Pages the monthly series newest-first, `perPage` months at a time, and
 * returns each page in chronological order.
 */
export function paginateMonths(months: readonly Bucket[], page: number, perPage: number): MonthlyPage {
  const totalPages = Math.max(1, Math.ceil(months.length / perPage));
  const current = Math.min(Math.max(1, Math.trunc(page) || 1), totalPages);
  const newestFirst = [...months].reverse();
  const slice = newestFirst.slice((current - 1) * perPage, current * perPage).reverse();
  return { months: slice, page: current, totalPages };
}

export function buildChartData(rows: readonly AmountRow[], monthLimit = 12): ChartData {
  const categories = breakdownByCategory(rows);
  const monthly = breakdownByMonth(rows).slice(-monthLimit);
  const series = (buckets: Bucket[]) => ({
    labels: buckets.map(b => b.key),
    expenses: buckets.map(b => formatCents(b.expenseCents)),
    income: buckets.map(b => formatCents(b.incomeCents)),
  });
  return { categories: series(categories), monthly: series(monthly) };
}
