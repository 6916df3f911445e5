export type TransactionKind = 'income' | 'expense';

export type Transaction = {
  id: number;
  description: string;
  amount: string; // two fraction digits, e.g. '120.00'
  amountCents: number;
  type: TransactionKind;
  date: string; // YYYY-MM-DD
  category: string | null;
  tags: string[];
  createdAt: string;
  updatedAt: string;
};

export type TransactionPage = {
  transactions: Transaction[];
  currentMonth: string | null; // YYYY-MM
  total: number;
  page: number;
  totalPages: number;
  months: string[];
};

export type TimeRangeKey =
  | 'all'
  | 'current_month'
  | '7d'
  | '30d'
  | '90d'
  | '3m'
  | '6m'
  | '12m'
  | 'custom';

export type SummaryStats = {
  income: string;
  expenses: string;
  net: string;
  transactionCount: number;
};

export type BreakdownRow = { label: string; expenses: string; income: string };

export type ChartSeries = { labels: string[]; expenses: string[]; income: string[] };

export type ChartData = { categories: ChartSeries; monthly: ChartSeries };

export type LabelUsage = { name: string; transactionCount: number };

export type ImportResult = { success: true; imported: number; errors: string[] };
