import { parse, type CsvError } from 'csv-parse';
import type { ImportResult, TransactionKind } from '@tallybook/shared';
import { isIsoDate } from './dates.js';
import { splitList } from './labels.js';
import { parseAmountToCents, formatCents } from './money.js';
import { isTransactionKind, type TransactionStore } from './transactions.js';

type CsvRow = Record<string, string>;

type ParsedRow = {
  description: string;
  amount: string;
  type: TransactionKind;
  date: string;
  category: string;
  tags: string[];
};

class RowError extends Error {}

function toCsvRow(record: unknown): CsvRow {
  const row: CsvRow = {};
  if (typeof record !== 'object' || record === null) return row;
  for (const [key, value] of Object.entries(record)) {
    row[key.trim().toLowerCase()] = typeof value === 'string' ? value.trim() : '';
  }
  return row;
}

/**
 * Column aliases: `name` for `description`. Without a `type` column the sign
 * of `amount` decides: negative is an expense, positive is income, and the
 * stored amount is the absolute value.
 */
function parseRow(row: CsvRow): ParsedRow {
  const description = row.description || row.name || '';
  const amountStr = row.amount ?? '';
  const typeStr = (row.type ?? '').toLowerCase();
  const date = row.date ?? '';

  if (!description || !amountStr || !date) {
    throw new RowError('Missing required fields (description/name, amount, date)');
  }

  let cents: number;
  try {
    cents = parseAmountToCents(amountStr);
  } catch {
    throw new RowError(`Invalid amount '${amountStr}'`);
  }

  let type: TransactionKind;
  if (typeStr) {
    if (cents <= 0) throw new RowError("Amount must be positive when 'type' is specified");
    if (!isTransactionKind(typeStr)) {
      throw new RowError(`Type must be 'income' or 'expense', got '${row.type}'`);
    }
    type = typeStr;
  } else {
    if (cents === 0) throw new RowError('Amount cannot be zero');
    type = cents > 0 ? 'income' : 'expense';
  }

  if (!isIsoDate(date)) {
    throw new RowError(`Invalid date format '${date}' (use YYYY-MM-DD)`);
  }

  return {
    description,
    amount: formatCents(Math.abs(cents)),
    type,
    date,
    category: row.category ?? '',
    tags: splitList(row.tags),
  };
}

function readEntry(chunk: unknown): { record: unknown; line: number } {
  if (typeof chunk === 'object' && chunk !== null && 'record' in chunk && 'info' in chunk) {
    const { info } = chunk;
    const line =
      typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number'
        ? info.lines
        : 0;
    return { record: chunk.record, line };
  }
  return { record: chunk, line: 0 };
}

/**
 * Imports every valid row; a bad row is reported as `Row <n>: <reason>` and
 * skipped. `n` is the file line the record ends on, so the header is row 1.
 * Records the parser cannot read (an unclosed quote, say) are skipped the same way.
 */
export async function importCsv(store: TransactionStore, input: string | Buffer): Promise<ImportResult> {
  const parser = parse(input, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_records_with_error: true,
    info: true,
    bom: true,
  });

  let imported = 0;
  const failures: { line: number; reason: string }[] = [];

  parser.on('skip', (err: CsvError) => {
    const lines: unknown = err.lines;
    failures.push({ line: typeof lines === 'number' ? lines : 0, reason: err.message });
  });

  for await (const chunk of parser) {
    const { record, line } = readEntry(chunk);
    try {
      store.create(parseRow(toCsvRow(record)));
      imported += 1;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      failures.push({ line, reason });
    }
  }

  // skip events can fire ahead of the records still queued for iteration
  failures.sort((a, b) => a.line - b.line);
  return { success: true, imported, errors: failures.map(f => `Row ${f.line}: ${f.reason}`) };
}
