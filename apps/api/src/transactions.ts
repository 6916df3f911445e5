import type { Transaction, TransactionKind, TransactionPage } from '@tallybook/shared';
import { pruneOrphanTags, type Db } from './db.js';
import { isIsoDate, monthKey } from './dates.js';
import { NotFoundError, ValidationError } from './errors.js';
import { composeFilter, NO_FILTER, type TransactionFilter } from './filters.js';
import { normalizeLabel, normalizeTags } from './labels.js';
import { formatCents, parseAmountToCents } from './money.js';

const MAX_DESCRIPTION_LENGTH = 500;

export type TransactionInput = {
  description: string;
  amount: string | number; // positive decimal, at most two fraction digits
  type: TransactionKind;
  date: string;
  category?: string | null;
  tags?: string[];
};

type NormalizedInput = {
  description: string;
  amountCents: number;
  type: TransactionKind;
  date: string;
  category: string | null;
  tags: string[];
};

type TransactionRow = {
  id: number;
  description: string;
  amount_cents: number;
  type: TransactionKind;
  date: string;
  category: string | null;
  tags: string | null;
  created_at: string;
  updated_at: string;
};

const SELECT_TRANSACTIONS = `
  SELECT t.id, t.description, t.amount_cents, t.type, t.date,
         c.name AS category,
         (SELECT group_concat(g.name, ',')
            FROM transaction_tags tt JOIN tags g ON g.id = tt.tag_id
           WHERE tt.transaction_id = t.id) AS tags,
         t.created_at, t.updated_at
  FROM transactions t
  LEFT JOIN categories c ON c.id = t.category_id
`;

export function isTransactionKind(value: string): value is TransactionKind {
  return value === 'income' || value === 'expense';
}

/** Boundary validation shared by the HTTP layer and CSV import. */
export function normalizeTransactionInput(input: TransactionInput): NormalizedInput {
  const description = input.description.trim();
  if (!description) throw new ValidationError('Description cannot be empty');
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    throw new ValidationError(`Description too long (max ${MAX_DESCRIPTION_LENGTH} characters)`);
  }

  const amountCents = parseAmountToCents(input.amount);
  if (amountCents <= 0) throw new ValidationError('Amount must be positive');

  if (!isTransactionKind(input.type)) {
    throw new ValidationError(`Invalid transaction type: ${String(input.type)}`);
  }

  const date = input.date.trim();
  if (!isIsoDate(date)) {
    throw new ValidationError(`Invalid date format: ${date}. Expected YYYY-MM-DD`);
  }

  const rawCategory = input.category ?? '';
  const category = rawCategory.trim() ? normalizeLabel(rawCategory, 'category') : null;
  const tags = normalizeTags(input.tags ?? []);

  return { description, amountCents, type: input.type, date, category, tags };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    description: row.description,
    amount: formatCents(row.amount_cents),
    amountCents: row.amount_cents,
    type: row.type,
    date: row.date,
    category: row.category,
    tags: row.tags ? row.tags.split(',').sort() : [],
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class TransactionStore {
  constructor(
    private readonly db: Db,
    private readonly clock: () => Date = () => new Date()
  ) {}

  create(input: TransactionInput): Transaction {
    const data = normalizeTransactionInput(input);
    const id = this.db.transaction(() => {
      const categoryId = data.category ? this.ensureCategory(data.category) : null;
      const result = this.db
        .prepare(
          `INSERT INTO transactions (description, amount_cents, type, date, category_id)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(data.description, data.amountCents, data.type, data.date, categoryId);
      const newId = Number(result.lastInsertRowid);
      this.attachTags(newId, data.tags);
      return newId;
    })();
    return this.get(id);
  }

  get(id: number): Transaction {
    const row = this.db
      .prepare<[number], TransactionRow>(`${SELECT_TRANSACTIONS} WHERE t.id = ?`)
      .get(id);
    if (!row) throw new NotFoundError('Transaction not found');
    return toTransaction(row);
  }

  update(id: number, input: TransactionInput): Transaction {
    const data = normalizeTransactionInput(input);
    this.db.transaction(() => {
      const categoryId = data.category ? this.ensureCategory(data.category) : null;
      const result = this.db
        .prepare(
          `UPDATE transactions
              SET description = ?, amount_cents = ?, type = ?, date = ?, category_id = ?,
                  updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
            WHERE id = ?`
        )
        .run(data.description, data.amountCents, data.type, data.date, categoryId, id);
      if (result.changes === 0) throw new NotFoundError('Transaction not found');

      this.db.prepare('DELETE FROM transaction_tags WHERE transaction_id = ?').run(id);
      this.attachTags(id, data.tags);
      pruneOrphanTags(this.db);
    })();
    return this.get(id);
  }

  delete(id: number): void {
    this.db.transaction(() => {
      const result = this.db.prepare('DELETE FROM transactions WHERE id = ?').run(id);
      if (result.changes === 0) throw new NotFoundError('Transaction not found');
      pruneOrphanTags(this.db);
    })();
  }

  /** Every matching transaction, newest first. */
  query(filter: TransactionFilter = NO_FILTER): Transaction[] {
    const { clause, params } = composeFilter(filter, this.clock());
    return this.db
      .prepare<string[], TransactionRow>(
        `${SELECT_TRANSACTIONS} ${clause} ORDER BY t.date DESC, t.id DESC`
      )
      .all(...params)
      .map(toTransaction);
  }

  /** One calendar month per page, newest month first. Out-of-range pages are clamped. */
  listPage(filter: TransactionFilter, page: number): TransactionPage {
    const all = this.query(filter);

    const byMonth = new Map<string, Transaction[]>();
    for (const t of all) {
      const key = monthKey(t.date);
      if (!byMonth.has(key)) byMonth.set(key, []);
      byMonth.get(key)?.push(t);
    }

    const months = Array.from(byMonth.keys()).sort().reverse();
    const totalPages = months.length;
    const current = Math.min(Math.max(1, Math.trunc(page) || 1), Math.max(totalPages, 1));
    const currentMonth = totalPages ? months[current - 1] : null;

    return {
      transactions: currentMonth ? byMonth.get(currentMonth) ?? [] : [],
      currentMonth,
      total: all.length,
      page: current,
      totalPages,
      months,
    };
  }

  /** Removes all transactions and tags. The category registry is kept. */
  clearAll(): number {
    return this.db.transaction(() => {
      this.db.prepare('DELETE FROM transaction_tags').run();
      const { changes } = this.db.prepare('DELETE FROM transactions').run();
      this.db.prepare('DELETE FROM tags').run();
      return changes;
    })();
  }

  private ensureCategory(name: string): number {
    this.db.prepare('INSERT OR IGNORE INTO categories (name) VALUES (?)').run(name);
    const row = this.db
      .prepare<[string], { id: number }>('SELECT id FROM categories WHERE name = ?')
      .get(name);
    if (!row) throw new Error(`Category '${name}' missing after insert`);
    return row.id;
  }

  private attachTags(transactionId: number, tags: string[]): void {
    const insertTag = this.db.prepare('INSERT OR IGNORE INTO tags (name) VALUES (?)');
    const link = this.db.prepare(
      `INSERT OR IGNORE INTO transaction_tags (transaction_id, tag_id)
       SELECT ?, id FROM tags WHERE name = ?`
    );
    for (const name of tags) {
      insertTag.run(name);
      link.run(transactionId, name);
    }
  }
}
