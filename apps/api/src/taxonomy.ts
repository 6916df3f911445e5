import type { LabelUsage } from '@tallybook/shared';
import type { Db } from './db.js';
import { ConflictError, NotFoundError, ValidationError, type AppError } from './errors.js';
import { normalizeLabel, type LabelKind } from './labels.js';

/**
 * Outcome of a rename. A target that already exists is not a failure: the
 * caller decides whether to follow up with an explicit merge.
 */
export type RenameResult =
  | { status: 'renamed'; name: string; affected: number }
  | { status: 'conflict'; source: string; target: string }
  | { status: 'failed'; error: AppError };

export type MergeResult = { source: string; target: string; affected: number };

type LabelRow = { id: number; name: string };

const TABLE: Record<LabelKind, 'categories' | 'tags'> = { category: 'categories', tag: 'tags' };
const NOUN: Record<LabelKind, string> = { category: 'Category', tag: 'Tag' };

function lookupKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Categories live in an explicit registry (listed even when unused); tags
 * exist only while a transaction references them. Every cascade runs in a
 * single SQLite transaction.
 */
export class TaxonomyStore {
  constructor(private readonly db: Db) {}

  addCategory(name: string): string {
    const value = normalizeLabel(name, 'category');
    if (this.find('category', value)) throw new ConflictError('Category already exists');
    this.db.prepare('INSERT INTO categories (name) VALUES (?)').run(value);
    return value;
  }

  listCategories(): string[] {
    return this.db
      .prepare<[], { name: string }>('SELECT name FROM categories ORDER BY name')
      .all()
      .map(r => r.name);
  }

  listTags(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        'SELECT name FROM tags WHERE id IN (SELECT tag_id FROM transaction_tags) ORDER BY name'
      )
      .all()
      .map(r => r.name);
  }

  listCategoryUsage(): LabelUsage[] {
    return this.db
      .prepare<[], LabelUsage>(
        `SELECT c.name AS name, COUNT(t.id) AS transactionCount
           FROM categories c LEFT JOIN transactions t ON t.category_id = c.id
          GROUP BY c.id ORDER BY c.name`
      )
      .all();
  }

  listTagUsage(): LabelUsage[] {
    return this.db
      .prepare<[], LabelUsage>(
        `SELECT g.name AS name, COUNT(*) AS transactionCount
           FROM tags g JOIN transaction_tags tt ON tt.tag_id = g.id
          GROUP BY g.id ORDER BY g.name`
      )
      .all();
  }

  renameCategory(oldName: string, newName: string): RenameResult {
    return this.rename('category', oldName, newName);
  }

  renameTag(oldName: string, newName: string): RenameResult {
    return this.rename('tag', oldName, newName);
  }

  mergeCategory(source: string, target: string): MergeResult {
    return this.merge('category', source, target);
  }

  mergeTag(source: string, target: string): MergeResult {
    return this.merge('tag', source, target);
  }

  /** Deleting a label that does not exist throws NotFoundError. */
  deleteCategory(name: string): number {
    return this.remove('category', name);
  }

  deleteTag(name: string): number {
    return this.remove('tag', name);
  }

  private rename(kind: LabelKind, oldName: string, newName: string): RenameResult {
    let target: string;
    try {
      target = normalizeLabel(newName, kind);
    } catch (err) {
      if (err instanceof ValidationError) return { status: 'failed', error: err };
      throw err;
    }

    const source = lookupKey(oldName);
    return this.db.transaction((): RenameResult => {
      const row = this.find(kind, source);
      if (!row) return { status: 'failed', error: new NotFoundError(`${NOUN[kind]} not found`) };
      if (source === target) return { status: 'renamed', name: target, affected: 0 };
      if (this.find(kind, target)) return { status: 'conflict', source, target };

      this.db.prepare(`UPDATE ${TABLE[kind]} SET name = ? WHERE id = ?`).run(target, row.id);
      return { status: 'renamed', name: target, affected: this.usage(kind, row.id) };
    })();
  }

  private merge(kind: LabelKind, sourceName: string, targetName: string): MergeResult {
    const noun = NOUN[kind];
    const source = lookupKey(sourceName);
    const target = normalizeLabel(targetName, kind);
    if (source === target) {
      throw new ValidationError(`Cannot merge a ${noun.toLowerCase()} into itself`);
    }

    return this.db.transaction((): MergeResult => {
      const src = this.find(kind, source);
      if (!src) throw new NotFoundError(`${noun} not found`);
      const dst = this.find(kind, target);
      if (!dst) throw new NotFoundError(`Target ${noun.toLowerCase()} not found`);

      const affected = this.usage(kind, src.id);
      if (kind === 'category') {
        this.db.prepare('UPDATE transactions SET category_id = ? WHERE category_id = ?').run(dst.id, src.id);
      } else {
        this.db
          .prepare(
            `INSERT OR IGNORE INTO transaction_tags (transaction_id, tag_id)
             SELECT transaction_id, ? FROM transaction_tags WHERE tag_id = ?`
          )
          .run(dst.id, src.id);
        this.db.prepare('DELETE FROM transaction_tags WHERE tag_id = ?').run(src.id);
      }
      this.db.prepare(`DELETE FROM ${TABLE[kind]} WHERE id = ?`).run(src.id);

      return { source, target, affected };
    })();
  }

  private remove(kind: LabelKind, name: string): number {
    const key = lookupKey(name);
    return this.db.transaction((): number => {
      const row = this.find(kind, key);
      if (!row) throw new NotFoundError(`${NOUN[kind]} not found`);

      const affected = this.usage(kind, row.id);
      if (kind === 'category') {
        this.db.prepare('UPDATE transactions SET category_id = NULL WHERE category_id = ?').run(row.id);
      } else {
        this.db.prepare('DELETE FROM transaction_tags WHERE tag_id = ?').run(row.id);
      }
      this.db.prepare(`DELETE FROM ${TABLE[kind]} WHERE id = ?`).run(row.id);
      return affected;
    })();
  }

  private find(kind: LabelKind, name: string): LabelRow | undefined {
    return this.db
      .prepare<[string], LabelRow>(`SELECT id, name FROM ${TABLE[kind]} WHERE name = ?`)
      .get(name);
  }

  private usage(kind: LabelKind, id: number): number {
    const sql =
      kind === 'category'
        ? 'SELECT COUNT(*) AS n FROM transactions WHERE category_id = ?'
        : 'SELECT COUNT(*) AS n FROM transaction_tags WHERE tag_id = ?';
    return this.db.prepare<[number], { n: number }>(sql).get(id)?.n ?? 0;
  }
}
