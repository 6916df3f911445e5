import { ValidationError } from './errors.js';

export type LabelKind = 'category' | 'tag';

export const MAX_LABEL_LENGTH = 50;

const LABEL_RE = /^[\p{L}\p{N}\- ]+$/u;

const NOUN: Record<LabelKind, string> = { category: 'Category', tag: 'Tag' };

/** Trims, lowercases and checks a category or tag name. */
export function normalizeLabel(name: string, kind: LabelKind): string {
  const noun = NOUN[kind];
  const value = name.trim().toLowerCase();
  if (!value) {
    throw new ValidationError(`${noun} name required`);
  }
  if ([...value].length > MAX_LABEL_LENGTH) {
    throw new ValidationError(`${noun} name too long (max ${MAX_LABEL_LENGTH} characters)`);
  }
  if (!LABEL_RE.test(value)) {
    throw new ValidationError(`${noun} name can only contain letters, numbers, hyphens and spaces`);
  }
  return value;
}

export function normalizeTags(tags: Iterable<string>): string[] {
  const out = new Set<string>();
  for (const t of tags) {
    if (!t.trim()) continue;
    out.add(normalizeLabel(t, 'tag'));
  }
  return Array.from(out);
}

/** Splits a comma-separated list ('a, b,,c') into trimmed, non-empty entries. */
export function splitList(value: string | undefined | null): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}
