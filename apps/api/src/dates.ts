import { format, isValid, parse } from 'date-fns';

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** True for a real calendar date written as YYYY-MM-DD ('2024-02-30' is not). */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  return isValid(parse(value, 'yyyy-MM-dd', new Date()));
}

export function toIsoDate(d: Date): string {
  return format(d, 'yyyy-MM-dd');
}

export function monthKey(isoDate: string): string {
  return isoDate.slice(0, 7);
}
