import { monthKey } from './dates';
import { optionKey } from './filters';
import { LendingColumn, Table, hasColumn, isBlank, isDate } from './types';

/** Labelled series, index-aligned. */
export interface Series {
  labels: string[];
  values: number[];
}

const sortDescending = (entries: [string, number][]): Series => {
  // Array#sort is stable, so equal values keep encounter order
  const sorted = [...entries].sort((a, b) => b[1] - a[1]);
  return { labels: sorted.map(e => e[0]), values: sorted.map(e => e[1]) };
};

/**
 * Loans per calendar month of issue_date, chronological. Months between the first and
 * last loan with no activity are included as zero. Null when the column is absent.
 */
export function monthlyIssueCounts(view: Table): Series | null {
  if (!hasColumn(view, 'issue_date')) return null;
  const counts = new Map<string, number>();
  let first: Date | null = null;
  let last: Date | null = null;
  for (const row of view.rows) {
    const d = row.issue_date;
    if (!isDate(d)) continue;
    const key = monthKey(d);
    counts.set(key, (counts.get(key) ?? 0) + 1);
    if (!first || d < first) first = d;
    if (!last || d > last) last = d;
  }
  if (!first || !last) return { labels: [], values: [] };
  const labels: string[] = [];
  const values: number[] = [];
  const cursor = new Date(first.getFullYear(), first.getMonth(), 1);
  const stop = new Date(last.getFullYear(), last.getMonth(), 1).getTime();
  while (cursor.getTime() <= stop) {
    const key = monthKey(cursor);
    labels.push(key);
    values.push(counts.get(key) ?? 0);
    cursor.setMonth(cursor.getMonth() + 1);
  }
  return { labels, values };
}

/** Rows per distinct value of `column`, most frequent first. Blank cells are not counted. */
export function countBy(view: Table, column: LendingColumn): Series | null {
  if (!hasColumn(view, column)) return null;
  const counts = new Map<string, number>();
  for (const row of view.rows) {
    const v = row[column];
    if (isBlank(v)) continue;
    const key = optionKey(v);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return sortDescending([...counts.entries()]);
}

export function topBorrowedTitles(view: Table, limit = 10): Series | null {
  const counts = countBy(view, 'book_title');
  if (!counts) return null;
  return { labels: counts.labels.slice(0, limit), values: counts.values.slice(0, limit) };
}

/** Mean of the numeric `valueColumn` per group, highest first. Groups without numbers are dropped. */
export function meanBy(view: Table, groupColumn: LendingColumn, valueColumn: LendingColumn): Series | null {
  if (!hasColumn(view, groupColumn) || !hasColumn(view, valueColumn)) return null;
  const sums = new Map<string, { total: number; n: number }>();
  for (const row of view.rows) {
    const g = row[groupColumn];
    const v = row[valueColumn];
    if (isBlank(g) || typeof v !== 'number' || !Number.isFinite(v)) continue;
    const key = optionKey(g);
    const acc = sums.get(key) ?? { total: 0, n: 0 };
    acc.total += v;
    acc.n += 1;
    sums.set(key, acc);
  }
  return sortDescending([...sums.entries()].map(([k, { total, n }]) => [k, total / n]));
}
