import { dayStartMs, toYMD } from './dates';
import { CATEGORICAL_COLUMNS, CategoricalColumn, CellValue, Row, Table, hasColumn, isBlank, isDate } from './types';

// Sidebar labels, in display order
const CATEGORICAL_LABELS: Record<CategoricalColumn, string> = {
  genre: 'Book Genres',
  borrower_type: 'Borrower Types',
  student_batch: 'Student Batches',
  student_major: 'Student Majors',
  borrower_age_group: 'Age Groups',
};

export interface CategoricalFilter {
  column: CategoricalColumn;
  label: string;
}

export const CATEGORICAL_FILTERS: readonly CategoricalFilter[] = CATEGORICAL_COLUMNS.map(column => ({
  column,
  label: CATEGORICAL_LABELS[column],
}));

/** Inclusive day range, both ends as local-midnight timestamps (ms). */
export interface DateRange {
  start: number;
  end: number;
}

export interface CategoricalOptions extends CategoricalFilter {
  values: string[]; // distinct option keys in encounter order
}

export interface FilterOptions {
  dateBounds: DateRange | null;
  categories: CategoricalOptions[];
}

export interface FilterState {
  dateRange: DateRange | null;
  selections: Partial<Record<CategoricalColumn, readonly string[]>>;
}

/** Stable string key for a categorical cell. Blank cells share the empty key. */
export const optionKey = (v: CellValue | undefined): string => {
  if (isBlank(v)) return '';
  if (isDate(v)) return toYMD(v);
  return typeof v === 'number' ? String(v) : v;
};

export const optionLabel = (key: string): string => (key === '' ? '(blank)' : key);

export function deriveFilterOptions(table: Table): FilterOptions {
  let dateBounds: DateRange | null = null;
  if (hasColumn(table, 'issue_date')) {
    for (const row of table.rows) {
      const d = row.issue_date;
      if (!isDate(d)) continue;
      const day = dayStartMs(d);
      if (!dateBounds) dateBounds = { start: day, end: day };
      else {
        if (day < dateBounds.start) dateBounds.start = day;
        if (day > dateBounds.end) dateBounds.end = day;
      }
    }
  }
  const categories = CATEGORICAL_FILTERS.filter(f => hasColumn(table, f.column)).map(f => {
    const seen = new Set<string>();
    for (const row of table.rows) seen.add(optionKey(row[f.column]));
    return { ...f, values: [...seen] };
  });
  return { dateBounds, categories };
}

/** Full date range and every observed value selected. */
export function defaultFilterState(options: FilterOptions): FilterState {
  const selections: FilterState['selections'] = {};
  for (const c of options.categories) selections[c.column] = c.values;
  return { dateRange: options.dateBounds ? { ...options.dateBounds } : null, selections };
}

export function clampDateRange(range: DateRange, bounds: DateRange): DateRange {
  const lo = Math.min(range.start, range.end);
  const hi = Math.max(range.start, range.end);
  return {
    start: Math.min(Math.max(lo, bounds.start), bounds.end),
    end: Math.max(Math.min(hi, bounds.end), bounds.start),
  };
}

type RowPredicate = (row: Row) => boolean;

function buildPredicates(table: Table, state: FilterState): RowPredicate[] {
  const predicates: RowPredicate[] = [];
  if (state.dateRange && hasColumn(table, 'issue_date')) {
    const { start, end } = state.dateRange;
    // Compare calendar days so both bounds are inclusive whatever the time of issue
    predicates.push(row => {
      const d = row.issue_date;
      if (!isDate(d)) return false;
      const day = dayStartMs(d);
      return day >= start && day <= end;
    });
  }
  for (const { column } of CATEGORICAL_FILTERS) {
    const selected = state.selections[column];
    // An empty selection disables the filter instead of excluding every row
    if (!selected || selected.length === 0 || !hasColumn(table, column)) continue;
    const allowed = new Set(selected);
    predicates.push(row => allowed.has(optionKey(row[column])));
  }
  return predicates;
}

/**
 * Rows matching every active predicate (AND across columns, OR within a selection).
 * Pure: returns a new table over the same row objects.
 */
export function applyFilters(table: Table, state: FilterState): Table {
  const predicates = buildPredicates(table, state);
  const rows = predicates.length ? table.rows.filter(row => predicates.every(p => p(row))) : [...table.rows];
  return Object.freeze({ columns: table.columns, rows: Object.freeze(rows) });
}

export function filterStateKey(state: FilterState): string {
  const selections = CATEGORICAL_COLUMNS.flatMap(column => {
    const values = state.selections[column];
    return values ? [[column, [...values].sort()] as const] : [];
  });
  return JSON.stringify({ date: state.dateRange ? [state.dateRange.start, state.dateRange.end] : null, selections });
}
