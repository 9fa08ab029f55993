export type CellValue = string | number | Date | null;

export type Row = Readonly<Record<string, CellValue>>;

/** In-memory table. Loaded once and never mutated; filtering yields new tables over the same rows. */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

// Recognised lending-record columns. All optional; features depending on an absent column are skipped.
export const DATE_COLUMNS = ['issue_date', 'due_date', 'return_date'] as const;
export type DateColumn = typeof DATE_COLUMNS[number];

export const CATEGORICAL_COLUMNS = [
  'genre',
  'borrower_type',
  'student_batch',
  'student_major',
  'borrower_age_group',
] as const;
export type CategoricalColumn = typeof CATEGORICAL_COLUMNS[number];

export type LendingColumn =
  | 'borrower_id'
  | 'book_title'
  | 'overdue_status'
  | 'days_on_loan'
  | DateColumn
  | CategoricalColumn;

export const hasColumn = (table: Table, column: LendingColumn): boolean => table.columns.includes(column);

export const isDate = (value: CellValue): value is Date => value instanceof Date;

export const isBlank = (value: CellValue | undefined): value is null | undefined =>
  value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
