/** Input file missing, unreadable or unparsable. Fatal: the dashboard cannot start without a table. */
export class LoadError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Could not load ${source}: ${message}`, options);
    this.name = 'LoadError';
    this.source = source;
  }
}

// Non-fatal: the current filters match no rows. Charts and export are suppressed.
export class EmptyResultWarning {
  readonly name = 'EmptyResultWarning';
  readonly message = 'No lending records match the current filters.';

  constructor(readonly sourceRows: number) {}
}
