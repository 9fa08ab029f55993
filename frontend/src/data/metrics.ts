import { optionKey } from './filters';
import { Table, hasColumn, isBlank } from './types';

/** Summary figures for a filtered view. A figure whose source column is absent is null. */
export interface LendingMetrics {
  totalIssued: number;
  uniqueBorrowers: number | null;
  notReturned: number | null;
  lateReturns: number | null;
}

const LATE = /Late|Overdue/;

export function computeMetrics(view: Table): LendingMetrics {
  const rows = view.rows;
  let uniqueBorrowers: number | null = null;
  if (hasColumn(view, 'borrower_id')) {
    const ids = new Set<string>();
    for (const row of rows) {
      const id = row.borrower_id;
      if (!isBlank(id)) ids.add(optionKey(id));
    }
    uniqueBorrowers = ids.size;
  }
  const notReturned = hasColumn(view, 'return_date') ? rows.filter(r => isBlank(r.return_date)).length : null;
  // Only text statuses are searched; empty or numeric cells never count as late
  const lateReturns = hasColumn(view, 'overdue_status')
    ? rows.filter(r => {
        const s = r.overdue_status;
        return typeof s === 'string' && LATE.test(s);
      }).length
    : null;
  return { totalIssued: rows.length, uniqueBorrowers, notReturned, lateReturns };
}

export interface MetricCard {
  key: keyof LendingMetrics;
  label: string;
  value: number;
}

const METRIC_LABELS: [keyof LendingMetrics, string][] = [
  ['totalIssued', 'Total Books Issued'],
  ['uniqueBorrowers', 'Unique Borrowers'],
  ['notReturned', 'Books Not Returned'],
  ['lateReturns', 'Late Returns'],
];

/** Labelled cards for the metrics strip, skipping figures that cannot be computed. */
export function metricCards(metrics: LendingMetrics): MetricCard[] {
  return METRIC_LABELS.flatMap(([key, label]) => {
    const value = metrics[key];
    return value === null ? [] : [{ key, label, value }];
  });
}
