import { EmptyResultWarning } from '../data/errors';
import { exportWorkbook } from '../data/exporter';
import { applyFilters, deriveFilterOptions, defaultFilterState, FilterOptions, FilterState, filterStateKey } from '../data/filters';
import { computeMetrics, LendingMetrics } from '../data/metrics';
import { Row, Table } from '../data/types';
import { logger } from '../logger';
import { buildDashboardCharts, ChartFigure } from './charts';

const log = logger.child('session');

/** Everything the shell renders for one filter state. */
export interface DashboardView {
  state: FilterState;
  view: Table;
  metrics: LendingMetrics;
  charts: ChartFigure[];
  warning: EmptyResultWarning | null;
}

export interface DashboardSession {
  readonly table: Table;
  readonly options: FilterOptions;
  readonly initialState: FilterState;
  derive: (state: FilterState) => DashboardView;
  exportWorkbook: (view: Table) => ArrayBuffer;
}

/**
 * Per-session pipeline context. The loaded table is shared read-only; the memo tables
 * belong to this session alone, so concurrent sessions never see each other's state.
 */
export function createDashboardSession(table: Table): DashboardSession {
  const options = deriveFilterOptions(table);
  const initialState = defaultFilterState(options);
  const views = new Map<string, DashboardView>();
  const workbooks = new Map<string, ArrayBuffer>();
  const rowIndex = new Map<Row, number>(table.rows.map((row, i) => [row, i]));
  // Views share row objects with the table, so the row positions identify a view's content
  const contentKey = (view: Table): string | null => {
    const positions: number[] = [];
    for (const row of view.rows) {
      const i = rowIndex.get(row);
      if (i === undefined) return null;
      positions.push(i);
    }
    return `${view.columns.join('\u0000')}|${positions.join(',')}`;
  };

  const derive = (state: FilterState): DashboardView => {
    const key = filterStateKey(state);
    const cached = views.get(key);
    if (cached) return cached;
    const view = applyFilters(table, state);
    const derived: DashboardView = {
      state,
      view,
      metrics: computeMetrics(view),
      charts: buildDashboardCharts(view),
      warning: view.rows.length === 0 ? new EmptyResultWarning(table.rows.length) : null,
    };
    log.debug('derived view', { rows: view.rows.length, charts: derived.charts.length });
    views.set(key, derived);
    return derived;
  };

  const exportView = (view: Table): ArrayBuffer => {
    const key = contentKey(view);
    if (key === null) return exportWorkbook(view);
    const cached = workbooks.get(key);
    if (cached) return cached;
    const bytes = exportWorkbook(view);
    workbooks.set(key, bytes);
    return bytes;
  };

  return { table, options, initialState, derive, exportWorkbook: exportView };
}
