import { useCallback, useEffect, useMemo, useReducer, useRef, Reducer } from 'react';
import { LoadError } from '../data/errors';
import { clampDateRange, DateRange, FilterState } from '../data/filters';
import { loadTable, loadTableFromFile } from '../data/loader';
import { CategoricalColumn, Table } from '../data/types';
import { createDashboardSession, DashboardSession, DashboardView } from './session';

export type DashboardState =
  | { status: 'loading'; source: string }
  | { status: 'error'; source: string; error: LoadError }
  | { status: 'ready'; source: string; session: DashboardSession; filters: FilterState };

export type DashboardAction =
  | { type: 'LOAD_START'; source: string }
  | { type: 'LOADED'; source: string; table: Table }
  | { type: 'FAILED'; source: string; error: LoadError }
  | { type: 'SET_DATE_RANGE'; range: DateRange }
  | { type: 'SET_SELECTION'; column: CategoricalColumn; values: string[] }
  | { type: 'RESET_FILTERS' };

export const dashboardReducer: Reducer<DashboardState, DashboardAction> = (state, action) => {
  switch (action.type) {
    case 'LOAD_START':
      return { status: 'loading', source: action.source };
    case 'LOADED': {
      // A fresh session per table: no memoized state carries over from the previous file
      const session = createDashboardSession(action.table);
      return { status: 'ready', source: action.source, session, filters: session.initialState };
    }
    case 'FAILED':
      return { status: 'error', source: action.source, error: action.error };
    case 'SET_DATE_RANGE': {
      if (state.status !== 'ready') return state;
      const bounds = state.session.options.dateBounds;
      if (!bounds) return state;
      return { ...state, filters: { ...state.filters, dateRange: clampDateRange(action.range, bounds) } };
    }
    case 'SET_SELECTION':
      if (state.status !== 'ready') return state;
      return {
        ...state,
        filters: { ...state.filters, selections: { ...state.filters.selections, [action.column]: action.values } },
      };
    case 'RESET_FILTERS':
      if (state.status !== 'ready') return state;
      return { ...state, filters: state.session.initialState };
    default:
      return state;
  }
};

const asLoadError = (source: string, err: unknown): LoadError =>
  err instanceof LoadError ? err : new LoadError(source, err instanceof Error ? err.message : String(err), { cause: err });

export interface DashboardController {
  state: DashboardState;
  derived: DashboardView | null;
  setDateRange: (range: DateRange) => void;
  setSelection: (column: CategoricalColumn, values: string[]) => void;
  resetFilters: () => void;
  openFile: (file: File) => void;
  exportView: () => ArrayBuffer | null;
}

/**
 * Owns one dashboard session: loads the table (unless one is supplied), holds the
 * filter state and re-derives the view after every change.
 */
export function useDashboard(source: string, initialTable?: Table): DashboardController {
  const [state, dispatch] = useReducer(
    dashboardReducer,
    initialTable,
    (table): DashboardState => (table ? dashboardReducer({ status: 'loading', source }, { type: 'LOADED', source, table }) : { status: 'loading', source }),
  );

  // Only the most recent load may settle the state
  const loadSeq = useRef(0);

  const runLoad = useCallback((name: string, load: () => Promise<Table>) => {
    const seq = ++loadSeq.current;
    dispatch({ type: 'LOAD_START', source: name });
    void load().then(
      table => { if (seq === loadSeq.current) dispatch({ type: 'LOADED', source: name, table }); },
      (err: unknown) => { if (seq === loadSeq.current) dispatch({ type: 'FAILED', source: name, error: asLoadError(name, err) }); },
    );
  }, []);

  useEffect(() => {
    if (initialTable) return;
    runLoad(source, () => loadTable(source));
    return () => { loadSeq.current += 1; };
  }, [source, initialTable, runLoad]);

  const derived = useMemo(
    () => (state.status === 'ready' ? state.session.derive(state.filters) : null),
    [state],
  );

  const setDateRange = useCallback((range: DateRange) => dispatch({ type: 'SET_DATE_RANGE', range }), []);
  const setSelection = useCallback(
    (column: CategoricalColumn, values: string[]) => dispatch({ type: 'SET_SELECTION', column, values }),
    [],
  );
  const resetFilters = useCallback(() => dispatch({ type: 'RESET_FILTERS' }), []);

  const openFile = useCallback((file: File) => runLoad(file.name, () => loadTableFromFile(file)), [runLoad]);

  const exportView = useCallback((): ArrayBuffer | null => {
    if (state.status !== 'ready' || !derived || derived.view.rows.length === 0) return null;
    return state.session.exportWorkbook(derived.view);
  }, [state, derived]);

  return { state, derived, setDateRange, setSelection, resetFilters, openFile, exportView };
}
