import { describe, it, expect, vi, beforeEach } from 'vitest';
import { renderHook, act, waitFor } from '@testing-library/react';
import { LoadError } from '../data/errors';
import { parseLendingCsv } from '../data/loader';
import { Table } from '../data/types';
import { dashboardReducer, DashboardState, useDashboard } from './useDashboard';

const { loadTable, loadTableFromFile } = vi.hoisted(() => ({ loadTable: vi.fn(), loadTableFromFile: vi.fn() }));

vi.mock('../data/loader', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../data/loader')>()),
  loadTable,
  loadTableFromFile,
}));

const day = (m: number, d: number) => new Date(2024, m - 1, d).getTime();

const table = parseLendingCsv([
  'borrower_id,genre,issue_date',
  'B1,Fiction,2024-01-05',
  'B2,Poetry,2024-02-10',
  'B3,Fiction,2024-03-11',
].join('\n'));

const ready = (): Extract<DashboardState, { status: 'ready' }> => {
  const state = dashboardReducer({ status: 'loading', source: 'loans.csv' }, { type: 'LOADED', source: 'loans.csv', table });
  if (state.status !== 'ready') throw new Error('expected a ready state');
  return state;
};

describe('dashboardReducer', () => {
  it('opens a session with every value selected', () => {
    const state = ready();
    expect(state.filters.dateRange).toEqual({ start: day(1, 5), end: day(3, 11) });
    expect(state.filters.selections).toEqual({ genre: ['Fiction', 'Poetry'] });
  });

  it('clamps date ranges to the observed bounds', () => {
    const next = dashboardReducer(ready(), { type: 'SET_DATE_RANGE', range: { start: day(1, 1), end: day(2, 1) } });
    expect(next.status === 'ready' && next.filters.dateRange).toEqual({ start: day(1, 5), end: day(2, 1) });
  });

  it('replaces one column selection and resets to the initial state', () => {
    const start = ready();
    const narrowed = dashboardReducer(start, { type: 'SET_SELECTION', column: 'genre', values: ['Poetry'] });
    expect(narrowed.status === 'ready' && narrowed.filters.selections.genre).toEqual(['Poetry']);
    const reset = dashboardReducer(narrowed, { type: 'RESET_FILTERS' });
    expect(reset.status === 'ready' && reset.filters).toBe(start.session.initialState);
  });

  it('ignores filter changes until a table is loaded', () => {
    const loading: DashboardState = { status: 'loading', source: 'loans.csv' };
    expect(dashboardReducer(loading, { type: 'RESET_FILTERS' })).toBe(loading);
    expect(dashboardReducer(loading, { type: 'SET_SELECTION', column: 'genre', values: [] })).toBe(loading);
  });

  it('records load failures', () => {
    const error = new LoadError('loans.csv', 'file is empty');
    expect(dashboardReducer(ready(), { type: 'FAILED', source: 'loans.csv', error })).toEqual({ status: 'error', source: 'loans.csv', error });
  });
});

describe('useDashboard', () => {
  beforeEach(() => {
    loadTable.mockReset();
    loadTableFromFile.mockReset();
  });

  it('is ready at once with a supplied table', () => {
    const { result } = renderHook(() => useDashboard('inline', table));
    expect(result.current.state.status).toBe('ready');
    expect(result.current.derived?.view.rows).toHaveLength(3);
    expect(loadTable).not.toHaveBeenCalled();
  });

  it('loads the source and re-derives on filter changes', async () => {
    loadTable.mockResolvedValueOnce(table);
    const { result } = renderHook(() => useDashboard('/loans.csv'));
    expect(result.current.state.status).toBe('loading');
    await waitFor(() => expect(result.current.state.status).toBe('ready'));
    expect(loadTable).toHaveBeenCalledWith('/loans.csv');

    act(() => result.current.setSelection('genre', ['Poetry']));
    expect(result.current.derived?.metrics.totalIssued).toBe(1);
    act(() => result.current.setSelection('genre', []));
    expect(result.current.derived?.metrics.totalIssued).toBe(3);
  });

  it('surfaces load errors', async () => {
    loadTable.mockRejectedValueOnce(new Error('socket hang up'));
    const { result } = renderHook(() => useDashboard('/loans.csv'));
    await waitFor(() => expect(result.current.state.status).toBe('error'));
    const state = result.current.state;
    expect(state.status === 'error' && state.error.message).toBe('Could not load /loans.csv: socket hang up');
  });

  it('keeps an opened file when the initial load settles later', async () => {
    let settle: (t: Table) => void = () => undefined;
    loadTable.mockReturnValueOnce(new Promise<Table>(resolve => { settle = resolve; }));
    const picked = parseLendingCsv('genre\nDrama\n');
    loadTableFromFile.mockResolvedValueOnce(picked);
    const { result } = renderHook(() => useDashboard('/loans.csv'));

    act(() => result.current.openFile(new File(['genre\nDrama\n'], 'picked.csv', { type: 'text/csv' })));
    await waitFor(() => expect(result.current.state.status).toBe('ready'));
    expect(result.current.state.source).toBe('picked.csv');

    await act(async () => { settle(table); });
    expect(result.current.state.source).toBe('picked.csv');
    expect(result.current.derived?.view.rows).toHaveLength(1);
  });

  it('exports nothing for an empty view', () => {
    const { result } = renderHook(() => useDashboard('inline', table));
    expect(result.current.exportView()).not.toBeNull();
    act(() => result.current.setDateRange({ start: day(1, 6), end: day(1, 7) }));
    expect(result.current.derived?.warning).not.toBeNull();
    expect(result.current.exportView()).toBeNull();
  });
});
