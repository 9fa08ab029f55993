import { describe, it, expect } from 'vitest';
import { EmptyResultWarning } from '../data/errors';
import { parseLendingCsv, parseLendingWorkbook } from '../data/loader';
import { createDashboardSession } from './session';

const csv = [
  'borrower_id,book_title,genre,issue_date,return_date',
  'B1,Maps of Salt,Fiction,2024-01-05,2024-01-19',
  'B2,Paper Moons,Poetry,2024-02-10,',
  'B1,Maps of Salt,Fiction,2024-03-11,',
].join('\n');

describe('createDashboardSession', () => {
  it('starts from the full dataset', () => {
    const session = createDashboardSession(parseLendingCsv(csv));
    const view = session.derive(session.initialState);
    expect(view.view.rows).toHaveLength(3);
    expect(view.metrics).toEqual({ totalIssued: 3, uniqueBorrowers: 2, notReturned: 2, lateReturns: null });
    expect(view.charts.map(c => c.id)).toEqual(['monthly-issues', 'top-titles', 'genre-share']);
    expect(view.warning).toBeNull();
  });

  it('reuses the derived view for an equivalent filter state', () => {
    const session = createDashboardSession(parseLendingCsv(csv));
    const a = session.derive({ ...session.initialState, selections: { genre: ['Poetry', 'Fiction'] } });
    const b = session.derive({ ...session.initialState, selections: { genre: ['Fiction', 'Poetry'] } });
    expect(b).toBe(a);
  });

  it('warns and drops the charts when nothing matches', () => {
    const session = createDashboardSession(parseLendingCsv(csv));
    const view = session.derive({ ...session.initialState, selections: { genre: ['Science'] } });
    expect(view.view.rows).toEqual([]);
    expect(view.charts).toEqual([]);
    expect(view.metrics.totalIssued).toBe(0);
    expect(view.warning).toBeInstanceOf(EmptyResultWarning);
    expect(view.warning?.sourceRows).toBe(3);
  });

  it('serializes a view once per distinct content', () => {
    const session = createDashboardSession(parseLendingCsv(csv));
    const fiction = session.derive({ ...session.initialState, selections: { genre: ['Fiction'] } });
    // a different filter state selecting the same rows
    const sameRows = session.derive({ dateRange: null, selections: { genre: ['Fiction'] } });
    expect(sameRows).not.toBe(fiction);
    const bytes = session.exportWorkbook(fiction.view);
    expect(session.exportWorkbook(sameRows.view)).toBe(bytes);
    expect(parseLendingWorkbook(bytes).rows.map(r => r.borrower_id)).toEqual(['B1', 'B1']);

    const poetry = session.derive({ ...session.initialState, selections: { genre: ['Poetry'] } });
    expect(session.exportWorkbook(poetry.view)).not.toBe(bytes);
  });

  it('keeps memoized state separate between sessions over one table', () => {
    const table = parseLendingCsv(csv);
    const first = createDashboardSession(table);
    const second = createDashboardSession(table);
    const a = first.derive(first.initialState);
    const b = second.derive(second.initialState);
    expect(b).not.toBe(a);
    expect(b.view.rows).toEqual(a.view.rows);
    expect(first.table).toBe(second.table);
  });
});
