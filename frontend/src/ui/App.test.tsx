import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { render, screen, within, fireEvent, cleanup } from '@testing-library/react';
import { LoadError } from '../data/errors';
import { EXPORT_FILENAME } from '../data/exporter';
import { parseLendingCsv } from '../data/loader';
import { App } from './App';

const { loadTable, downloadWorkbook } = vi.hoisted(() => ({ loadTable: vi.fn(), downloadWorkbook: vi.fn<(bytes: ArrayBuffer, filename?: string) => void>() }));

vi.mock('./Plot', () => ({
  Plot: () => <div data-testid="plot" />,
  default: () => <div data-testid="plot" />,
}));

vi.mock('../data/loader', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../data/loader')>()),
  loadTable,
}));

vi.mock('../data/exporter', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../data/exporter')>()),
  downloadWorkbook,
}));

const table = parseLendingCsv([
  'borrower_id,book_title,genre,borrower_type,issue_date,return_date,overdue_status',
  'B1,Maps of Salt,Fiction,Student,2024-01-05,2024-01-19,On Time',
  'B2,Paper Moons,Poetry,Faculty,2024-02-10,,Overdue',
  'B3,Maps of Salt,Fiction,Student,2024-03-11,,Returned Late',
].join('\n'));

const metric = (key: string) => screen.getByTestId(`metric-${key}`).textContent;

const group = (name: RegExp) => screen.getByRole('group', { name });

beforeEach(() => {
  loadTable.mockReset();
  downloadWorkbook.mockReset();
});

afterEach(() => {
  cleanup();
});

describe('App', () => {
  it('shows metrics, charts and rows for the full dataset', () => {
    const { container } = render(<App initialTable={table} source="loans.csv" />);
    expect(screen.getByRole('heading', { level: 1 }).textContent).toBe('📚 Library Statistics Dashboard');
    expect(metric('totalIssued')).toBe('Total Books Issued3');
    expect(metric('uniqueBorrowers')).toBe('Unique Borrowers3');
    expect(metric('notReturned')).toBe('Books Not Returned2');
    expect(metric('lateReturns')).toBe('Late Returns2');
    expect(screen.getByText('2024-01-05 to 2024-03-11')).toBeTruthy();
    const charts = [...container.querySelectorAll('figure[data-chart]')].map(f => f.getAttribute('data-chart'));
    expect(charts).toEqual(['monthly-issues', 'top-titles', 'genre-share', 'borrower-types']);
    expect(screen.getByText('3 rows')).toBeTruthy();
    expect(loadTable).not.toHaveBeenCalled();
  });

  it('narrows the view when a value is deselected', () => {
    render(<App initialTable={table} />);
    fireEvent.click(within(group(/Book Genres/)).getByRole('checkbox', { name: 'Poetry' }));
    expect(metric('totalIssued')).toBe('Total Books Issued2');
    expect(group(/Book Genres/).querySelector('legend')?.textContent).toBe('Book Genres (1 of 2)');
    expect(screen.getByText('2 rows')).toBeTruthy();
  });

  it('treats a cleared selection as all values', () => {
    render(<App initialTable={table} />);
    fireEvent.click(within(group(/Borrower Types/)).getByRole('button', { name: 'Clear' }));
    expect(metric('totalIssued')).toBe('Total Books Issued3');
  });

  it('shows the empty state when nothing matches, then resets', () => {
    const { container } = render(<App initialTable={table} />);
    fireEvent.click(within(group(/Book Genres/)).getByRole('checkbox', { name: 'Fiction' }));
    fireEvent.click(within(group(/Borrower Types/)).getByRole('checkbox', { name: 'Faculty' }));

    expect(screen.getByText('No Records Match')).toBeTruthy();
    expect(metric('totalIssued')).toBe('Total Books Issued0');
    expect(container.querySelectorAll('figure[data-chart]')).toHaveLength(0);
    expect(screen.queryByRole('button', { name: /Download as Excel/ })).toBeNull();

    fireEvent.click(screen.getByRole('button', { name: 'Reset Filters' }));
    expect(metric('totalIssued')).toBe('Total Books Issued3');
  });

  it('downloads the filtered rows', () => {
    render(<App initialTable={table} />);
    fireEvent.click(screen.getByRole('button', { name: /Download as Excel/ }));
    expect(downloadWorkbook).toHaveBeenCalledTimes(1);
    const [bytes, filename] = downloadWorkbook.mock.calls[0];
    expect(filename).toBe(EXPORT_FILENAME);
    expect(bytes.byteLength).toBeGreaterThan(0);
    expect(screen.getByText(`Downloaded ${EXPORT_FILENAME}.`)).toBeTruthy();
  });

  it('loads the configured source', async () => {
    loadTable.mockResolvedValueOnce(table);
    render(<App source="/loans.csv" />);
    expect(screen.getAllByRole('progressbar')).toHaveLength(2);
    await screen.findByTestId('metric-totalIssued');
    expect(loadTable).toHaveBeenCalledWith('/loans.csv');
    expect(screen.getByText('/loans.csv')).toBeTruthy();
  });

  it('blocks the dashboard when the file cannot be loaded', async () => {
    loadTable.mockRejectedValueOnce(new LoadError('/missing.csv', 'file not found (HTTP 404)'));
    render(<App source="/missing.csv" />);
    const alert = await screen.findByRole('alert');
    expect(within(alert).getByText('Unable to load lending data')).toBeTruthy();
    expect(within(alert).getByText('Could not load /missing.csv: file not found (HTTP 404)')).toBeTruthy();
    expect(screen.queryByTestId('metric-totalIssued')).toBeNull();
  });
});
