import axios from 'axios';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { DATA_URL } from '../config';
import { logger } from '../logger';
import { parseDateText } from './dates';
import { LoadError } from './errors';
import { CellValue, DATE_COLUMNS, Row, Table } from './types';

const log = logger.child('loader');

const NUMERIC = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

type RawCell = string | number | boolean | Date | null | undefined;

const isRawCell = (v: unknown): v is RawCell =>
  v === null || v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean' || v instanceof Date;

const blankRaw = (v: RawCell) => v === null || v === undefined || (typeof v === 'string' && v.trim() === '');

// Header cleanup: trim, name unnamed columns, de-duplicate repeated names (genre, genre.1, ...)
function normalizeHeader(raw: RawCell[]): string[] {
  const seen = new Map<string, number>();
  return raw.map((cell, i) => {
    const base = blankRaw(cell) ? `Unnamed: ${i}` : String(cell).trim();
    const n = seen.get(base) ?? 0;
    seen.set(base, n + 1);
    return n === 0 ? base : `${base}.${n}`;
  });
}

function toNumber(v: RawCell): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string' && NUMERIC.test(v.trim())) return Number(v.trim());
  return null;
}

function coerceDate(source: string, column: string, rowNumber: number, v: RawCell): Date | null {
  if (blankRaw(v)) return null;
  // Workbook date cells can carry sub-second drift from the serial conversion
  if (v instanceof Date) return new Date(Math.round(v.getTime() / 1000) * 1000);
  const parsed = parseDateText(String(v));
  if (!parsed) throw new LoadError(source, `unparsable date "${String(v)}" in column "${column}" (row ${rowNumber})`);
  return parsed;
}

function coerceText(v: RawCell): CellValue {
  if (blankRaw(v)) return null;
  if (v instanceof Date) return v;
  return typeof v === 'string' ? v : String(v);
}

/**
 * Turn a header + body grid into a typed, frozen Table.
 * Columns are typed as a whole: numeric only when every non-empty cell is numeric.
 * Date columns are coerced cell by cell; an unparsable date aborts the load.
 */
export function buildTable(source: string, grid: RawCell[][]): Table {
  const [head, ...body] = grid;
  if (!head || head.every(blankRaw)) throw new LoadError(source, 'no columns to parse from file');
  const columns = normalizeHeader(head);
  body.forEach((cells, i) => {
    if (cells.length > columns.length && cells.slice(columns.length).some(c => !blankRaw(c))) {
      throw new LoadError(source, `expected ${columns.length} fields in row ${i + 2}, saw ${cells.length}`);
    }
  });

  const dateCols = new Set<string>(DATE_COLUMNS.filter(c => columns.includes(c)));
  const numericCols = new Set<string>();
  columns.forEach((col, ci) => {
    if (dateCols.has(col)) return;
    let any = false;
    for (const cells of body) {
      const v = cells[ci];
      if (blankRaw(v)) continue;
      if (toNumber(v) === null) return;
      any = true;
    }
    if (any) numericCols.add(col);
  });

  const rows: Row[] = body.map((cells, ri) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((col, ci) => {
      const v = cells[ci];
      if (dateCols.has(col)) row[col] = coerceDate(source, col, ri + 2, v);
      else if (numericCols.has(col)) row[col] = toNumber(v);
      else row[col] = coerceText(v);
    });
    return Object.freeze(row);
  });

  return Object.freeze({ columns: Object.freeze(columns), rows: Object.freeze(rows) });
}

/** Parse delimited text with a header row. */
export function parseLendingCsv(text: string, source = 'input'): Table {
  const clean = text.replace(/^\uFEFF/, '');
  if (!clean.trim()) throw new LoadError(source, 'file is empty');
  const parsed = Papa.parse<string[]>(clean, { header: false, skipEmptyLines: true });
  // Delimiter guesses fail harmlessly on single-column files
  const fatal = parsed.errors.find(e => e.type !== 'Delimiter');
  if (fatal) {
    const where = fatal.row !== undefined ? ` (row ${fatal.row + 1})` : '';
    throw new LoadError(source, `${fatal.message}${where}`);
  }
  return buildTable(source, parsed.data);
}

/** Read the first sheet of an .xlsx workbook, e.g. a previously exported view. */
export function parseLendingWorkbook(bytes: ArrayBuffer | Uint8Array, source = 'workbook'): Table {
  let grid: unknown[][];
  try {
    const wb = XLSX.read(bytes, { type: 'array', cellDates: true });
    const first = wb.SheetNames[0];
    const sheet = first ? wb.Sheets[first] : undefined;
    if (!sheet) throw new LoadError(source, 'workbook has no sheets');
    grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
  } catch (err) {
    if (err instanceof LoadError) throw err;
    throw new LoadError(source, err instanceof Error ? err.message : 'unreadable workbook', { cause: err });
  }
  return buildTable(source, grid.map(cells => cells.map(c => (isRawCell(c) ? c : String(c)))));
}

const isWorkbookName = (name: string) => /\.xlsx$/i.test(name.split('?')[0] ?? name);

async function fetchTable(source: string): Promise<Table> {
  log.info('loading table', { source });
  try {
    if (isWorkbookName(source)) {
      const res = await axios.get<ArrayBuffer>(source, { responseType: 'arraybuffer' });
      return parseLendingWorkbook(res.data, source);
    }
    const res = await axios.get<string>(source, { responseType: 'text' });
    return parseLendingCsv(res.data, source);
  } catch (err) {
    if (err instanceof LoadError) throw err;
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      const reason = status === 404 ? 'file not found (HTTP 404)' : status ? `HTTP ${status}` : err.message;
      throw new LoadError(source, reason, { cause: err });
    }
    throw new LoadError(source, err instanceof Error ? err.message : String(err), { cause: err });
  }
}

// Memoized per distinct source; the table is read-only so it can be shared by every session.
const tableCache = new Map<string, Promise<Table>>();

export function loadTable(source: string = DATA_URL): Promise<Table> {
  const cached = tableCache.get(source);
  if (cached) return cached;
  const pending = fetchTable(source);
  tableCache.set(source, pending);
  void pending.then(
    table => log.debug('table loaded', { source, rows: table.rows.length, columns: table.columns.length }),
    (err: unknown) => {
      // Evict so that a retry refetches
      tableCache.delete(source);
      log.error('table load failed', { source, error: err instanceof Error ? err.message : String(err) });
    },
  );
  return pending;
}

export function clearTableCache(): void {
  tableCache.clear();
}

/** Parse a user-picked .csv or .xlsx file. */
export async function loadTableFromFile(file: File): Promise<Table> {
  if (isWorkbookName(file.name)) return parseLendingWorkbook(await file.arrayBuffer(), file.name);
  return parseLendingCsv(await file.text(), file.name);
}
