import * as XLSX from 'xlsx';
import { formatDateCell } from './dates';
import { CellValue, Table, isDate } from './types';

export const EXPORT_FILENAME = 'filtered_library_data.xlsx';
export const EXPORT_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const EXPORT_SHEET = 'Sheet1';

// Dates go out as text so the file reads back identically in any timezone
const exportCell = (v: CellValue | undefined): string | number | null => {
  if (v === undefined || v === null) return null;
  if (isDate(v)) return formatDateCell(v);
  return v;
};

/**
 * Serialize a view to an .xlsx workbook: one sheet, header row, one row per record,
 * no index column.
 */
export function exportWorkbook(view: Table): ArrayBuffer {
  const aoa: (string | number | null)[][] = [
    [...view.columns],
    ...view.rows.map(row => view.columns.map(col => exportCell(row[col]))),
  ];
  const ws = XLSX.utils.aoa_to_sheet(aoa);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, EXPORT_SHEET);
  const out: ArrayBuffer = XLSX.write(wb, { type: 'array', bookType: 'xlsx', compression: true });
  return out;
}

/** Offer the workbook bytes as a browser download. */
export function downloadWorkbook(bytes: ArrayBuffer, filename: string = EXPORT_FILENAME): void {
  const blob = new Blob([bytes], { type: EXPORT_MIME });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  document.body.appendChild(a);
  a.click();
  document.body.removeChild(a);
  URL.revokeObjectURL(url);
}
