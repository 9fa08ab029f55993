import React from 'react';
import { PREVIEW_ROW_HEIGHT, PREVIEW_VIEWPORT } from '../config';
import { formatDateCell } from '../data/dates';
import { CellValue, Table, isDate } from '../data/types';
import { useWindowedRows } from './hooks';

interface DataPreviewProps {
  view: Table;
}

const formatNumber = (n: number) => n.toLocaleString('en-US', { maximumFractionDigits: 2 });

const renderCell = (v: CellValue | undefined): string => {
  if (v === null || v === undefined) return '';
  if (isDate(v)) return formatDateCell(v);
  return typeof v === 'number' ? formatNumber(v) : v;
};

/** Windowed table of the filtered rows; every column, including unrecognised ones. */
export const DataPreview: React.FC<DataPreviewProps> = ({ view }) => {
  const windowed = useWindowedRows(view.rows, { rowHeight: PREVIEW_ROW_HEIGHT, viewport: PREVIEW_VIEWPORT });
  const colSpan = Math.max(1, view.columns.length);

  return (
    <section className="preview" aria-labelledby="preview-title">
      <h2 id="preview-title">Filtered Data</h2>
      <div className="preview-count">{view.rows.length.toLocaleString('en-US')} rows</div>
      <div
        className="table-wrapper"
        ref={windowed.containerRef}
        onScroll={windowed.onScroll}
        style={{ maxHeight: PREVIEW_VIEWPORT, overflowY: 'auto' }}
      >
        <table className="preview-table">
          <thead>
            <tr>
              {view.columns.map(col => <th key={col} scope="col">{col}</th>)}
            </tr>
          </thead>
          <tbody>
            <tr className="virtual-spacer" style={{ height: windowed.offsetY }}>
              <td colSpan={colSpan} />
            </tr>
            {windowed.slice.map((row, i) => (
              <tr key={windowed.startIndex + i} style={{ height: PREVIEW_ROW_HEIGHT }}>
                {view.columns.map(col => {
                  const v = row[col];
                  return <td key={col} className={typeof v === 'number' ? 'num' : undefined}>{renderCell(v)}</td>;
                })}
              </tr>
            ))}
            <tr className="virtual-spacer" style={{ height: windowed.bottomPad }}>
              <td colSpan={colSpan} />
            </tr>
          </tbody>
        </table>
      </div>
    </section>
  );
};
