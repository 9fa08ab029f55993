import { useState, useEffect, useRef, useCallback, useMemo } from 'react';
import type { RefObject } from 'react';

// ----------------------------------------------
// Debounce
// ----------------------------------------------
/**
 * Debounce a rapidly changing value (e.g. a slider being dragged). Returns the
 * latest value only after no changes have occurred for `delay` milliseconds.
 */
export const useDebouncedValue = <T,>(value: T, delay: number): T => {
  const [debounced, setDebounced] = useState(value);
  useEffect(() => {
    const id = window.setTimeout(() => setDebounced(value), delay);
    return () => window.clearTimeout(id);
  }, [value, delay]);
  return debounced;
};

export interface WindowedResult<T> {
  containerRef: RefObject<HTMLDivElement>;
  onScroll: () => void;
  slice: T[];
  offsetY: number;          // pixel offset for top spacer
  bottomPad: number;        // pixel height below the rendered slice
  startIndex: number;       // index of slice[0] in rows
  total: number;
}

export interface WindowOptions {
  rowHeight?: number;
  overscan?: number;
  viewport?: number;        // fallback height until the container is measured
}

// ----------------------------------------------
// Manual virtualization for the data preview
// ----------------------------------------------
export const useWindowedRows = <T,>(
  rows: readonly T[],
  { rowHeight = 32, overscan = 6, viewport = 400 }: WindowOptions = {},
): WindowedResult<T> => {
  const containerRef = useRef<HTMLDivElement>(null);
  const [scrollTop, setScrollTop] = useState(0);
  const [measuredHeight, setMeasuredHeight] = useState<number | null>(null);
  const total = rows.length;

  const onScroll = useCallback(() => {
    if (containerRef.current) setScrollTop(containerRef.current.scrollTop);
  }, []);

  // A new row set (filters changed) starts from the top
  useEffect(() => {
    setScrollTop(0);
    if (containerRef.current) containerRef.current.scrollTop = 0;
  }, [rows]);

  const height = measuredHeight ?? viewport;

  const { slice, offsetY, startIndex, bottomPad } = useMemo(() => {
    const start = Math.max(0, Math.floor(scrollTop / rowHeight) - overscan);
    const visible = Math.ceil(height / rowHeight) + overscan * 2;
    const end = Math.min(total, start + visible);
    return {
      slice: rows.slice(start, end),
      offsetY: start * rowHeight,
      startIndex: start,
      bottomPad: Math.max(0, (total - end) * rowHeight),
    };
  }, [scrollTop, rowHeight, overscan, height, rows, total]);

  // Track container height in flex layouts
  useEffect(() => {
    const el = containerRef.current;
    if (!el || typeof ResizeObserver === 'undefined') return;
    const measure = () => {
      const h = el.clientHeight;
      if (h) setMeasuredHeight(h);
    };
    measure();
    const ro = new ResizeObserver(measure);
    ro.observe(el);
    return () => ro.disconnect();
  }, []);

  return { containerRef, onScroll, slice, offsetY, bottomPad, startIndex, total };
};
