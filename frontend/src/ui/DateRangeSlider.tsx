import React, { useEffect, useRef, useState } from 'react';
import { addDays, daysBetween, toYMD } from '../data/dates';
import { DateRange } from '../data/filters';
import { useDebouncedValue } from './hooks';

interface DateRangeSliderProps {
  label: string;
  bounds: DateRange;
  value: DateRange;
  onChange: (range: DateRange) => void;
  debounceMs?: number;
}

const sameRange = (a: DateRange, b: DateRange) => a.start === b.start && a.end === b.end;

/** Two-thumb day slider bounded by the observed issue dates. Commits after dragging settles. */
export const DateRangeSlider: React.FC<DateRangeSliderProps> = ({ label, bounds, value, onChange, debounceMs = 150 }) => {
  const [draft, setDraft] = useState<DateRange>(value);
  const committed = useRef(value);
  committed.current = value;

  // Parent resets (e.g. "Reset filters") replace the draft
  useEffect(() => { setDraft(value); }, [value]);

  const settled = useDebouncedValue(draft, debounceMs);
  useEffect(() => {
    if (!sameRange(settled, committed.current)) onChange(settled);
  }, [settled, onChange]);

  const span = daysBetween(bounds.start, bounds.end);
  const lo = daysBetween(bounds.start, draft.start);
  const hi = daysBetween(bounds.start, draft.end);

  const setLo = (offset: number) => setDraft(d => ({ start: addDays(bounds.start, Math.min(offset, daysBetween(bounds.start, d.end))), end: d.end }));
  const setHi = (offset: number) => setDraft(d => ({ start: d.start, end: addDays(bounds.start, Math.max(offset, daysBetween(bounds.start, d.start))) }));

  return (
    <fieldset className="filter-group date-range">
      <legend className="lbl">{label}</legend>
      <div className="date-range-values" aria-live="polite">
        <span data-testid="date-range-start">{toYMD(new Date(draft.start))}</span>
        <span className="sep">–</span>
        <span data-testid="date-range-end">{toYMD(new Date(draft.end))}</span>
      </div>
      <div className="date-range-tracks">
        <input
          type="range"
          min={0}
          max={span}
          step={1}
          value={lo}
          disabled={span === 0}
          aria-label={`${label} start`}
          onChange={e => setLo(Number(e.target.value))}
        />
        <input
          type="range"
          min={0}
          max={span}
          step={1}
          value={hi}
          disabled={span === 0}
          aria-label={`${label} end`}
          onChange={e => setHi(Number(e.target.value))}
        />
      </div>
    </fieldset>
  );
};
