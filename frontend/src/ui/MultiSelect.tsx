import React, { useCallback, useMemo } from 'react';
import { optionLabel } from '../data/filters';

interface MultiSelectProps {
  label: string;
  options: readonly string[];
  selected: readonly string[];
  onChange: (values: string[]) => void;
}

/**
 * Checkbox multi-select. Clearing every box leaves the filter inactive (all rows match),
 * so the summary says "All" for both a full and an empty selection.
 */
export const MultiSelect: React.FC<MultiSelectProps> = ({ label, options, selected, onChange }) => {
  const chosen = useMemo(() => new Set(selected), [selected]);

  const toggle = useCallback((key: string) => {
    // Keep option order stable regardless of click order
    onChange(options.filter(o => (o === key ? !chosen.has(o) : chosen.has(o))));
  }, [options, chosen, onChange]);

  const summary = selected.length === 0 || selected.length === options.length
    ? 'All'
    : `${selected.length} of ${options.length}`;

  return (
    <fieldset className="filter-group multiselect">
      <legend className="lbl">
        {label} <span className="multiselect-summary">({summary})</span>
      </legend>
      <div className="multiselect-actions">
        <button type="button" className="themed-small-btn" onClick={() => onChange([...options])}>Select all</button>
        <button type="button" className="themed-small-btn secondary" onClick={() => onChange([])}>Clear</button>
      </div>
      <ul className="multiselect-options">
        {options.map(key => (
          <li key={key}>
            <label>
              <input type="checkbox" checked={chosen.has(key)} onChange={() => toggle(key)} />
              <span>{optionLabel(key)}</span>
            </label>
          </li>
        ))}
      </ul>
    </fieldset>
  );
};

export default MultiSelect;
