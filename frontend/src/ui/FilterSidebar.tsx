import React from 'react';
import { DateRange, FilterOptions, FilterState } from '../data/filters';
import { CategoricalColumn } from '../data/types';
import { DateRangeSlider } from './DateRangeSlider';
import { MultiSelect } from './MultiSelect';

interface FilterSidebarProps {
  options: FilterOptions;
  filters: FilterState;
  onDateRange: (range: DateRange) => void;
  onSelection: (column: CategoricalColumn, values: string[]) => void;
  onReset: () => void;
}

export const FilterSidebar: React.FC<FilterSidebarProps> = ({ options, filters, onDateRange, onSelection, onReset }) => (
  <aside className="sidebar" aria-labelledby="filters-title">
    <div className="sidebar-header">
      <h2 id="filters-title">Filters</h2>
      <button type="button" className="themed-small-btn secondary" onClick={onReset}>Reset filters</button>
    </div>
    {options.dateBounds && filters.dateRange && (
      <DateRangeSlider label="Date range" bounds={options.dateBounds} value={filters.dateRange} onChange={onDateRange} />
    )}
    {options.categories.map(c => (
      <MultiSelect
        key={c.column}
        label={c.label}
        options={c.values}
        selected={filters.selections[c.column] ?? []}
        onChange={values => onSelection(c.column, values)}
      />
    ))}
  </aside>
);
