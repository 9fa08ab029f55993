import type { Data, Layout } from 'plotly.js';
import { CHART_HEIGHT } from '../config';
import { countBy, meanBy, monthlyIssueCounts, Series, topBorrowedTitles } from '../data/aggregations';
import { Table } from '../data/types';
import { AXIS_STYLE, COLORS, PaletteName, PALETTES, PLOT_COLORS, PLOT_LAYOUT_DARK, paletteColors } from '../theme';

export type ChartId = 'monthly-issues' | 'top-titles' | 'genre-share' | 'borrower-types' | 'loan-duration';

export interface ChartFigure {
  id: ChartId;
  title: string;
  data: Data[];
  layout: Partial<Layout>;
}

interface AxisLabels {
  x: string;
  y: string;
}

const formatInt = (n: number) => n.toLocaleString('en-US', { maximumFractionDigits: 0 });
const formatDays = (n: number) => n.toLocaleString('en-US', { minimumFractionDigits: 1, maximumFractionDigits: 1 });

const baseLayout = (title: string, axes?: AxisLabels): Partial<Layout> => ({
  ...PLOT_LAYOUT_DARK,
  height: CHART_HEIGHT,
  title: { text: title, font: { color: PLOT_COLORS.text, size: 14 } },
  showlegend: false,
  ...(axes
    ? {
        xaxis: { ...AXIS_STYLE, title: { text: axes.x } },
        yaxis: { ...AXIS_STYLE, title: { text: axes.y } },
      }
    : {}),
});

export function timeSeriesFigure(id: ChartId, series: Series, title: string, axes: AxisLabels): ChartFigure {
  return {
    id,
    title,
    data: [{
      type: 'scatter',
      mode: 'lines+markers',
      x: series.labels,
      y: series.values,
      line: { color: COLORS.accent, width: 2 },
      marker: { color: COLORS.accent, size: 7, line: { color: PLOT_COLORS.markerEdge, width: 1 } },
      hovertemplate: '%{x|%b %Y}<br>%{y:,.0f}<extra></extra>',
    }],
    layout: {
      ...baseLayout(title, axes),
      xaxis: { ...AXIS_STYLE, title: { text: axes.x }, type: 'date', tickformat: '%b %Y', tickangle: -45 },
      yaxis: { ...AXIS_STYLE, title: { text: axes.y }, rangemode: 'tozero', tickformat: ',d' },
    },
  };
}

/** Horizontal bars, first label at the top. */
export function horizontalBarFigure(
  id: ChartId,
  series: Series,
  title: string,
  axes: AxisLabels,
  palette: PaletteName = 'viridis',
  format: (n: number) => string = formatInt,
): ChartFigure {
  const longest = series.labels.reduce((a, b) => (a.length > b.length ? a : b), '');
  return {
    id,
    title,
    data: [{
      type: 'bar',
      orientation: 'h',
      x: series.values,
      y: series.labels,
      marker: { color: paletteColors(palette, series.labels.length), line: { color: PLOT_COLORS.grid, width: 1 } },
      text: series.values.map(format),
      textposition: 'auto',
      hovertemplate: '<b>%{y}</b><br>%{x}<extra></extra>',
    }],
    layout: {
      ...baseLayout(title, axes),
      margin: { ...PLOT_LAYOUT_DARK.margin, l: Math.min(220, Math.max(80, longest.length * 7)) },
      yaxis: { ...AXIS_STYLE, title: { text: axes.y }, autorange: 'reversed' },
    },
  };
}

export function pieFigure(id: ChartId, series: Series, title: string): ChartFigure {
  return {
    id,
    title,
    data: [{
      type: 'pie',
      labels: series.labels,
      values: series.values,
      texttemplate: '%{label}<br>%{percent:.1%}',
      hovertemplate: '<b>%{label}</b><br>%{value} loans (%{percent:.1%})<extra></extra>',
      direction: 'counterclockwise',
      marker: { colors: [...PALETTES.pastel], line: { color: PLOT_COLORS.markerEdge, width: 1 } },
    }],
    layout: { ...baseLayout(title), showlegend: true, legend: { font: { color: PLOT_COLORS.text } } },
  };
}

const usable = (series: Series | null): series is Series => series !== null && series.labels.length > 0;

/**
 * Figures for the filtered view, in display order. A chart whose columns are absent
 * (or that has nothing to plot) is left out; an empty view yields no charts at all.
 */
export function buildDashboardCharts(view: Table): ChartFigure[] {
  if (view.rows.length === 0) return [];
  const figures: ChartFigure[] = [];

  const monthly = monthlyIssueCounts(view);
  if (usable(monthly)) {
    figures.push(timeSeriesFigure('monthly-issues', monthly, 'Books Issued Each Month', { x: 'Date', y: 'Number of Books' }));
  }
  const titles = topBorrowedTitles(view, 10);
  if (usable(titles)) {
    figures.push(horizontalBarFigure('top-titles', titles, 'Top 10 Most Borrowed Books', { x: 'Times Borrowed', y: 'Book Title' }));
  }
  const genres = countBy(view, 'genre');
  if (usable(genres)) {
    figures.push(pieFigure('genre-share', genres, 'Book Genre Distribution'));
  }
  const borrowers = countBy(view, 'borrower_type');
  if (usable(borrowers)) {
    figures.push(horizontalBarFigure('borrower-types', borrowers, 'Books Issued by Borrower Type', { x: 'Number of Books', y: 'Borrower Type' }, 'deep'));
  }
  const duration = meanBy(view, 'genre', 'days_on_loan');
  if (usable(duration)) {
    figures.push(horizontalBarFigure('loan-duration', duration, 'Average Loan Duration by Genre', { x: 'Average Days', y: 'Genre' }, 'cubehelix', formatDays));
  }
  return figures;
}
