import React from 'react';
import { ChartFigure } from './charts';
import { Plot } from './Plot';

interface ChartGridProps {
  charts: ChartFigure[];
}

export const ChartGrid: React.FC<ChartGridProps> = ({ charts }) => {
  if (!charts.length) return null;
  return (
    <section className="charts" aria-labelledby="charts-title">
      <h2 id="charts-title">Data Visualizations</h2>
      <React.Suspense fallback={<div className="chart chart-loading">Loading charts…</div>}>
        <div className="charts-grid">
          {charts.map(fig => (
            <figure key={fig.id} className="chart" data-chart={fig.id} aria-label={fig.title}>
              <Plot
                data={fig.data}
                layout={fig.layout}
                config={{ displaylogo: false, responsive: true }}
                className="plot-inner"
                useResizeHandler
                style={{ width: '100%', height: '100%' }}
              />
            </figure>
          ))}
        </div>
      </React.Suspense>
    </section>
  );
};
