import React, { useMemo } from 'react';
import { LendingMetrics, metricCards } from '../data/metrics';

interface MetricsStripProps {
  metrics: LendingMetrics;
  periodLabel?: string;
}

const formatCount = (n: number) => n.toLocaleString('en-US', { maximumFractionDigits: 0 });

export const MetricsStrip: React.FC<MetricsStripProps> = ({ metrics, periodLabel }) => {
  const cards = useMemo(() => metricCards(metrics), [metrics]);

  return (
    <section className="summary-card" aria-labelledby="metrics-title">
      <div className="summary-header">
        <h2 id="metrics-title" className="summary-title">Key Metrics</h2>
        {periodLabel && <span className="summary-period">{periodLabel}</span>}
      </div>
      <div className="summary-grid">
        {cards.map(card => (
          <div key={card.key} className={`summary-item metric-${card.key}`} data-testid={`metric-${card.key}`}>
            <span className="summary-label">{card.label}</span>
            <span className="summary-value">{formatCount(card.value)}</span>
          </div>
        ))}
      </div>
    </section>
  );
};

export default MetricsStrip;
