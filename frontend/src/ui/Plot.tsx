import React from 'react';
import type { PlotParams } from 'react-plotly.js';
import { logger } from '../logger';

// Lazy Plot component: the factory + dist bundle keep Plotly out of the main chunk.
const LazyPlot = React.lazy(async () => {
  try {
    const [factoryMod, plotlyMod] = await Promise.all([
      import('react-plotly.js/factory'),
      import('plotly.js-dist-min'),
    ]);
    return { default: factoryMod.default(plotlyMod.default) };
  } catch (err) {
    logger.error('failed to load Plotly components', { error: err instanceof Error ? err.message : String(err) });
    throw err;
  }
});

export const Plot: React.FC<PlotParams> = (props) => <LazyPlot {...props} />;

export default Plot;
