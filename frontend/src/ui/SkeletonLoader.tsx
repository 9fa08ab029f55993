import React from 'react';

interface SkeletonLoaderProps {
  type: 'card' | 'row' | 'chart';
  count?: number;
  className?: string;
}

const HEIGHTS: Record<SkeletonLoaderProps['type'], string> = {
  card: '96px',
  row: '32px',
  chart: '360px',
};

/** Placeholder blocks shown while the input file loads. */
export const SkeletonLoader: React.FC<SkeletonLoaderProps> = ({ type, count = 1, className = '' }) => {
  const skeletons = Array.from({ length: count }, (_, i) => (
    <div
      key={i}
      className={`skeleton skeleton-${type} ${className}`.trim()}
      style={{ width: '100%', height: HEIGHTS[type] }}
      aria-hidden="true"
    />
  ));

  return (
    <div className={`skeleton-group skeleton-group-${type}`} role="progressbar" aria-label="Loading lending records">
      {skeletons}
    </div>
  );
};
