import React from 'react';
import type { ViewMetrics } from '../models/PowerPlant';
import { formatCount, formatMegawatts } from '../utils/plantPresentation';

interface MetricsBarProps {
  metrics: ViewMetrics;
}

const MetricsBar: React.FC<MetricsBarProps> = ({ metrics }) => {
  const items = [
    { label: 'Total Capacity', value: formatMegawatts(metrics.totalMw) },
    { label: 'Plant Count', value: formatCount(metrics.plantCount) },
    { label: 'Main Source', value: metrics.topFuel },
  ];

  return (
    <section className="metrics-bar" aria-label="Key metrics">
      {items.map((item) => (
        <div key={item.label} className="metric-card">
          <span className="metric-label">{item.label}</span>
          <span className="metric-value">{item.value}</span>
        </div>
      ))}
    </section>
  );
};

export default MetricsBar;
