import React from 'react';
import { BarChart, Bar, XAxis, YAxis, Tooltip, Cell, ResponsiveContainer } from 'recharts';
import type { ChartPoint } from '../models/PowerPlant';
import { FUEL_COLOR_RGB, formatMegawatts, getFuelColor } from '../utils/plantPresentation';

interface CapacityChartProps {
  series: ChartPoint[];
}

const CapacityChart: React.FC<CapacityChartProps> = ({ series }) => {
  if (series.length === 0) {
    return <div className="panel-warning">No data for selected filters.</div>;
  }

  return (
    <div className="capacity-chart">
      <ResponsiveContainer width="100%" height={220}>
        <BarChart data={series} margin={{ top: 8, right: 8, bottom: 24, left: 0 }}>
          <XAxis dataKey="label" angle={-35} textAnchor="end" interval={0} tick={{ fontSize: 11 }} />
          <YAxis tick={{ fontSize: 11 }} width={56} />
          <Tooltip
            formatter={(value) => (typeof value === 'number' ? formatMegawatts(value) : value)}
          />
          <Bar dataKey="value" name="Capacity">
            {series.map((point) => (
              <Cell
                key={point.label}
                fill={`rgb(${FUEL_COLOR_RGB[getFuelColor(point.label)].join(',')})`}
              />
            ))}
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
};

export default CapacityChart;
