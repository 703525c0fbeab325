import React from 'react';
import type { LegendItem } from '../models/PowerPlant';
import { FUEL_COLOR_RGB } from '../utils/plantPresentation';
import './LegendFooter.css';

interface LegendFooterProps {
  items: LegendItem[];
}

const LegendFooter: React.FC<LegendFooterProps> = ({ items }) => {
  if (items.length === 0) return null;

  return (
    <div className="legend-footer">
      <h4 className="legend-title">Legend</h4>
      <ul className="legend-grid">
        {items.map((item) => (
          <li key={item.fuel} className="legend-item">
            <span
              className="legend-color"
              style={{ backgroundColor: `rgb(${FUEL_COLOR_RGB[item.colorKey].join(',')})` }}
              aria-hidden="true"
            />
            <span className="legend-label">{item.fuel}</span>
          </li>
        ))}
      </ul>
    </div>
  );
};

export default LegendFooter;
