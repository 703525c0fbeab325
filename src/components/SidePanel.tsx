import React from 'react';
import { Globe } from 'lucide-react';
import type { ChartPoint } from '../models/PowerPlant';
import type { CountryMetadata } from '../types/powerPlantApi';
import CapacityChart from './CapacityChart';
import './SidePanel.css';

interface SidePanelProps {
  countries: CountryMetadata[];
  selectedCountry: string | null;
  onCountryChange: (country: string) => void;

  availableFuels: string[];
  selectedFuels: ReadonlySet<string>;
  onToggleFuel: (fuel: string) => void;
  onSelectAllFuels: () => void;
  onClearFuels: () => void;

  chartSeries: ChartPoint[];
}

const SidePanel: React.FC<SidePanelProps> = ({
  countries,
  selectedCountry,
  onCountryChange,
  availableFuels,
  selectedFuels,
  onToggleFuel,
  onSelectAllFuels,
  onClearFuels,
  chartSeries,
}) => {
  return (
    <aside className="side-panel">
      <h2 className="side-panel-title">
        <Globe size={20} aria-hidden="true" />
        <span>Energy Dashboard</span>
      </h2>

      <div className="control-group">
        <label htmlFor="country-select" className="control-label">
          Choose a Country
        </label>
        <select
          id="country-select"
          className="country-select"
          value={selectedCountry ?? ''}
          onChange={(e) => onCountryChange(e.target.value)}
          disabled={countries.length === 0}
        >
          {countries.map((country) => (
            <option key={country.name} value={country.name}>
              {country.name} ({country.plantCount.toLocaleString('en-US')})
            </option>
          ))}
        </select>
      </div>

      <div className="control-group">
        <div className="control-label-row">
          <span className="control-label">Filter Fuel Types</span>
          <div className="control-actions">
            <button type="button" onClick={onSelectAllFuels}>
              Select all
            </button>
            <button type="button" onClick={onClearFuels}>
              Clear
            </button>
          </div>
        </div>
        <ul className="fuel-list">
          {availableFuels.map((fuel) => (
            <li key={fuel}>
              <label className="fuel-option">
                <input
                  type="checkbox"
                  checked={selectedFuels.has(fuel)}
                  onChange={() => onToggleFuel(fuel)}
                />
                <span>{fuel}</span>
              </label>
            </li>
          ))}
        </ul>
      </div>

      <div className="control-group">
        <h3 className="control-label">Capacity by Fuel (MW)</h3>
        <CapacityChart series={chartSeries} />
      </div>
    </aside>
  );
};

export default SidePanel;
