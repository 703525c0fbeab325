import { useCallback, useEffect, useMemo, useState } from 'react';
import { AlertTriangle } from 'lucide-react';
import './App.css';
import type { FilterCriteria, LegendItem, MarkerDescriptor } from './models/PowerPlant';
import { usePowerPlantData } from './hooks/usePowerPlantData';
import { buildDashboardView } from './utils/dashboardView';
import { listFuelsForCountry } from './utils/plantAnalytics';
import { resolveSelectedFuels, toggleFuel, type FuelSelection } from './utils/fuelSelection';
import Header from './components/Header';
import Footer from './components/Footer';
import SidePanel from './components/SidePanel';
import MetricsBar from './components/MetricsBar';
import MapView from './components/MapView';
import RawDataPanel from './components/RawDataPanel';

const NO_MARKERS: MarkerDescriptor[] = [];
const NO_LEGEND: LegendItem[] = [];

function App() {
  const [selectedCountry, setSelectedCountry] = useState<string | null>(null);
  const [fuelSelection, setFuelSelection] = useState<FuelSelection | null>(null);
  const { metadata, countryPlants, loading, error } = usePowerPlantData(selectedCountry);

  useEffect(() => {
    if (metadata && selectedCountry === null) {
      setSelectedCountry(metadata.defaultCountry);
    }
  }, [metadata, selectedCountry]);

  const availableFuels = useMemo(
    () => (countryPlants ? listFuelsForCountry(countryPlants.records, countryPlants.country) : []),
    [countryPlants]
  );

  const plantsCountry = countryPlants?.country ?? null;

  // Keyed by country so a new slice is never filtered with the previous country's fuels
  const selectedFuels = useMemo(
    () =>
      plantsCountry === null
        ? new Set<string>()
        : resolveSelectedFuels(fuelSelection, plantsCountry, availableFuels),
    [fuelSelection, plantsCountry, availableFuels]
  );

  const selectFuels = useCallback(
    (fuels: ReadonlySet<string>) => {
      if (plantsCountry !== null) {
        setFuelSelection({ country: plantsCountry, fuels });
      }
    },
    [plantsCountry]
  );

  const handleToggleFuel = useCallback(
    (fuel: string) => selectFuels(toggleFuel(selectedFuels, fuel)),
    [selectFuels, selectedFuels]
  );

  const view = useMemo(() => {
    if (!countryPlants) return null;
    const criteria: FilterCriteria = { country: countryPlants.country, fuels: selectedFuels };
    return buildDashboardView(countryPlants.records, criteria);
  }, [countryPlants, selectedFuels]);

  return (
    <div className="app">
      <SidePanel
        countries={metadata?.countries ?? []}
        selectedCountry={selectedCountry}
        onCountryChange={setSelectedCountry}
        availableFuels={availableFuels}
        selectedFuels={selectedFuels}
        onToggleFuel={handleToggleFuel}
        onSelectAllFuels={() => selectFuels(new Set(availableFuels))}
        onClearFuels={() => selectFuels(new Set())}
        chartSeries={view?.chartSeries ?? []}
      />

      <main className="main-content">
        <Header country={selectedCountry} />

        {error && (
          <div className="error-banner" role="alert">
            <AlertTriangle size={18} />
            <span>{error}</span>
          </div>
        )}

        {view && view.metrics.plantCount > 0 && <MetricsBar metrics={view.metrics} />}

        <MapView
          markers={view?.markers ?? NO_MARKERS}
          centroid={view?.centroid ?? null}
          legend={view?.legend ?? NO_LEGEND}
          loading={loading}
        />

        {countryPlants && view && (
          <RawDataPanel
            country={countryPlants.country}
            columns={countryPlants.columns}
            records={view.records}
          />
        )}

        <Footer />
      </main>
    </div>
  );
}

export default App;
