import type {
  ChartPoint,
  FuelColor,
  FuelCapacitySummary,
  LegendItem,
  MarkerDescriptor,
  PowerPlantRecord,
} from '../models/PowerPlant';

export const DEFAULT_FUEL_COLOR: FuelColor = 'gray';

const FUEL_COLORS: Readonly<Record<string, FuelColor>> = {
  Nuclear: 'purple',
  Coal: 'black',
  Hydro: 'blue',
  Solar: 'orange',
  Gas: 'red',
  Wind: 'green',
};

// deck.gl wants RGB triples rather than CSS names
export const FUEL_COLOR_RGB: Record<FuelColor, [number, number, number]> = {
  purple: [128, 0, 128],
  black: [0, 0, 0],
  blue: [0, 0, 255],
  orange: [255, 165, 0],
  red: [255, 0, 0],
  green: [0, 128, 0],
  gray: [128, 128, 128],
};

export const getFuelColor = (fuel: string): FuelColor =>
  Object.prototype.hasOwnProperty.call(FUEL_COLORS, fuel) ? FUEL_COLORS[fuel] : DEFAULT_FUEL_COLOR;

export const formatCapacityDisplay = (capacityMw: number): string => `${capacityMw.toFixed(1)} MW`;

export const formatCount = (value: number): string =>
  Math.round(value).toLocaleString('en-US');

export const formatMegawatts = (value: number): string => `${formatCount(value)} MW`;

export const toMarkers = (records: readonly PowerPlantRecord[]): MarkerDescriptor[] =>
  records.map((record, index) => ({
    id: record.rawData.gppd_idnr || `plant-${index}`,
    lat: record.latitude,
    lon: record.longitude,
    label: record.name,
    capacityDisplay: formatCapacityDisplay(record.capacityMw),
    fuel: record.primaryFuel,
    colorKey: getFuelColor(record.primaryFuel),
  }));

export const toChartSeries = (summary: FuelCapacitySummary): ChartPoint[] =>
  summary.map(({ fuel, totalMw }) => ({ label: fuel, value: totalMw }));

export const buildLegendItems = (fuels: Iterable<string>): LegendItem[] =>
  Array.from(fuels, (fuel) => ({ fuel, colorKey: getFuelColor(fuel) }));
