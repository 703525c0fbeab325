export interface PowerPlantRecord {
  readonly name: string;
  readonly countryLong: string;
  readonly primaryFuel: string;
  readonly capacityMw: number;
  readonly latitude: number;
  readonly longitude: number;
  // Every column of the source row, verbatim. Export reads from here.
  readonly rawData: Readonly<Record<string, string>>;
}

export interface PowerPlantDataset {
  readonly columns: readonly string[];
  readonly records: readonly PowerPlantRecord[];
  readonly skippedRows: number;
}

export interface FilterCriteria {
  country: string;
  fuels: ReadonlySet<string>;
}

export interface FuelCapacity {
  fuel: string;
  totalMw: number;
}

export type FuelCapacitySummary = readonly FuelCapacity[];

export interface ViewMetrics {
  totalMw: number;
  plantCount: number;
  topFuel: string;
}

export interface Centroid {
  lat: number;
  lon: number;
}

export type FuelColor = 'purple' | 'black' | 'blue' | 'orange' | 'red' | 'green' | 'gray';

export interface MarkerDescriptor {
  id: string;
  lat: number;
  lon: number;
  label: string;
  capacityDisplay: string;
  fuel: string;
  colorKey: FuelColor;
}

export interface ChartPoint {
  label: string;
  value: number;
}

export interface LegendItem {
  fuel: string;
  colorKey: FuelColor;
}
