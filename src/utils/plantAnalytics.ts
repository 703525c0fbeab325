import type {
  Centroid,
  FilterCriteria,
  FuelCapacity,
  FuelCapacitySummary,
  PowerPlantRecord,
  ViewMetrics,
} from '../models/PowerPlant';
import { EmptySetError } from './errors';

export const NO_TOP_FUEL = 'N/A';
export const PREFERRED_DEFAULT_COUNTRY = 'India';

export const filterPlants = (
  records: readonly PowerPlantRecord[],
  criteria: FilterCriteria
): PowerPlantRecord[] =>
  records.filter(
    (record) => record.countryLong === criteria.country && criteria.fuels.has(record.primaryFuel)
  );

/**
 * Total capacity per primary fuel, largest first. Equal totals keep the order
 * in which their fuel first appears in `records`.
 */
export const summarizeByFuel = (records: readonly PowerPlantRecord[]): FuelCapacitySummary => {
  const totals = new Map<string, number>();

  for (const record of records) {
    totals.set(record.primaryFuel, (totals.get(record.primaryFuel) ?? 0) + record.capacityMw);
  }

  const summary: FuelCapacity[] = Array.from(totals, ([fuel, totalMw]) => ({ fuel, totalMw }));
  return summary.sort((a, b) => b.totalMw - a.totalMw);
};

export const computeMetrics = (records: readonly PowerPlantRecord[]): ViewMetrics => {
  const [top] = summarizeByFuel(records);

  return {
    totalMw: records.reduce((sum, record) => sum + record.capacityMw, 0),
    plantCount: records.length,
    topFuel: top ? top.fuel : NO_TOP_FUEL,
  };
};

/** Mean latitude/longitude. Throws {@link EmptySetError} when there is nothing to average. */
export const computeCentroid = (records: readonly PowerPlantRecord[]): Centroid => {
  if (records.length === 0) {
    throw new EmptySetError('centroid');
  }

  let latSum = 0;
  let lonSum = 0;
  for (const record of records) {
    latSum += record.latitude;
    lonSum += record.longitude;
  }

  return {
    lat: latSum / records.length,
    lon: lonSum / records.length,
  };
};

export const listCountries = (records: readonly PowerPlantRecord[]): string[] =>
  Array.from(new Set(records.map((record) => record.countryLong))).sort();

export const listFuelsForCountry = (
  records: readonly PowerPlantRecord[],
  country: string
): string[] => {
  const fuels = new Set<string>();
  for (const record of records) {
    if (record.countryLong === country) fuels.add(record.primaryFuel);
  }
  return Array.from(fuels).sort();
};

export const pickDefaultCountry = (countries: readonly string[]): string | null => {
  if (countries.includes(PREFERRED_DEFAULT_COUNTRY)) return PREFERRED_DEFAULT_COUNTRY;
  return countries[0] ?? null;
};
