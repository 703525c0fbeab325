import { describe, expect, it } from 'vitest';
import type { PowerPlantRecord } from '../models/PowerPlant';
import { EmptySetError } from './errors';
import {
  computeCentroid,
  computeMetrics,
  filterPlants,
  listCountries,
  listFuelsForCountry,
  pickDefaultCountry,
  summarizeByFuel,
} from './plantAnalytics';

const plant = (
  name: string,
  countryLong: string,
  primaryFuel: string,
  capacityMw: number,
  latitude = 0,
  longitude = 0
): PowerPlantRecord => ({
  name,
  countryLong,
  primaryFuel,
  capacityMw,
  latitude,
  longitude,
  rawData: {},
});

const indiaPlants = [
  plant('Coal A', 'India', 'Coal', 100, 20, 78),
  plant('Solar B', 'India', 'Solar', 50, 24, 72),
  plant('Coal C', 'India', 'Coal', 30, 22, 81),
];

const dataset = [
  ...indiaPlants,
  plant('Hydro D', 'Brazil', 'Hydro', 250, -3, -60),
  plant('Wind E', 'India', 'Wind', 20, 10, 77),
];

describe('plantAnalytics', () => {
  describe('filterPlants', () => {
    it('keeps plants matching the country and a selected fuel, in order', () => {
      const result = filterPlants(dataset, { country: 'India', fuels: new Set(['Coal', 'Solar']) });

      expect(result).toEqual(indiaPlants);
    });

    it('returns a subset of the input where every record satisfies both predicates', () => {
      const fuels = new Set(['Hydro', 'Wind']);
      const result = filterPlants(dataset, { country: 'India', fuels });

      expect(result).toHaveLength(1);
      for (const record of result) {
        expect(dataset).toContain(record);
        expect(record.countryLong).toBe('India');
        expect(fuels.has(record.primaryFuel)).toBe(true);
      }
    });

    it('returns nothing when no fuel is selected', () => {
      expect(filterPlants(dataset, { country: 'India', fuels: new Set() })).toEqual([]);
    });

    it('returns nothing for an unknown country', () => {
      expect(filterPlants(dataset, { country: 'Atlantis', fuels: new Set(['Coal']) })).toEqual([]);
    });
  });

  describe('summarizeByFuel', () => {
    it('sums capacity per fuel, largest first', () => {
      expect(summarizeByFuel(indiaPlants)).toEqual([
        { fuel: 'Coal', totalMw: 130 },
        { fuel: 'Solar', totalMw: 50 },
      ]);
    });

    it('keeps first-seen order for equal totals', () => {
      const records = [
        plant('W', 'India', 'Wind', 50),
        plant('H', 'India', 'Hydro', 50),
        plant('C', 'India', 'Coal', 80),
      ];

      expect(summarizeByFuel(records).map((entry) => entry.fuel)).toEqual(['Coal', 'Wind', 'Hydro']);
    });

    it('is non-increasing and preserves the total capacity', () => {
      const summary = summarizeByFuel(dataset);
      const totals = summary.map((entry) => entry.totalMw);

      expect(totals).toEqual([...totals].sort((a, b) => b - a));
      expect(totals.reduce((sum, value) => sum + value, 0)).toBe(450);
    });

    it('returns an empty summary for no records', () => {
      expect(summarizeByFuel([])).toEqual([]);
    });
  });

  describe('computeMetrics', () => {
    it('reports total, count and top fuel', () => {
      expect(computeMetrics(indiaPlants)).toEqual({ totalMw: 180, plantCount: 3, topFuel: 'Coal' });
    });

    it('uses the N/A sentinel when there are no records', () => {
      expect(computeMetrics([])).toEqual({ totalMw: 0, plantCount: 0, topFuel: 'N/A' });
    });
  });

  describe('computeCentroid', () => {
    it('averages latitude and longitude', () => {
      const records = [plant('A', 'India', 'Coal', 1, 10, 20), plant('B', 'India', 'Coal', 1, 20, 40)];

      expect(computeCentroid(records)).toEqual({ lat: 15, lon: 30 });
    });

    it('throws EmptySetError instead of producing NaN', () => {
      expect(() => computeCentroid([])).toThrow(EmptySetError);
      expect(() => computeCentroid([])).toThrow('Cannot compute centroid of an empty record set');
    });
  });

  describe('country and fuel options', () => {
    it('lists distinct countries in sorted order', () => {
      expect(listCountries(dataset)).toEqual(['Brazil', 'India']);
    });

    it('lists the fuels present in one country', () => {
      expect(listFuelsForCountry(dataset, 'India')).toEqual(['Coal', 'Solar', 'Wind']);
      expect(listFuelsForCountry(dataset, 'Atlantis')).toEqual([]);
    });

    it('defaults to India when it is available', () => {
      expect(pickDefaultCountry(['Brazil', 'India'])).toBe('India');
      expect(pickDefaultCountry(['Brazil', 'Chile'])).toBe('Brazil');
      expect(pickDefaultCountry([])).toBeNull();
    });
  });
});
