import { describe, expect, it } from 'vitest';
import type { PowerPlantRecord } from '../models/PowerPlant';
import { buildDashboardView } from './dashboardView';

const plant = (
  name: string,
  countryLong: string,
  primaryFuel: string,
  capacityMw: number,
  latitude: number,
  longitude: number
): PowerPlantRecord => ({
  name,
  countryLong,
  primaryFuel,
  capacityMw,
  latitude,
  longitude,
  rawData: {},
});

const records = [
  plant('Coal A', 'India', 'Coal', 100, 20, 78),
  plant('Solar B', 'India', 'Solar', 50, 24, 72),
  plant('Coal C', 'India', 'Coal', 30, 22, 81),
  plant('Hydro D', 'Brazil', 'Hydro', 250, -3, -60),
];

describe('buildDashboardView', () => {
  it('derives every panel from the filtered records', () => {
    const view = buildDashboardView(records, { country: 'India', fuels: new Set(['Solar', 'Coal']) });

    expect(view.records.map((record) => record.name)).toEqual(['Coal A', 'Solar B', 'Coal C']);
    expect(view.summary).toEqual([
      { fuel: 'Coal', totalMw: 130 },
      { fuel: 'Solar', totalMw: 50 },
    ]);
    expect(view.metrics).toEqual({ totalMw: 180, plantCount: 3, topFuel: 'Coal' });
    expect(view.centroid).toEqual({ lat: 22, lon: 77 });
    expect(view.markers.map((marker) => marker.colorKey)).toEqual(['black', 'orange', 'black']);
    expect(view.chartSeries).toEqual([
      { label: 'Coal', value: 130 },
      { label: 'Solar', value: 50 },
    ]);
    expect(view.legend).toEqual([
      { fuel: 'Coal', colorKey: 'black' },
      { fuel: 'Solar', colorKey: 'orange' },
    ]);
  });

  it('falls back to placeholders when nothing matches', () => {
    const view = buildDashboardView(records, { country: 'Atlantis', fuels: new Set(['Coal']) });

    expect(view.records).toEqual([]);
    expect(view.metrics).toEqual({ totalMw: 0, plantCount: 0, topFuel: 'N/A' });
    expect(view.centroid).toBeNull();
    expect(view.markers).toEqual([]);
    expect(view.chartSeries).toEqual([]);
  });

  it('shows nothing for an empty fuel selection', () => {
    const view = buildDashboardView(records, { country: 'India', fuels: new Set() });

    expect(view.metrics.plantCount).toBe(0);
    expect(view.centroid).toBeNull();
    expect(view.legend).toEqual([]);
  });
});
