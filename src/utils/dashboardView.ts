import type {
  Centroid,
  ChartPoint,
  FilterCriteria,
  FuelCapacitySummary,
  LegendItem,
  MarkerDescriptor,
  PowerPlantRecord,
  ViewMetrics,
} from '../models/PowerPlant';
import { EmptySetError } from './errors';
import { computeCentroid, computeMetrics, filterPlants, summarizeByFuel } from './plantAnalytics';
import { buildLegendItems, toChartSeries, toMarkers } from './plantPresentation';

export interface DashboardView {
  records: PowerPlantRecord[];
  summary: FuelCapacitySummary;
  metrics: ViewMetrics;
  // null when the filtered set is empty
  centroid: Centroid | null;
  markers: MarkerDescriptor[];
  chartSeries: ChartPoint[];
  legend: LegendItem[];
}

const centroidOrNull = (records: readonly PowerPlantRecord[]): Centroid | null => {
  try {
    return computeCentroid(records);
  } catch (error) {
    if (error instanceof EmptySetError) return null;
    throw error;
  }
};

export const buildDashboardView = (
  records: readonly PowerPlantRecord[],
  criteria: FilterCriteria
): DashboardView => {
  const filtered = filterPlants(records, criteria);
  const summary = summarizeByFuel(filtered);

  return {
    records: filtered,
    summary,
    metrics: computeMetrics(filtered),
    centroid: centroidOrNull(filtered),
    markers: toMarkers(filtered),
    chartSeries: toChartSeries(summary),
    legend: buildLegendItems(Array.from(criteria.fuels).sort()),
  };
};
