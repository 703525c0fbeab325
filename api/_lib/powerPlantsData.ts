import * as fs from 'fs/promises';
import * as path from 'path';
import type { PowerPlantDataset } from '../../src/models/PowerPlant.js';
import type {
  CountryMetadata,
  CountryPlantsResponse,
  PowerPlantMetadata,
} from '../../src/types/powerPlantApi.js';
import { DataLoadError } from '../../src/utils/errors.js';
import { listCountries, pickDefaultCountry } from '../../src/utils/plantAnalytics.js';
import { parsePowerPlantCsv } from '../../src/utils/powerPlantCsv.js';

const DEFAULT_DATA_FILE = 'global_power_plant_database.csv';

export const resolveDatasetPath = (env: NodeJS.ProcessEnv = process.env): string =>
  env.POWER_PLANT_CSV_PATH || path.join(process.cwd(), 'data', DEFAULT_DATA_FILE);

export const loadPowerPlantDataset = async (filePath: string): Promise<PowerPlantDataset> => {
  let csvText: string;
  try {
    csvText = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new DataLoadError(`Unable to read power plant data at ${filePath}`, {
      path: filePath,
      cause: error,
    });
  }

  const dataset = parsePowerPlantCsv(csvText, filePath);
  console.info(
    `Loaded ${dataset.records.length} power plants from ${filePath} (${dataset.skippedRows} rows skipped)`
  );
  return dataset;
};

export type DatasetCache = {
  get: () => Promise<PowerPlantDataset>;
};

/**
 * Load-once holder for the dataset. The first `get` starts the load and every
 * later caller shares it; the result is kept for the life of the process. A
 * rejected load is dropped so the next request reads the file again.
 */
export const createDatasetCache = (load: () => Promise<PowerPlantDataset>): DatasetCache => {
  let pending: Promise<PowerPlantDataset> | null = null;

  return {
    get: () => {
      if (!pending) {
        pending = load().catch((error: unknown) => {
          pending = null;
          throw error;
        });
      }
      return pending;
    },
  };
};

const datasetCache = createDatasetCache(() => loadPowerPlantDataset(resolveDatasetPath()));

export const getPowerPlantDataset = (): Promise<PowerPlantDataset> => datasetCache.get();

export const getPowerPlantMetadata = (dataset: PowerPlantDataset): PowerPlantMetadata => {
  const byCountry = new Map<string, { plantCount: number; fuels: Set<string> }>();

  for (const record of dataset.records) {
    const existing = byCountry.get(record.countryLong) || { plantCount: 0, fuels: new Set<string>() };
    existing.plantCount += 1;
    existing.fuels.add(record.primaryFuel);
    byCountry.set(record.countryLong, existing);
  }

  const names = listCountries(dataset.records);
  const countries: CountryMetadata[] = names.map((name) => {
    const entry = byCountry.get(name);
    return {
      name,
      plantCount: entry ? entry.plantCount : 0,
      fuels: entry ? Array.from(entry.fuels).sort() : [],
    };
  });

  return {
    total: dataset.records.length,
    skippedRows: dataset.skippedRows,
    columns: [...dataset.columns],
    countries,
    defaultCountry: pickDefaultCountry(names),
  };
};

export const getCountryPlants = (
  dataset: PowerPlantDataset,
  country: string
): CountryPlantsResponse => ({
  country,
  columns: [...dataset.columns],
  records: dataset.records.filter((record) => record.countryLong === country),
});

export const getSingleQueryValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

export const parseCountryQuery = (
  query: Record<string, string | string[] | undefined>
): { country?: string; error?: string } => {
  const country = getSingleQueryValue(query.country)?.trim();
  if (!country) {
    return { error: 'Missing country query parameter' };
  }

  return { country };
};
