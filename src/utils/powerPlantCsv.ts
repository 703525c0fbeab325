import Papa from 'papaparse';
import type { PowerPlantDataset, PowerPlantRecord } from '../models/PowerPlant';
import { DataLoadError } from './errors';

export const REQUIRED_COLUMNS = [
  'name',
  'country_long',
  'primary_fuel',
  'capacity_mw',
  'latitude',
  'longitude',
] as const;

const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Coerce a CSV cell to a finite number. Anything that is not a plain decimal
 * literal (blank, text, hex, "1,000") becomes null.
 */
export const parseNumericCell = (value: string | undefined): number | null => {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

const toRecord = (entry: Record<string, string>): PowerPlantRecord | null => {
  const latitude = parseNumericCell(entry.latitude);
  const longitude = parseNumericCell(entry.longitude);
  const capacity = parseNumericCell(entry.capacity_mw);

  if (latitude === null || longitude === null || capacity === null || capacity < 0) {
    return null;
  }

  return Object.freeze({
    name: entry.name,
    countryLong: entry.country_long,
    primaryFuel: entry.primary_fuel,
    capacityMw: capacity,
    latitude,
    longitude,
    rawData: Object.freeze(entry),
  });
};

export const parsePowerPlantCsv = (csvText: string, source = 'input'): PowerPlantDataset => {
  const result = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  // A blank or whitespace-only file comes back as one empty-named field
  const columns =
    csvText.trim().length === 0
      ? []
      : (result.meta.fields ?? []).filter((field) => field.trim().length > 0);
  if (columns.length === 0) {
    throw new DataLoadError(`No columns found in power plant data (${source})`, { path: source });
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new DataLoadError(
      `Power plant data (${source}) is missing required columns: ${missing.join(', ')}`,
      { path: source }
    );
  }

  const records: PowerPlantRecord[] = [];
  let skippedRows = 0;

  for (const row of result.data) {
    // papaparse leaves short rows without the trailing keys
    const entry: Record<string, string> = {};
    for (const column of columns) {
      entry[column] = row[column] ?? '';
    }

    const record = toRecord(entry);
    if (record) {
      records.push(record);
    } else {
      skippedRows += 1;
    }
  }

  return Object.freeze({
    columns: Object.freeze(columns),
    records: Object.freeze(records),
    skippedRows,
  });
};

export const sortByCapacityDesc = (records: readonly PowerPlantRecord[]): PowerPlantRecord[] =>
  [...records].sort((a, b) => b.capacityMw - a.capacityMw);

/**
 * Serialize records back to CSV in the source file's column layout, largest
 * plants first. Cell values are written exactly as they were read.
 */
export const toCsvBytes = (
  records: readonly PowerPlantRecord[],
  columns: readonly string[]
) => {
  const rows = sortByCapacityDesc(records).map((record) =>
    columns.map((column) => record.rawData[column] ?? '')
  );

  const csv = Papa.unparse(
    { fields: [...columns], data: rows },
    { newline: '\n' }
  );

  // With no data rows the header already carries its line break
  return new TextEncoder().encode(csv.endsWith('\n') ? csv : `${csv}\n`);
};

export const buildExportFileName = (country: string): string => `${country}_data.csv`;
