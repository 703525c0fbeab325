import type { PowerPlantRecord } from '../models/PowerPlant';

export interface CountryMetadata {
  name: string;
  plantCount: number;
  fuels: string[];
}

export interface PowerPlantMetadata {
  total: number;
  skippedRows: number;
  columns: string[];
  countries: CountryMetadata[];
  defaultCountry: string | null;
}

export interface CountryPlantsResponse {
  country: string;
  columns: string[];
  records: PowerPlantRecord[];
}

export interface ApiErrorBody {
  error: string;
}
