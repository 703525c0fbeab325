import { DataLoadError } from '../src/utils/errors.js';
import {
  getCountryPlants,
  getPowerPlantDataset,
  parseCountryQuery,
} from './_lib/powerPlantsData.js';
import { CACHE_CONTROL, type ApiRequest, type ApiResponse } from './_lib/http.js';

export default async function handler(req: ApiRequest, res: ApiResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const { country, error: queryError } = parseCountryQuery(req.query);
  if (!country) {
    return res.status(400).json({ error: queryError ?? 'Invalid query' });
  }

  try {
    const dataset = await getPowerPlantDataset();
    res.setHeader('Cache-Control', CACHE_CONTROL);
    return res.status(200).json(getCountryPlants(dataset, country));
  } catch (error) {
    console.error(`Error loading power plants for ${country}:`, error);
    const message =
      error instanceof DataLoadError
        ? 'Power plant dataset is unavailable'
        : 'Failed to load power plants';
    return res.status(500).json({ error: message });
  }
}
