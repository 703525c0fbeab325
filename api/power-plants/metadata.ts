import { DataLoadError } from '../../src/utils/errors.js';
import { getPowerPlantDataset, getPowerPlantMetadata } from '../_lib/powerPlantsData.js';
import { CACHE_CONTROL, type ApiRequest, type ApiResponse } from '../_lib/http.js';

export default async function handler(req: ApiRequest, res: ApiResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  try {
    const dataset = await getPowerPlantDataset();
    const metadata = getPowerPlantMetadata(dataset);
    res.setHeader('Cache-Control', CACHE_CONTROL);
    return res.status(200).json(metadata);
  } catch (error) {
    console.error('Error loading power plant metadata:', error);
    const message =
      error instanceof DataLoadError
        ? 'Power plant dataset is unavailable'
        : 'Failed to load power plant metadata';
    return res.status(500).json({ error: message });
  }
}
