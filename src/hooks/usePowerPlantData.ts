import { useEffect, useState } from 'react';
import type { CountryPlantsResponse, PowerPlantMetadata } from '../types/powerPlantApi';
import { fetchJson } from '../utils/apiClient';

/**
 * Loads the dataset metadata once, then the plants of `country` whenever it
 * changes. Filtering and aggregation happen on the client from that slice.
 */
export function usePowerPlantData(country: string | null) {
  const [metadata, setMetadata] = useState<PowerPlantMetadata | null>(null);
  const [countryPlants, setCountryPlants] = useState<CountryPlantsResponse | null>(null);
  const [loadingMetadata, setLoadingMetadata] = useState(false);
  const [loadingPlants, setLoadingPlants] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;

    const loadMetadata = async () => {
      setLoadingMetadata(true);
      try {
        const payload = await fetchJson<PowerPlantMetadata>('/api/power-plants/metadata');
        if (!cancelled) {
          setMetadata(payload);
        }
      } catch (fetchError) {
        console.error('Error loading power plant metadata:', fetchError);
        if (!cancelled) {
          setError(fetchError instanceof Error ? fetchError.message : 'Failed to load metadata');
        }
      } finally {
        if (!cancelled) {
          setLoadingMetadata(false);
        }
      }
    };

    void loadMetadata();

    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => {
    let cancelled = false;

    const loadPlants = async () => {
      if (!country) {
        setCountryPlants(null);
        return;
      }

      setLoadingPlants(true);
      setError(null);

      try {
        const payload = await fetchJson<CountryPlantsResponse>('/api/power-plants', { country });
        if (!cancelled) {
          setCountryPlants(payload);
        }
      } catch (fetchError) {
        console.error(`Error loading power plants for ${country}:`, fetchError);
        if (!cancelled) {
          setError(fetchError instanceof Error ? fetchError.message : 'Failed to load power plants');
          setCountryPlants(null);
        }
      } finally {
        if (!cancelled) {
          setLoadingPlants(false);
        }
      }
    };

    void loadPlants();

    return () => {
      cancelled = true;
    };
  }, [country]);

  return {
    metadata,
    countryPlants,
    loading: loadingMetadata || loadingPlants,
    loadingMetadata,
    loadingPlants,
    error,
  };
}
