import type { ApiErrorBody } from '../types/powerPlantApi';

const API_BASE_URL = (import.meta.env.VITE_API_BASE_URL ?? '').replace(/\/$/, '');

export const buildApiUrl = (path: string, params?: Record<string, string>): string => {
  const query = params ? new URLSearchParams(params).toString() : '';
  return `${API_BASE_URL}${path}${query ? `?${query}` : ''}`;
};

const readErrorMessage = async (response: Response): Promise<string | null> => {
  try {
    const body = (await response.json()) as Partial<ApiErrorBody>;
    return typeof body.error === 'string' ? body.error : null;
  } catch {
    return null;
  }
};

export const fetchJson = async <T>(
  path: string,
  params?: Record<string, string>,
  init?: RequestInit
): Promise<T> => {
  const response = await fetch(buildApiUrl(path, params), init);
  if (!response.ok) {
    const message = await readErrorMessage(response);
    throw new Error(`${message ?? 'Request failed'} (${response.status})`);
  }

  return (await response.json()) as T;
};
