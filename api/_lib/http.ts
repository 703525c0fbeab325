import type { VercelRequestQuery } from '@vercel/node';

// The parts of VercelRequest/VercelResponse the handlers touch
export interface ApiRequest {
  method?: string;
  query: VercelRequestQuery;
}

export interface ApiResponse {
  setHeader(name: string, value: string): unknown;
  status(code: number): { json(body: unknown): unknown };
}

export const CACHE_CONTROL = 'private, max-age=300';
