import type { ApiResponse } from './http.js';

export interface RecordingResponse extends ApiResponse {
  statusCode: number | null;
  body: unknown;
  headers: Record<string, string>;
}

/** In-process response that keeps what a handler wrote, for tests. */
export const createRecordingResponse = (): RecordingResponse => {
  const response: RecordingResponse = {
    statusCode: null,
    body: undefined,
    headers: {},
    setHeader(name, value) {
      response.headers[name] = value;
      return response;
    },
    status(code) {
      response.statusCode = code;
      return {
        json(body) {
          response.body = body;
          return response;
        },
      };
    },
  };
  return response;
};
