import axios, { type AxiosInstance } from 'axios';

export const createHttpClient = (baseURL: string, timeoutMs = 10000): AxiosInstance => {
  return axios.create({
    baseURL,
    timeout: timeoutMs
  });
};

/** Best-effort text rendering of an HTTP error body for error messages. */
export const describeBody = (body: unknown): string => {
  if (body === undefined || body === null) return '';
  if (typeof body === 'string') return body.trim();
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
};
