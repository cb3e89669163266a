import axios, { type AxiosInstance } from 'axios';

export interface HttpClientOptions {
  timeoutMs: number;
  /** TronGrid API key, sent as TRON-PRO-API-KEY */
  apiKey?: string;
}

export function createHttpClient({ timeoutMs, apiKey }: HttpClientOptions): AxiosInstance {
  const headers: Record<string, string> = {
    'User-Agent': 'tron-resource-monitor/1.0',
    'Content-Type': 'application/json',
    Accept: 'application/json'
  };
  if (apiKey) {
    headers['TRON-PRO-API-KEY'] = apiKey;
  }

  const client = axios.create({
    timeout: timeoutMs,
    headers
  });

  client.interceptors.response.use(
    response => response,
    (error: unknown) => {
      if (axios.isAxiosError(error) && error.response) {
        error.message = `HTTP ${error.response.status}: ${error.response.statusText}`;
      }
      return Promise.reject(error);
    }
  );

  return client;
}
