import axios from 'axios';

// The slice of axios the collaborators call; tests hand in a stub instead
export interface HttpClient {
  get(url: string): Promise<{ data: unknown }>;
  post(url: string, body: unknown): Promise<{ data: unknown }>;
}

export function createHttpClient(baseURL: string, timeoutMs: number): HttpClient {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'memory-duel/1.0' },
  });
}
