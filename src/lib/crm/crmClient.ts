import axios, { AxiosInstance } from 'axios';

export interface CrmClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

// HTTP client for the CRM contacts API
export function createCrmClient(config: CrmClientConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
    },
  });
}
