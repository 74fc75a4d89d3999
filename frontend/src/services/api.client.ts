import axios, { type AxiosError, type AxiosInstance } from 'axios';
import type {
  ErrorResponse,
  QueryRequest,
  QueryResponse,
} from '@hotel-concierge/shared-types';

export const TIMEOUT_MESSAGE = 'Request timed out. Please try again.';
export const NETWORK_ERROR_MESSAGE =
  'Unable to connect to server. Please check your connection and try again.';

const apiClient: AxiosInstance = axios.create({
  baseURL: '/',
  timeout: 35000, // the backend makes two LLM calls per query
});

apiClient.interceptors.response.use(
  (response) => response,
  (error: AxiosError) => {
    if (error.code === 'ECONNABORTED' || error.message.includes('timeout')) {
      console.error('Request timeout:', error.config?.url);
      error.message = TIMEOUT_MESSAGE;
    } else if (!error.response && error.request) {
      console.error('Network error - backend may be unavailable:', error.message);
      error.message = NETWORK_ERROR_MESSAGE;
    }

    return Promise.reject(error);
  },
);

export default apiClient;

export type ApiError = AxiosError<Partial<ErrorResponse>>;

const hasErrorField = (data: unknown): data is ErrorResponse =>
  typeof data === 'object' &&
  data !== null &&
  'error' in data &&
  typeof data.error === 'string';

/**
 * Prefers the `error` field the backend sends with non-2xx responses, then the
 * transport message.
 */
export const describeApiError = (err: unknown, fallback = 'An error occurred'): string => {
  if (axios.isAxiosError(err)) {
    const data: unknown = err.response?.data;
    if (hasErrorField(data)) {
      return data.error;
    }
    return err.message || fallback;
  }
  return err instanceof Error ? err.message : fallback;
};

export const conciergeApi = {
  async ask(query: string): Promise<string> {
    const payload: QueryRequest = { query };
    const response = await apiClient.post<QueryResponse>('/query', payload);
    return response.data.response;
  },
};
