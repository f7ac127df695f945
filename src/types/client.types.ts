/**
 * Client types
 */

/**
 * Per-instance client configuration
 */
export interface PostmarkClientConfig {
  serverToken: string;
  baseUrl?: string;
  timeout?: number; // milliseconds
}

/**
 * One page of a listing
 */
export interface Page<T> {
  totalCount: number;
  items: T[];
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;
