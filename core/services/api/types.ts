import type { ZodType, ZodTypeDef } from 'zod';

export type RequestKind = 'auth' | 'fetch-page' | 'other';

export type HttpMethod = 'GET' | 'POST';

export interface GatewayRequest<T> {
  method: HttpMethod;
  /** Absolute URL, or an endpoint path relative to the API base URL */
  url: string;
  params?: Record<string, string | number | boolean>;
  data?: unknown;
  /** Validates and types the response body */
  schema: ZodType<T, ZodTypeDef, unknown>;
}

export interface DispatchOptions {
  requiresAuth: boolean;
  kind?: RequestKind;
  /** Records this call asks for; checked against the tier ceiling before dispatch */
  recordCount?: number;
}

export interface InFlightRequest {
  id: string;
  kind: RequestKind;
  url: string;
  startedAt: number;
  controller: AbortController;
}

export interface RequestHandle<T> {
  id: string;
  response: Promise<T>;
  cancel: () => void;
}
