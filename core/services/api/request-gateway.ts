import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import type { StoreApi } from 'zustand/vanilla';
import { logger } from '../../../utils/logging/logger';
import { TIER_RECORD_LIMITS } from '../../config/constants';
import { FetchError, TierLimitExceededError, toError } from '../../errors/types';
import { tokenSelectors, TokenStore } from '../../../store/session/tokenStore';
import type { DispatchOptions, GatewayRequest, InFlightRequest, RequestHandle } from './types';

const SOURCE = 'RequestGateway';

export interface RequestGatewayConfig {
  tokenStore: StoreApi<TokenStore>;
  baseUrl: string;
  http?: AxiosInstance;
  timeoutMs?: number;
  /** Milliseconds since epoch */
  now?: () => number;
}

function extractServerMessage(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return undefined;
  }
  const error = body.error;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown API error';
}

/**
 * Issues HTTP calls on behalf of the core and owns the set of requests in flight
 */
export class RequestGateway {
  private readonly tokenStore: StoreApi<TokenStore>;
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly inFlight: Map<string, InFlightRequest> = new Map();

  constructor(config: RequestGatewayConfig) {
    this.tokenStore = config.tokenStore;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.http = config.http ?? axios.create();
    this.timeoutMs = config.timeoutMs ?? 120000;
    this.now = config.now ?? Date.now;
  }

  /**
   * Throws TierLimitExceededError when `count` is above what the current tier may fetch
   */
  checkTierLimit(count: number): void {
    const role = tokenSelectors.getRole(this.tokenStore.getState()) ?? 'FreeTrial';
    const allowed = TIER_RECORD_LIMITS[role];
    if (count > allowed) {
      throw new TierLimitExceededError(count, allowed);
    }
  }

  dispatch<T>(request: GatewayRequest<T>, options: DispatchOptions): RequestHandle<T> {
    const headers: Record<string, string> = {};

    if (options.requiresAuth) {
      const state = this.tokenStore.getState();
      const token = state.session.accessToken;
      if (!token || !tokenSelectors.isValidAt(state, this.now() / 1000)) {
        throw FetchError.unauthenticated();
      }
      headers.Authorization = `Bearer ${token}`;
    }

    if (options.recordCount !== undefined) {
      this.checkTierLimit(options.recordCount);
    }

    const entry: InFlightRequest = {
      id: uuidv4(),
      kind: options.kind ?? 'other',
      url: this.resolveUrl(request.url),
      startedAt: this.now(),
      controller: new AbortController()
    };
    this.inFlight.set(entry.id, entry);

    void logger.debug('Request registered', {
      id: entry.id,
      kind: entry.kind,
      url: entry.url,
      inFlight: this.inFlight.size
    }, { source: SOURCE, requestId: entry.id });

    const response = this.execute(request, entry, headers).finally(() => {
      this.inFlight.delete(entry.id);
      void logger.debug('Request settled', { id: entry.id, inFlight: this.inFlight.size }, { source: SOURCE, requestId: entry.id });
    });

    return {
      id: entry.id,
      response,
      cancel: () => this.cancel(entry.id)
    };
  }

  cancel(id: string): void {
    const entry = this.inFlight.get(id);
    if (!entry) {
      return;
    }
    entry.controller.abort();
    this.inFlight.delete(id);
  }

  /**
   * Aborts every registered call. Safe on an empty set.
   */
  cancelAll(): void {
    if (this.inFlight.size === 0) {
      return;
    }
    const count = this.inFlight.size;
    this.inFlight.forEach(entry => entry.controller.abort());
    this.inFlight.clear();
    void logger.info('Cancelled all in-flight requests', { count }, { source: SOURCE });
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  getInFlight(): Array<Omit<InFlightRequest, 'controller'>> {
    return [...this.inFlight.values()].map(({ id, kind, url, startedAt }) => ({ id, kind, url, startedAt }));
  }

  private resolveUrl(url: string): string {
    if (/^https?:\/\//i.test(url)) {
      return url;
    }
    return `${this.baseUrl}/${url.replace(/^\/+/, '')}`;
  }

  private async execute<T>(request: GatewayRequest<T>, entry: InFlightRequest, headers: Record<string, string>): Promise<T> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        method: request.method,
        url: entry.url,
        params: request.params,
        data: request.data,
        headers,
        signal: entry.controller.signal,
        timeout: this.timeoutMs,
        validateStatus: () => true
      });
    } catch (error) {
      if (axios.isCancel(error) || entry.controller.signal.aborted) {
        throw FetchError.cancelled();
      }
      const message = axios.isAxiosError(error) ? error.message : toError(error).message;
      await logger.warn('Network error', { url: entry.url, message }, { source: SOURCE, requestId: entry.id });
      throw new FetchError('NetworkFailure', message || 'Network error', undefined, toError(error));
    }

    if (entry.controller.signal.aborted) {
      throw FetchError.cancelled();
    }

    const serverMessage = extractServerMessage(response.data);

    if (response.status === 401 || response.status === 403) {
      throw new FetchError('Unauthenticated', serverMessage ?? 'Authentication required', response.status);
    }

    if (response.status >= 400 || serverMessage !== undefined) {
      await logger.warn('Server error', { url: entry.url, status: response.status, message: serverMessage }, { source: SOURCE, requestId: entry.id });
      throw new FetchError('ServerError', serverMessage ?? `Server responded with status ${response.status}`, response.status);
    }

    const parsed = request.schema.safeParse(response.data);
    if (!parsed.success) {
      await logger.warn('Invalid response format', {
        url: entry.url,
        issues: parsed.error.issues.slice(0, 3).map(issue => `${issue.path.join('.')}: ${issue.message}`)
      }, { source: SOURCE, requestId: entry.id });
      throw new FetchError('ServerError', 'Invalid response format', response.status, parsed.error);
    }

    return parsed.data;
  }
}
