import type { StoreApi } from 'zustand/vanilla';
import { logger } from '../../../utils/logging/logger';
import { formatCount } from '../../../utils/format';
import { API_FETCH_LIMIT, DATA_ENDPOINTS } from '../../config/constants';
import { FetchError, ImporterError, isCancellation, toError } from '../../errors/types';
import type { CoreEventBus } from '../../events/event-bus';
import type { RequestGateway } from '../api/request-gateway';
import type { RequestHandle } from '../api/types';
import type { DatasetStore } from '../../../store/dataset/datasetStore';
import type { DatasetKind, FilterParams, MiningRecord } from '../../../types/mining';
import { dataPageSchema, DataPageResponse, ExpiryHandler, FetchOutcome, FetchPage } from './types';

const SOURCE = 'FetchOrchestrator';

export interface FetchOrchestratorConfig {
  gateway: RequestGateway;
  datasetStore: StoreApi<DatasetStore>;
  session: ExpiryHandler;
  events: CoreEventBus;
  pageSize?: number;
  /** Milliseconds since epoch */
  now?: () => number;
}

interface ActiveFetch {
  kind: DatasetKind;
  cancelled: boolean;
  handle: RequestHandle<DataPageResponse> | null;
}

/**
 * Filter values go on the query string; lists are sent comma-joined
 */
export function toQueryParams(filters: FilterParams): Record<string, string | number | boolean> {
  const params: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(filters)) {
    if (value === null) continue;
    if (Array.isArray(value)) {
      if (value.length > 0) params[key] = value.join(',');
      continue;
    }
    params[key] = value;
  }
  return params;
}

/**
 * Pages through the data endpoint and hands the complete result to the dataset store in one write
 */
export class FetchOrchestrator {
  private readonly gateway: RequestGateway;
  private readonly datasetStore: StoreApi<DatasetStore>;
  private readonly session: ExpiryHandler;
  private readonly events: CoreEventBus;
  private readonly pageSize: number;
  private readonly now: () => number;
  private active: ActiveFetch | null = null;
  // Bumped on every logout; a fetch started under an older value never commits
  private sessionEpoch = 0;
  private readonly unsubscribe: () => void;

  constructor(config: FetchOrchestratorConfig) {
    this.gateway = config.gateway;
    this.datasetStore = config.datasetStore;
    this.session = config.session;
    this.events = config.events;
    this.pageSize = config.pageSize ?? API_FETCH_LIMIT;
    this.now = config.now ?? Date.now;

    this.unsubscribe = this.events.on('logoutCompleted', () => {
      this.sessionEpoch += 1;
      this.cancel();
    });
  }

  isFetching(): boolean {
    return this.active !== null;
  }

  /**
   * Stops the running fetch after the page in flight is aborted. No-op when idle.
   */
  cancel(): void {
    if (!this.active) {
      return;
    }
    this.active.cancelled = true;
    this.active.handle?.cancel();
    void logger.info('Fetch cancellation requested', { kind: this.active.kind }, { source: SOURCE, datasetKind: this.active.kind });
  }

  async *fetchDataset(kind: DatasetKind, filters: FilterParams, requestedCount: number): AsyncGenerator<FetchPage, void, undefined> {
    if (this.active) {
      throw new ImporterError('A fetch is already in progress', 'FETCH_IN_PROGRESS', undefined, {
        running: this.active.kind,
        requested: kind
      });
    }

    const active: ActiveFetch = { kind, cancelled: false, handle: null };
    this.active = active;
    const query = toQueryParams(filters);
    let fetched = 0;
    let page = 0;

    try {
      while (fetched < requestedCount) {
        if (active.cancelled) {
          throw FetchError.cancelled();
        }

        const limit = Math.min(this.pageSize, requestedCount - fetched);
        const handle = this.gateway.dispatch({
          method: 'GET',
          url: DATA_ENDPOINTS[kind],
          params: { ...query, limit, skip: fetched },
          schema: dataPageSchema
        }, { requiresAuth: true, kind: 'fetch-page', recordCount: requestedCount });

        active.handle = handle;
        let body: DataPageResponse;
        try {
          body = await handle.response;
        } finally {
          active.handle = null;
        }

        if (active.cancelled) {
          throw FetchError.cancelled();
        }

        // Never keep more rows than the page asked for
        const rows = body.data.length > limit ? body.data.slice(0, limit) : body.data;
        page += 1;
        fetched += rows.length;
        const serverTotal = body.total_count;
        const target = serverTotal === undefined ? requestedCount : Math.min(requestedCount, serverTotal);

        await logger.debug('Page received', { kind, page, rows: rows.length, fetched, serverTotal }, { source: SOURCE, datasetKind: kind });
        this.events.emit('fetchProgress', { kind, fetched, total: target, page });
        this.events.emit('statusChanged', { message: `Fetched ${formatCount(fetched)} of ${formatCount(target)} ${kind.toLowerCase()} records` });

        yield {
          kind,
          page,
          records: rows,
          columns: body.columns,
          fetched,
          requestedCount,
          serverTotal
        };

        if (rows.length < limit) break;
        if (serverTotal !== undefined && fetched >= serverTotal) break;
      }
    } finally {
      if (this.active === active) {
        this.active = null;
      }
    }
  }

  /**
   * Drains fetchDataset and commits the result. Errors and cancellation leave the dataset untouched.
   */
  async run(kind: DatasetKind, filters: FilterParams, requestedCount: number): Promise<FetchOutcome> {
    const startedAt = this.now();
    const epoch = this.sessionEpoch;
    let records: MiningRecord[] = [];
    let columns: string[] = [];
    let serverTotal = 0;
    let pagesFetched = 0;

    await logger.info('Fetch starting', { kind, requestedCount, filters }, { source: SOURCE, datasetKind: kind });
    this.events.emit('loadingStarted', { kind });

    try {
      for await (const page of this.fetchDataset(kind, filters, requestedCount)) {
        records = records.concat(page.records);
        if (columns.length === 0) {
          columns = page.columns.length > 0 ? page.columns : Object.keys(page.records[0] ?? {});
        }
        serverTotal = page.serverTotal ?? serverTotal;
        pagesFetched = page.page;
      }
    } catch (error) {
      if (isCancellation(error)) {
        await logger.info('Fetch cancelled', { kind, pagesFetched }, { source: SOURCE, datasetKind: kind });
        this.events.emit('statusChanged', { message: 'Fetch cancelled' });
        return { status: 'cancelled' };
      }

      if (error instanceof FetchError && error.kind === 'Unauthenticated') {
        this.session.endRejectedSession();
      }

      const message = toError(error).message;
      await logger.error('Fetch failed', { kind, message, pagesFetched }, { source: SOURCE, datasetKind: kind });
      this.events.emit('fetchError', { kind, message });
      throw error;
    } finally {
      this.events.emit('loadingFinished', { kind });
    }

    if (epoch !== this.sessionEpoch) {
      await logger.info('Fetch discarded after logout', { kind, pagesFetched }, { source: SOURCE, datasetKind: kind });
      this.events.emit('statusChanged', { message: 'Fetch cancelled' });
      return { status: 'cancelled' };
    }

    const fetchTimeSeconds = Math.round((this.now() - startedAt) / 10) / 100;
    this.datasetStore.getState().replace(kind, records, columns, {
      totalRecords: Math.max(serverTotal, records.length),
      filterParams: filters,
      fetchDetails: {
        totalFetched: records.length,
        requestedCount,
        fetchTimeSeconds,
        pagesFetched,
        dataType: kind
      }
    });

    await logger.info('Fetch complete', { kind, totalFetched: records.length, pagesFetched, fetchTimeSeconds }, { source: SOURCE, datasetKind: kind });
    this.events.emit('statusChanged', {
      message: records.length === 0 ? 'No data found' : `Loaded ${formatCount(records.length)} ${kind.toLowerCase()} records`
    });
    return { status: 'completed', totalFetched: records.length };
  }

  dispose(): void {
    this.cancel();
    this.unsubscribe();
  }
}
