import type { AxiosInstance } from 'axios';
import type { StoreApi } from 'zustand/vanilla';
import { ApiConfig, loadApiConfig } from '../config/settings';
import { CoreEventBus } from '../events/event-bus';
import { InMemorySettingsStore, SettingsStore } from '../settings/settings-store';
import { RequestGateway } from '../services/api/request-gateway';
import { SessionController } from '../services/auth/session-controller';
import { CatalogService } from '../services/catalog/catalog-service';
import { FetchOrchestrator } from '../services/fetch/fetch-orchestrator';
import { ImportService } from '../services/import/import-service';
import type { ImportServiceConfig } from '../services/import/types';
import { createDatasetStore, DatasetStore, DatasetStoreOptions } from '../../store/dataset/datasetStore';
import { createTokenStore, TokenStore } from '../../store/session/tokenStore';
import { ImporterController } from './importer-controller';

export interface ImporterCoreOptions {
  config?: ApiConfig;
  settings?: SettingsStore;
  /** Replaces the default axios instance, e.g. to route calls through the host's network stack */
  http?: AxiosInstance;
  /** Milliseconds since epoch */
  now?: () => number;
  pageSize?: number;
  dataset?: DatasetStoreOptions;
  import?: Partial<ImportServiceConfig>;
}

export interface ImporterCore {
  config: ApiConfig;
  events: CoreEventBus;
  settings: SettingsStore;
  tokenStore: StoreApi<TokenStore>;
  datasetStore: StoreApi<DatasetStore>;
  gateway: RequestGateway;
  session: SessionController;
  orchestrator: FetchOrchestrator;
  importService: ImportService;
  catalog: CatalogService;
  controller: ImporterController;
}

/**
 * Wires one independent core. Nothing is shared between instances.
 */
export function createImporterCore(options: ImporterCoreOptions = {}): ImporterCore {
  const config = options.config ?? loadApiConfig();
  const settings = options.settings ?? new InMemorySettingsStore();
  const events = new CoreEventBus();
  const tokenStore = createTokenStore();
  const datasetStore = createDatasetStore(options.dataset);

  const gateway = new RequestGateway({
    tokenStore,
    baseUrl: config.baseApiUrl,
    http: options.http,
    timeoutMs: config.requestTimeoutMs,
    now: options.now
  });

  const session = new SessionController({
    tokenStore,
    gateway,
    settings,
    events,
    authUrl: config.authUrl,
    refreshUrl: config.refreshUrl,
    now: options.now
  });

  const orchestrator = new FetchOrchestrator({
    gateway,
    datasetStore,
    session,
    events,
    pageSize: options.pageSize,
    now: options.now
  });

  const importService = new ImportService(datasetStore, options.import);
  const catalog = new CatalogService(gateway);
  const controller = new ImporterController({
    session,
    datasetStore,
    orchestrator,
    importService,
    catalog,
    events
  });

  return {
    config,
    events,
    settings,
    tokenStore,
    datasetStore,
    gateway,
    session,
    orchestrator,
    importService,
    catalog,
    controller
  };
}
