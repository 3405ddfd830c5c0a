export { createImporterCore } from './core/plugin/create-importer-core';
export type { ImporterCore, ImporterCoreOptions } from './core/plugin/create-importer-core';
export { ImporterController } from './core/plugin/importer-controller';
export type { ControllerFetchOutcome } from './core/plugin/importer-controller';

export { SessionController } from './core/services/auth/session-controller';
export type { SessionStatus } from './core/services/auth/session-controller';
export { decodeAccessToken, roleFromClaim } from './core/services/auth/token-decoder';
export { RequestGateway } from './core/services/api/request-gateway';
export type { GatewayRequest, DispatchOptions, RequestHandle } from './core/services/api/types';
export { FetchOrchestrator, toQueryParams } from './core/services/fetch/fetch-orchestrator';
export type { FetchPage, FetchOutcome } from './core/services/fetch/types';
export { ImportService } from './core/services/import/import-service';
export { chunkRecords } from './core/services/import/chunking';
export type {
  LayerImportTarget,
  RecordChunk,
  ImportOptions,
  ImportOutcome,
  ImportSizeAssessment
} from './core/services/import/types';
export { CatalogService } from './core/services/catalog/catalog-service';

export { CoreEventBus } from './core/events/event-bus';
export type { CoreEvents, CoreEventName } from './core/events/event-bus';
export { InMemorySettingsStore } from './core/settings/settings-store';
export type { SettingsStore } from './core/settings/settings-store';
export { loadApiConfig } from './core/config/settings';
export type { ApiConfig } from './core/config/settings';
export * from './core/config/constants';
export * from './core/errors/types';

export { createTokenStore, tokenSelectors } from './store/session/tokenStore';
export { createDatasetStore, datasetSelectors } from './store/dataset/datasetStore';
export type { DatasetState, PaginationInfo } from './store/dataset/types';

export { LogManager } from './core/logging/log-manager';
export { logger } from './utils/logging/logger';
export { formatColumnName, buildLayerName } from './utils/format';
export { parseFilters } from './utils/validation/filters';

export * from './types/mining';
