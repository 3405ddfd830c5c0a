import type { StoreApi } from 'zustand/vanilla';
import { logger } from '../../utils/logging/logger';
import { buildLayerName } from '../../utils/format';
import { parseFilters } from '../../utils/validation/filters';
import { sanitizeFilename } from '../../utils/validation/layers';
import { TIER_RECORD_LIMITS } from '../config/constants';
import { toError, ValidationError } from '../errors/types';
import type { CoreEventBus } from '../events/event-bus';
import type { SessionController } from '../services/auth/session-controller';
import type { CatalogService } from '../services/catalog/catalog-service';
import type { FetchOrchestrator } from '../services/fetch/fetch-orchestrator';
import type { FetchOutcome } from '../services/fetch/types';
import type { ImportService } from '../services/import/import-service';
import type { ImportOptions, ImportOutcome, LayerImportTarget } from '../services/import/types';
import type { DatasetStore } from '../../store/dataset/datasetStore';
import { DATASET_KINDS } from '../../types/mining';
import type { DatasetKind, Session } from '../../types/mining';

const SOURCE = 'ImporterController';

export type ControllerFetchOutcome = FetchOutcome | { status: 'loginRequired' };

export interface ImporterControllerDeps {
  session: SessionController;
  datasetStore: StoreApi<DatasetStore>;
  orchestrator: FetchOrchestrator;
  importService: ImportService;
  catalog: CatalogService;
  events: CoreEventBus;
}

/**
 * What the dialog talks to. Any logout, whatever triggered it, ends with both datasets cleared.
 */
export class ImporterController {
  private readonly session: SessionController;
  private readonly datasetStore: StoreApi<DatasetStore>;
  private readonly orchestrator: FetchOrchestrator;
  private readonly importService: ImportService;
  private readonly catalog: CatalogService;
  private readonly events: CoreEventBus;
  private readonly unsubscribe: () => void;

  constructor(deps: ImporterControllerDeps) {
    this.session = deps.session;
    this.datasetStore = deps.datasetStore;
    this.orchestrator = deps.orchestrator;
    this.importService = deps.importService;
    this.catalog = deps.catalog;
    this.events = deps.events;

    this.unsubscribe = this.events.on('logoutCompleted', () => {
      this.importService.cancelAll();
      this.datasetStore.getState().clearOnLogout();
    });
  }

  login(identity: string, credential: string): Promise<Session> {
    return this.session.login(identity, credential);
  }

  logout(): void {
    this.session.logout();
    this.datasetStore.getState().clearOnLogout();
  }

  /**
   * Call when the dialog is shown or regains focus
   */
  onShow(): boolean {
    return this.session.validateAndLogoutIfExpired();
  }

  async fetch(kind: DatasetKind, input: unknown): Promise<ControllerFetchOutcome> {
    let parsed;
    try {
      parsed = parseFilters(kind, input);
    } catch (error) {
      const message = toError(error).message;
      await logger.warn('Rejected fetch filters', { kind, message }, { source: SOURCE, datasetKind: kind });
      this.events.emit('fetchError', { kind, message });
      throw error;
    }

    this.session.validateAndLogoutIfExpired();
    if (!this.session.isAuthenticated()) {
      this.session.handleLoginRequired();
      return { status: 'loginRequired' };
    }

    const requestedCount = parsed.fetchAll
      ? TIER_RECORD_LIMITS[this.session.getRole() ?? 'FreeTrial']
      : parsed.requestedCount;

    return this.orchestrator.run(kind, parsed.filters, requestedCount);
  }

  cancelFetch(): void {
    this.orchestrator.cancel();
  }

  isFetching(): boolean {
    return this.orchestrator.isFetching();
  }

  async searchCompanies(query: string): Promise<string[]> {
    if (!this.session.isAuthenticated()) {
      this.session.handleLoginRequired();
      return [];
    }
    try {
      return await this.catalog.searchCompanies(query);
    } catch (error) {
      await logger.warn('Company search failed', { message: toError(error).message }, { source: SOURCE });
      return [];
    }
  }

  fetchHoleTypes(): Promise<string[]> {
    return this.catalog.fetchHoleTypes();
  }

  /**
   * Layer name derived from the filters the current data was fetched with
   */
  suggestLayerName(kind: DatasetKind): string {
    const { filterParams, fetchDetails } = this.datasetStore.getState().datasets[kind];
    const requestedCount = fetchDetails?.requestedCount ?? 0;
    return sanitizeFilename(buildLayerName(kind, filterParams, requestedCount));
  }

  importToLayer(kind: DatasetKind, target: LayerImportTarget, options: Partial<ImportOptions> = {}): Promise<ImportOutcome> {
    const layerName = options.layerName ?? this.suggestLayerName(kind);
    return this.importService.importDataset(kind, target, { ...options, layerName });
  }

  clearTab(kind: DatasetKind): void {
    if (!DATASET_KINDS.includes(kind)) {
      throw new ValidationError(`Unknown dataset kind: ${kind}`, 'INVALID_KIND');
    }
    this.datasetStore.getState().clearAll(kind);
    this.events.emit('statusChanged', { message: `${kind} data cleared` });
  }

  resetAll(): void {
    this.orchestrator.cancel();
    this.importService.cancelAll();
    DATASET_KINDS.forEach(kind => this.datasetStore.getState().clearAll(kind));
    this.events.emit('statusChanged', { message: 'All data cleared' });
  }

  dispose(): void {
    this.unsubscribe();
    this.orchestrator.dispose();
    this.session.dispose();
  }
}
