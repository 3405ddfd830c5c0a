import { createStore, StoreApi } from 'zustand/vanilla';
import { cloneDeep } from 'lodash';
import { logger } from '../../utils/logging/logger';
import { formatColumnName } from '../../utils/format';
import { MAX_DISPLAY_RECORDS, RECORDS_PER_TABLE_PAGE } from '../../core/config/constants';
import { DATASET_KINDS } from '../../types/mining';
import type { DatasetKind, FetchDetails, FilterParams, MiningRecord } from '../../types/mining';
import type { DatasetMap, DatasetState, PaginationInfo, ReplaceMeta } from './types';

const SOURCE = 'DatasetStore';

export interface DatasetStoreOptions {
  displayCeiling?: number;
  recordsPerPage?: number;
}

export interface DatasetStore {
  // State
  datasets: DatasetMap;
  displayCeiling: number;

  // Actions
  replace: (kind: DatasetKind, records: MiningRecord[], headers: string[], meta?: ReplaceMeta) => void;
  clearAll: (kind: DatasetKind) => void;
  clearDataOnly: (kind: DatasetKind) => void;
  clearOnLogout: () => void;
  setFilterParams: (kind: DatasetKind, filterParams: FilterParams) => void;
  navigateToPage: (kind: DatasetKind, pageNumber: number) => void;
  nextPage: (kind: DatasetKind) => void;
  previousPage: (kind: DatasetKind) => void;
}

function createEmptyDataset(recordsPerPage: number = RECORDS_PER_TABLE_PAGE, filterParams: FilterParams = {}): DatasetState {
  return {
    records: [],
    displayRecords: [],
    headers: [],
    originalHeaders: [],
    totalRecords: 0,
    currentPage: 0,
    recordsPerPage,
    filterParams,
    fetchDetails: null
  };
}

function totalPagesFor(displayCount: number, recordsPerPage: number): number {
  return Math.max(1, Math.ceil(displayCount / recordsPerPage));
}

export const datasetSelectors = {
  getDataset: (state: DatasetStore, kind: DatasetKind): DatasetState => state.datasets[kind],

  getFetchDetails: (state: DatasetStore, kind: DatasetKind): FetchDetails | null =>
    state.datasets[kind].fetchDetails,

  getPageRecords: (state: DatasetStore, kind: DatasetKind): MiningRecord[] => {
    const { displayRecords, currentPage, recordsPerPage } = state.datasets[kind];
    const start = currentPage * recordsPerPage;
    return displayRecords.slice(start, start + recordsPerPage);
  },

  getPaginationInfo: (state: DatasetStore, kind: DatasetKind): PaginationInfo => {
    const { records, displayRecords, currentPage, recordsPerPage, totalRecords } = state.datasets[kind];
    const displayCount = displayRecords.length;

    if (records.length === 0) {
      return {
        currentPage: 0,
        totalPages: 0,
        recordsPerPage,
        totalRecords: 0,
        displayCount: 0,
        showingRecords: 0,
        hasData: false
      };
    }

    return {
      currentPage: currentPage + 1,
      totalPages: totalPagesFor(displayCount, recordsPerPage),
      recordsPerPage,
      totalRecords,
      displayCount,
      showingRecords: Math.min(recordsPerPage, displayCount - currentPage * recordsPerPage),
      hasData: true
    };
  }
};

/**
 * Per-tab dataset state for Holes and Assays. Every write replaces a tab's state object wholesale.
 */
export function createDatasetStore(options: DatasetStoreOptions = {}): StoreApi<DatasetStore> {
  const displayCeiling = options.displayCeiling ?? MAX_DISPLAY_RECORDS;
  const recordsPerPage = options.recordsPerPage ?? RECORDS_PER_TABLE_PAGE;

  const initialDatasets = (): DatasetMap => ({
    Holes: createEmptyDataset(recordsPerPage),
    Assays: createEmptyDataset(recordsPerPage)
  });

  return createStore<DatasetStore>()((set, get) => {
    const writeDataset = (kind: DatasetKind, next: DatasetState) => {
      set({ datasets: { ...get().datasets, [kind]: next } });
    };

    const clearAll = (kind: DatasetKind) => {
      writeDataset(kind, createEmptyDataset(recordsPerPage));
    };

    return {
      datasets: initialDatasets(),
      displayCeiling,

      replace: (kind, records, headers, meta = {}) => {
        const previous = get().datasets[kind];
        const totalRecords = Math.max(meta.totalRecords ?? records.length, records.length);

        writeDataset(kind, {
          records,
          displayRecords: records.slice(0, displayCeiling),
          headers: headers.map(formatColumnName),
          originalHeaders: [...headers],
          totalRecords,
          currentPage: 0,
          recordsPerPage,
          filterParams: meta.filterParams ? cloneDeep(meta.filterParams) : previous.filterParams,
          fetchDetails: meta.fetchDetails ? { ...meta.fetchDetails } : null
        });

        void logger.debug('Dataset replaced', {
          kind,
          records: records.length,
          displayed: Math.min(records.length, displayCeiling),
          totalRecords
        }, { source: SOURCE, datasetKind: kind });
      },

      clearAll,

      clearDataOnly: (kind) => {
        const { filterParams } = get().datasets[kind];
        writeDataset(kind, createEmptyDataset(recordsPerPage, filterParams));
      },

      clearOnLogout: () => {
        DATASET_KINDS.forEach(kind => clearAll(kind));
        void logger.info('Datasets cleared after logout', undefined, { source: SOURCE });
      },

      setFilterParams: (kind, filterParams) => {
        writeDataset(kind, { ...get().datasets[kind], filterParams: cloneDeep(filterParams) });
      },

      navigateToPage: (kind, pageNumber) => {
        const dataset = get().datasets[kind];
        const displayCount = dataset.displayRecords.length;
        if (displayCount === 0 || !Number.isFinite(pageNumber)) {
          return;
        }

        const maxPage = totalPagesFor(displayCount, dataset.recordsPerPage);
        const page = Math.max(1, Math.min(Math.trunc(pageNumber), maxPage));
        if (page - 1 === dataset.currentPage) {
          return;
        }
        writeDataset(kind, { ...dataset, currentPage: page - 1 });
      },

      nextPage: (kind) => {
        get().navigateToPage(kind, get().datasets[kind].currentPage + 2);
      },

      previousPage: (kind) => {
        get().navigateToPage(kind, get().datasets[kind].currentPage);
      }
    };
  });
}
