import type { DatasetKind, FetchDetails, FilterParams, MiningRecord } from '../../types/mining';

export interface DatasetState {
  /** Full fetched set, used by the import pipeline */
  records: MiningRecord[];
  /** Prefix of records capped at the display ceiling, used by the table */
  displayRecords: MiningRecord[];
  /** Column names formatted for display */
  headers: string[];
  /** Column names as the server sent them */
  originalHeaders: string[];
  totalRecords: number;
  /** Zero-based table page */
  currentPage: number;
  recordsPerPage: number;
  filterParams: FilterParams;
  fetchDetails: FetchDetails | null;
}

export interface ReplaceMeta {
  totalRecords?: number;
  filterParams?: FilterParams;
  fetchDetails?: FetchDetails;
}

export interface PaginationInfo {
  /** One-based, 0 when there is no data */
  currentPage: number;
  totalPages: number;
  recordsPerPage: number;
  totalRecords: number;
  displayCount: number;
  showingRecords: number;
  hasData: boolean;
}

export type DatasetMap = Record<DatasetKind, DatasetState>;
