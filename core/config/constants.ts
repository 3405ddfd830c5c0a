import type { DatasetKind, Role } from '../../types/mining';

// Records per data page request
export const API_FETCH_LIMIT = 50000;

// Upper bound the API accepts for a single fetch, regardless of tier
export const HARD_API_RECORD_CEILING = 5000000;

export const TIER_RECORD_LIMITS: Record<Role, number> = {
  FreeTrial: 1000,
  Premium: HARD_API_RECORD_CEILING,
  Admin: HARD_API_RECORD_CEILING
};

// Table display
export const MAX_DISPLAY_RECORDS = 1000;
export const RECORDS_PER_TABLE_PAGE = 100;
export const DEFAULT_REQUESTED_COUNT = 100;

// Import thresholds
export const IMPORT_CHUNK_SIZE = 10000;
export const CHUNKED_IMPORT_THRESHOLD = 5000;
export const LARGE_IMPORT_WARNING_THRESHOLD = 50000;
export const MAX_SAFE_IMPORT = 100000;
export const PARTIAL_IMPORT_LIMIT = 50000;

// Refresh the token this many seconds before it expires
export const TOKEN_REFRESH_LEAD_SECONDS = 60;

export const COMPANY_SEARCH_MIN_LENGTH = 3;

export const API_ENDPOINTS = {
  holesData: 'plugin/fetch_drill_holes',
  assaysData: 'plugin/fetch_assay_samples',
  companiesSearch: 'companies/search',
  holeTypes: 'plugin/fetch_hole_type'
} as const;

export const DATA_ENDPOINTS: Record<DatasetKind, string> = {
  Holes: API_ENDPOINTS.holesData,
  Assays: API_ENDPOINTS.assaysData
};

export const SETTINGS_KEYS = {
  accessToken: 'mining/accessToken',
  refreshToken: 'mining/refreshToken',
  expiresAt: 'mining/expiresAt',
  lastIdentity: 'mining/lastIdentity'
} as const;

export const DEFAULT_HOLE_TYPES: string[] = ['RAB', 'DIAMOND', 'AC', 'RC'];

export const COMPARISON_OPERATORS = ['>', '<', '=', '!=', '>=', '<='] as const;

export const AUSTRALIAN_STATES: Array<[string, string]> = [
  ['New South Wales', 'NSW'],
  ['Queensland', 'QLD'],
  ['South Australia', 'SA'],
  ['Tasmania', 'TAS'],
  ['Victoria', 'VIC'],
  ['Western Australia', 'WA'],
  ['Northern Territory', 'NT']
];

export const VALIDATION_MESSAGES = {
  fetchAllNoState: 'Fetching all records is supported state by state. Please select one state.',
  fetchAllMultipleStates: 'Fetching all records is supported state by state. Please select only one state.',
  invalidCredentials: 'A valid email and password are required.',
  networkError: 'Network error occurred. Please check your connection and try again.',
  sessionExpired: 'Your session has expired. Please log in again.',
  noData: 'No data found matching your criteria.'
} as const;
