// /types/mining.ts

/**
 * Dataset kinds served by the mining data API
 */
export type DatasetKind = 'Holes' | 'Assays';

export const DATASET_KINDS: readonly DatasetKind[] = ['Holes', 'Assays'] as const;

/**
 * Subscription tiers decoded from the identity token
 */
export type Role = 'FreeTrial' | 'Premium' | 'Admin';

/**
 * Scalar value of a single record field
 */
export type FieldValue = string | number | null;

/**
 * One drill hole or assay sample. Field set is defined by the server per response.
 */
export type MiningRecord = Record<string, FieldValue>;

export type FilterValue = string | number | boolean | string[] | number[] | null;

export type FilterParams = Record<string, FilterValue>;

/**
 * Snapshot of the authenticated session
 */
export interface Session {
  accessToken?: string;
  refreshToken?: string;
  /** Epoch seconds, 0 when there is no valid session */
  expiresAt: number;
  role?: Role;
  lastIdentity?: string;
}

export interface FetchDetails {
  totalFetched: number;
  requestedCount: number;
  fetchTimeSeconds: number;
  pagesFetched: number;
  dataType: DatasetKind;
}
