import { z } from 'zod';
import type { DatasetKind, MiningRecord } from '../../../types/mining';

const fieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean().transform(String),
  z.null()
]);

/**
 * One page of the data endpoint. `columns` fixes field order; rows may omit trailing fields.
 */
export const dataPageSchema = z.object({
  data: z.array(z.record(fieldValueSchema)),
  columns: z.array(z.string()).default([]),
  total_count: z.coerce.number().int().nonnegative().optional()
});

export type DataPageResponse = z.output<typeof dataPageSchema>;

export interface FetchPage {
  kind: DatasetKind;
  /** 1-based */
  page: number;
  records: MiningRecord[];
  columns: string[];
  /** Records received so far, this page included */
  fetched: number;
  requestedCount: number;
  /** As reported by the server, when it reports one */
  serverTotal?: number;
}

export type FetchOutcome =
  | { status: 'completed'; totalFetched: number }
  | { status: 'cancelled' };

/**
 * What the orchestrator needs from the session when the server rejects the token
 */
export interface ExpiryHandler {
  endRejectedSession(): void;
}
