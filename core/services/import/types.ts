import type { DatasetKind, MiningRecord } from '../../../types/mining';

export interface RecordChunk {
  /** 0-based */
  index: number;
  total: number;
  records: MiningRecord[];
}

export interface ChunkProgress {
  index: number;
  total: number;
  size: number;
}

/**
 * Host side of an import. Geometry and styling are entirely the host's concern.
 */
export interface LayerImportTarget {
  createLayer(name: string, headers: string[]): Promise<string> | string;
  addRecords(layerId: string, chunk: RecordChunk): Promise<void> | void;
  finalize(layerId: string): Promise<void> | void;
  discard(layerId: string): Promise<void> | void;
}

export interface ImportOptions {
  layerName: string;
  importId?: string;
  /** Import only the first `limit` records */
  limit?: number;
  chunkSize?: number;
  onProgress?: (processed: number, chunk: ChunkProgress) => void;
}

export type ImportOutcome =
  | { status: 'completed'; importId: string; layerId: string; importedCount: number; chunks: number }
  | { status: 'cancelled'; importId: string; importedCount: number };

export type ImportSizeLevel = 'ok' | 'large' | 'exceedsSafeLimit';

export interface ImportSizeAssessment {
  count: number;
  level: ImportSizeLevel;
  chunked: boolean;
  /** Set when the UI should offer a partial import */
  suggestedLimit?: number;
  message?: string;
}

export interface ImportServiceConfig {
  chunkedThreshold: number;
  chunkSize: number;
  partialImportLimit: number;
  largeImportWarning: number;
  maxSafeImport: number;
}

export interface ActiveImport {
  importId: string;
  kind: DatasetKind;
  cancelled: boolean;
  processed: number;
  total: number;
}
