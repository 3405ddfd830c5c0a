import { ValidationError } from '../../errors/types';
import type { MiningRecord } from '../../../types/mining';
import type { ImportServiceConfig, RecordChunk } from './types';

/**
 * Splits records into consecutive chunks. The last chunk holds the remainder.
 */
export function* chunkRecords(records: MiningRecord[], chunkSize: number): Generator<RecordChunk, void, undefined> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError('Chunk size must be a positive whole number', 'INVALID_CHUNK_SIZE', undefined, { chunkSize });
  }

  const total = Math.ceil(records.length / chunkSize);
  for (let index = 0; index < total; index++) {
    const start = index * chunkSize;
    yield { index, total, records: records.slice(start, start + chunkSize) };
  }
}

// Small imports go through in a single chunk
export function chunkSizeFor(count: number, config: Pick<ImportServiceConfig, 'chunkedThreshold' | 'chunkSize'>): number {
  if (count < config.chunkedThreshold) {
    return Math.max(1, count);
  }
  return config.chunkSize;
}
