import { v4 as uuidv4 } from 'uuid';
import type { StoreApi } from 'zustand/vanilla';
import { logger } from '../../../utils/logging/logger';
import { formatCount } from '../../../utils/format';
import { validateLayerName } from '../../../utils/validation/layers';
import {
  CHUNKED_IMPORT_THRESHOLD,
  IMPORT_CHUNK_SIZE,
  LARGE_IMPORT_WARNING_THRESHOLD,
  MAX_SAFE_IMPORT,
  PARTIAL_IMPORT_LIMIT,
  VALIDATION_MESSAGES
} from '../../config/constants';
import { ImporterError, ValidationError, createErrorDetails, toError } from '../../errors/types';
import type { DatasetStore } from '../../../store/dataset/datasetStore';
import type { DatasetKind } from '../../../types/mining';
import { chunkRecords, chunkSizeFor } from './chunking';
import type {
  ActiveImport,
  ImportOptions,
  ImportOutcome,
  ImportServiceConfig,
  ImportSizeAssessment,
  LayerImportTarget
} from './types';

const SOURCE = 'ImportService';

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Feeds a fetched dataset into a host layer chunk by chunk
 */
export class ImportService {
  private readonly config: ImportServiceConfig;
  private readonly activeImports: Map<string, ActiveImport> = new Map();

  constructor(
    private readonly datasetStore: StoreApi<DatasetStore>,
    config: Partial<ImportServiceConfig> = {}
  ) {
    this.config = {
      chunkedThreshold: CHUNKED_IMPORT_THRESHOLD,
      chunkSize: IMPORT_CHUNK_SIZE,
      partialImportLimit: PARTIAL_IMPORT_LIMIT,
      largeImportWarning: LARGE_IMPORT_WARNING_THRESHOLD,
      maxSafeImport: MAX_SAFE_IMPORT,
      ...config
    };
  }

  assessImportSize(count: number): ImportSizeAssessment {
    const chunked = count >= this.config.chunkedThreshold;

    if (count > this.config.maxSafeImport) {
      return {
        count,
        level: 'exceedsSafeLimit',
        chunked,
        suggestedLimit: this.config.partialImportLimit,
        message: `Importing ${formatCount(count)} records may exhaust available memory. Consider importing the first ${formatCount(this.config.partialImportLimit)} records instead.`
      };
    }

    if (count > this.config.largeImportWarning) {
      return {
        count,
        level: 'large',
        chunked,
        suggestedLimit: this.config.partialImportLimit,
        message: `Importing ${formatCount(count)} records may take a while.`
      };
    }

    return { count, level: 'ok', chunked };
  }

  async importDataset(kind: DatasetKind, target: LayerImportTarget, options: ImportOptions): Promise<ImportOutcome> {
    const nameCheck = validateLayerName(options.layerName);
    if (!nameCheck.valid) {
      throw new ValidationError(nameCheck.message, 'INVALID_LAYER_NAME', undefined, { layerName: options.layerName });
    }

    const dataset = this.datasetStore.getState().datasets[kind];
    if (dataset.records.length === 0) {
      throw new ValidationError(VALIDATION_MESSAGES.noData, 'NO_DATA', undefined, { kind });
    }

    if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit <= 0)) {
      throw new ValidationError('Import limit must be a positive whole number', 'INVALID_IMPORT_LIMIT', undefined, { limit: options.limit });
    }

    const records = options.limit !== undefined ? dataset.records.slice(0, options.limit) : dataset.records;
    const chunkSize = options.chunkSize ?? chunkSizeFor(records.length, this.config);
    const importId = options.importId ?? uuidv4();

    if (this.activeImports.has(importId)) {
      throw new ImporterError(`Import ${importId} is already running`, 'IMPORT_IN_PROGRESS', undefined, { importId });
    }

    const active: ActiveImport = { importId, kind, cancelled: false, processed: 0, total: records.length };
    this.activeImports.set(importId, active);

    await logger.info('Import starting', {
      importId,
      layerName: options.layerName,
      records: records.length,
      chunkSize
    }, { source: SOURCE, datasetKind: kind });

    let layerId: string | undefined;
    try {
      layerId = await target.createLayer(options.layerName, dataset.originalHeaders);
      let chunks = 0;

      for (const chunk of chunkRecords(records, chunkSize)) {
        if (active.cancelled) {
          break;
        }

        await target.addRecords(layerId, chunk);
        active.processed += chunk.records.length;
        chunks += 1;
        options.onProgress?.(active.processed, { index: chunk.index, total: chunk.total, size: chunk.records.length });

        if (chunk.total > 1) {
          await yieldToEventLoop();
        }
      }

      if (active.cancelled) {
        await target.discard(layerId);
        await logger.info('Import cancelled', { importId, processed: active.processed }, { source: SOURCE, datasetKind: kind });
        return { status: 'cancelled', importId, importedCount: active.processed };
      }

      await target.finalize(layerId);
      await logger.info('Import complete', { importId, layerId, imported: active.processed, chunks }, { source: SOURCE, datasetKind: kind });
      return { status: 'completed', importId, layerId, importedCount: active.processed, chunks };
    } catch (error) {
      await logger.error('Import failed', { importId, message: toError(error).message }, { source: SOURCE, datasetKind: kind });
      if (layerId !== undefined) {
        await this.discardQuietly(target, layerId, importId);
      }
      throw new ImporterError(`Import failed: ${toError(error).message}`, 'IMPORT_FAILED', toError(error), createErrorDetails(error));
    } finally {
      this.activeImports.delete(importId);
    }
  }

  /**
   * Takes effect before the next chunk is handed to the host
   */
  cancelImport(importId: string): boolean {
    const active = this.activeImports.get(importId);
    if (!active) {
      return false;
    }
    active.cancelled = true;
    void logger.info('Import cancellation requested', { importId }, { source: SOURCE, datasetKind: active.kind });
    return true;
  }

  cancelAll(): void {
    this.activeImports.forEach(active => {
      active.cancelled = true;
    });
  }

  getActiveImports(): ActiveImport[] {
    return [...this.activeImports.values()].map(active => ({ ...active }));
  }

  private async discardQuietly(target: LayerImportTarget, layerId: string, importId: string): Promise<void> {
    try {
      await target.discard(layerId);
    } catch (discardError) {
      await logger.warn('Could not discard partial layer', {
        importId,
        layerId,
        message: toError(discardError).message
      }, { source: SOURCE });
    }
  }
}
