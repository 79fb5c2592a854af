import type { ProviderPatch, ProviderRow } from '../domain/models';

export interface BatchWindow {
  /** 1-based batch index; the offset is `(batchNumber - 1) * batchSize`. */
  batchNumber: number;
  batchSize: number;
}

export interface ProviderBatchQuery extends BatchWindow {
  columns: string[];
  missingColumn?: string;
  category?: string;
}

export interface ProviderRepo {
  listBatch(query: ProviderBatchQuery): Promise<ProviderRow[]>;
  update(providerId: string, patch: ProviderPatch): Promise<void>;
}
