import { z } from 'zod';
import { ProviderRowSchema } from '@enrich/core';
import type { ProviderBatchQuery, ProviderPatch, ProviderRepo, ProviderRow } from '@enrich/core';
import { fetch as undiciFetch } from 'undici';

const ProviderRowsSchema = z.array(ProviderRowSchema);

export class DirectoryRequestError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(operation: string, status: number, body: string) {
    super(`Directory ${operation} failed with ${status}`);
    this.name = 'DirectoryRequestError';
    this.status = status;
    this.body = body;
  }
}

export interface PostgrestProviderRepoOptions {
  baseUrl: string;
  apiKey: string;
  table?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  defaultHeaders?: Record<string, string>;
}

/** Provider rows behind a Supabase (PostgREST) REST endpoint. */
export class PostgrestProviderRepo implements ProviderRepo {
  private readonly baseUrl: string;
  private readonly table: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: PostgrestProviderRepoOptions) {
    if (!options.baseUrl) {
      throw new Error('SUPABASE_URL must be configured');
    }
    if (!options.apiKey) {
      throw new Error('SUPABASE_KEY must be configured');
    }

    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.table = options.table ?? 'providers';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl =
      options.fetchImpl ??
      (typeof fetch === 'function' ? fetch : ((undiciFetch as unknown) as typeof fetch));
    this.defaultHeaders = {
      'content-type': 'application/json',
      Accept: 'application/json',
      apikey: options.apiKey,
      Authorization: `Bearer ${options.apiKey}`,
      ...options.defaultHeaders
    };
  }

  async listBatch(query: ProviderBatchQuery): Promise<ProviderRow[]> {
    const params = new URLSearchParams({ select: query.columns.join(',') });
    if (query.category) {
      params.set('category', `eq.${query.category}`);
    }
    if (query.missingColumn) {
      params.set(query.missingColumn, 'is.null');
    }
    params.set('limit', String(query.batchSize));
    params.set('offset', String((query.batchNumber - 1) * query.batchSize));
    params.set('order', 'id.asc');

    const response = await this.fetchImpl(`${this.tableUrl()}?${params.toString()}`, {
      method: 'GET',
      headers: { ...this.defaultHeaders },
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    await this.ensureOkResponse(response, 'listBatch');

    return ProviderRowsSchema.parse(await response.json());
  }

  async update(providerId: string, patch: ProviderPatch): Promise<void> {
    const url = `${this.tableUrl()}?id=eq.${encodeURIComponent(providerId)}`;
    const response = await this.fetchImpl(url, {
      method: 'PATCH',
      headers: {
        ...this.defaultHeaders,
        Prefer: 'return=minimal'
      },
      body: JSON.stringify(patch),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    await this.ensureOkResponse(response, `update of provider ${providerId}`);
  }

  private tableUrl(): string {
    return `${this.baseUrl}/rest/v1/${encodeURIComponent(this.table)}`;
  }

  private async ensureOkResponse(response: Response, operation: string): Promise<void> {
    if (response.status >= 200 && response.status < 300) {
      return;
    }

    const payload = await response.text();
    throw new DirectoryRequestError(operation, response.status, payload.slice(0, 500));
  }
}
