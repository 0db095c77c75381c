import { z } from 'zod';
import type { JsonApiSourceDefinition } from '../config/catalog';
import { SourceSchemaMismatchError, SourceUnavailableError } from '../errors';
import type { SourceRecord } from '../model/types';
import { compareWatermarks, sortByWatermark } from '../model/watermarks';
import { normalizeRow } from './normalize';
import type { ExtractRequest, SourceAdapter } from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonApiSourceOptions {
  fetchImpl?: FetchLike;
}

const recordsSchema = z.array(z.record(z.string(), z.unknown()));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPath(body: unknown, path: string): unknown {
  let current: unknown = body;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Reads records from an HTTP JSON endpoint: `GET <url>?since=<watermark>&limit=<n>`.
 * Server errors, throttling and network failures are transient; anything else is a shape problem.
 */
export class JsonApiSource implements SourceAdapter {
  readonly kind = 'json_api' as const;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly definition: JsonApiSourceDefinition,
    options: JsonApiSourceOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get id(): string {
    return this.definition.id;
  }

  buildUrl(request: Pick<ExtractRequest, 'since' | 'limit'>): string {
    const url = new URL(this.definition.url);
    if (request.since !== null) {
      url.searchParams.set('since', request.since);
    }
    url.searchParams.set('limit', String(request.limit));
    return url.toString();
  }

  async extract(request: ExtractRequest): Promise<SourceRecord[]> {
    const url = this.buildUrl(request);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { accept: 'application/json', ...this.definition.headers },
        signal: request.signal
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceUnavailableError(this.id, `request failed: ${detail}`, { cause: err });
    }

    if (response.status >= 500 || response.status === 429) {
      throw new SourceUnavailableError(this.id, `upstream responded ${response.status}`);
    }
    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw new SourceSchemaMismatchError(this.id, `upstream responded ${response.status}: ${detail}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceSchemaMismatchError(this.id, `response is not JSON: ${detail}`);
    }

    const parsed = recordsSchema.safeParse(readPath(body, this.definition.recordsPath));
    if (!parsed.success) {
      throw new SourceSchemaMismatchError(
        this.id,
        `expected an array of objects at '${this.definition.recordsPath}'`
      );
    }

    const records = parsed.data.map((row) =>
      normalizeRow(row, { sourceId: this.id, mapping: this.definition.mapping, extractedAt: request.extractedAt })
    );
    const since = request.since;
    const fresh = since === null ? records : records.filter((record) => compareWatermarks(record.sourceWatermark, since) > 0);
    return sortByWatermark(fresh).slice(0, request.limit);
  }

  async close(): Promise<void> {
    // stateless
  }
}
