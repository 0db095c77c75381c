import type { SourceDefinition, WarehouseCatalog } from '../config/catalog';
import { findSource } from '../config/catalog';
import { CsvFileSource } from './csvFileSource';
import { JsonApiSource, type FetchLike } from './jsonApiSource';
import { LogFileSource } from './logFileSource';
import { RelationalSource, type RelationalQuery } from './relationalSource';
import type { SourceAdapter } from './types';

export interface SourceFactoryOptions {
  fetchImpl?: FetchLike;
  relationalQuery?: RelationalQuery;
}

export function createSourceAdapter(definition: SourceDefinition, options: SourceFactoryOptions = {}): SourceAdapter {
  switch (definition.kind) {
    case 'relational':
      return new RelationalSource(definition, { query: options.relationalQuery });
    case 'json_api':
      return new JsonApiSource(definition, { fetchImpl: options.fetchImpl });
    case 'csv_file':
      return new CsvFileSource(definition);
    case 'log_file':
      return new LogFileSource(definition);
  }
}

/** Lazily builds one adapter per configured source and closes them together. */
export class SourceRegistry {
  private readonly adapters = new Map<string, SourceAdapter>();

  constructor(
    private readonly catalog: WarehouseCatalog,
    private readonly options: SourceFactoryOptions = {},
    overrides: SourceAdapter[] = []
  ) {
    for (const adapter of overrides) {
      this.adapters.set(adapter.id, adapter);
    }
  }

  get(sourceId: string): SourceAdapter {
    const existing = this.adapters.get(sourceId);
    if (existing) {
      return existing;
    }
    const definition = findSource(this.catalog, sourceId);
    if (!definition) {
      throw new Error(`unknown source '${sourceId}'`);
    }
    const adapter = createSourceAdapter(definition, this.options);
    this.adapters.set(sourceId, adapter);
    return adapter;
  }

  definition(sourceId: string): SourceDefinition {
    const definition = findSource(this.catalog, sourceId);
    if (!definition) {
      throw new Error(`unknown source '${sourceId}'`);
    }
    return definition;
  }

  async closeAll(): Promise<void> {
    const adapters = [...this.adapters.values()];
    this.adapters.clear();
    await Promise.all(adapters.map((adapter) => adapter.close()));
  }
}
