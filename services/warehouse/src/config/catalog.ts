import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { cadenceSchema } from '../model/types';

export const fieldTypeSchema = z.enum(['string', 'integer', 'decimal', 'date', 'timestamp', 'boolean']);

export type FieldType = z.infer<typeof fieldTypeSchema>;

export const fieldDefinitionSchema = z
  .object({
    name: z.string().min(1),
    type: fieldTypeSchema,
    required: z.boolean().default(false),
    min: z.number().optional(),
    max: z.number().optional(),
    allowed: z.array(z.string().min(1)).min(1).optional()
  })
  .superRefine((value, ctx) => {
    if (value.min !== undefined && value.max !== undefined && value.min > value.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `field '${value.name}' has min greater than max`
      });
    }
  });

export type FieldDefinition = z.infer<typeof fieldDefinitionSchema>;

const referenceSchema = z.object({
  field: z.string().min(1),
  table: z.string().min(1)
});

const partitioningSchema = z.object({
  granularity: z.enum(['day', 'month', 'year']).default('month'),
  autoCreate: z.boolean().default(true),
  precreatePeriods: z.number().int().nonnegative().default(2),
  retention: z
    .object({
      keepPeriods: z.number().int().positive(),
      mode: z.enum(['detach', 'drop']).default('detach')
    })
    .optional()
});

export type PartitioningPolicy = z.infer<typeof partitioningSchema>;

export const tableDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'table names are lower snake_case'),
  kind: z.enum(['fact', 'dimension']),
  description: z.string().optional(),
  fields: z.array(fieldDefinitionSchema).min(1),
  mutableFields: z.array(z.string().min(1)).optional(),
  references: z.array(referenceSchema).default([]),
  businessRules: z.array(z.string().min(1)).default([]),
  derive: z.array(z.string().min(1)).default([]),
  partitioning: partitioningSchema.optional()
});

export type TableDefinition = z.infer<typeof tableDefinitionSchema>;

const recordMappingSchema = z.object({
  naturalKey: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  eventDate: z.string().min(1).optional(),
  watermark: z.string().min(1).optional(),
  fieldMap: z.record(z.string(), z.string()).default({})
});

export type RecordMapping = z.infer<typeof recordMappingSchema>;

const sourceBaseSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional(),
  priority: z.number().int().default(0),
  batchSize: z.number().int().positive().default(5_000),
  timeoutMs: z.number().int().positive().default(30_000),
  mapping: recordMappingSchema
});

const relationalSourceSchema = sourceBaseSchema.extend({
  kind: z.literal('relational'),
  connectionString: z.string().min(1),
  query: z.string().min(1)
});

const jsonApiSourceSchema = sourceBaseSchema.extend({
  kind: z.literal('json_api'),
  url: z.string().url(),
  recordsPath: z.string().min(1).default('records'),
  headers: z.record(z.string(), z.string()).default({})
});

const csvFileSourceSchema = sourceBaseSchema.extend({
  kind: z.literal('csv_file'),
  directory: z.string().min(1),
  filePattern: z.string().min(1).default('*.csv'),
  delimiter: z.string().length(1).default(',')
});

const logFileSourceSchema = sourceBaseSchema.extend({
  kind: z.literal('log_file'),
  path: z.string().min(1)
});

export const sourceDefinitionSchema = z.discriminatedUnion('kind', [
  relationalSourceSchema,
  jsonApiSourceSchema,
  csvFileSourceSchema,
  logFileSourceSchema
]);

export type SourceDefinition = z.infer<typeof sourceDefinitionSchema>;
export type RelationalSourceDefinition = z.infer<typeof relationalSourceSchema>;
export type JsonApiSourceDefinition = z.infer<typeof jsonApiSourceSchema>;
export type CsvFileSourceDefinition = z.infer<typeof csvFileSourceSchema>;
export type LogFileSourceDefinition = z.infer<typeof logFileSourceSchema>;

export const pipelineDefinitionSchema = z.object({
  id: z.string().min(1),
  sourceId: z.string().min(1),
  cadence: cadenceSchema,
  targetTable: z.string().min(1),
  dependsOn: z.array(z.string().min(1)).default([])
});

export type PipelineDefinition = z.infer<typeof pipelineDefinitionSchema>;

export const catalogSchema = z
  .object({
    sources: z.array(sourceDefinitionSchema),
    tables: z.array(tableDefinitionSchema).min(1),
    pipelines: z.array(pipelineDefinitionSchema),
    aggregates: z.array(z.string().min(1)).default([])
  })
  .superRefine((catalog, ctx) => {
    const tables = new Map(catalog.tables.map((table) => [table.name, table]));
    const sourceIds = new Set(catalog.sources.map((source) => source.id));
    const pipelineIds = new Set(catalog.pipelines.map((pipeline) => pipeline.id));

    for (const table of catalog.tables) {
      if (table.kind === 'fact' && !table.partitioning) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tables', table.name],
          message: 'fact tables must declare a partitioning policy'
        });
      }
      for (const reference of table.references) {
        const target = tables.get(reference.table);
        if (!target || target.kind !== 'dimension') {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tables', table.name, 'references'],
            message: `reference ${reference.field} -> ${reference.table} must point at a dimension table`
          });
        }
      }
    }

    for (const pipeline of catalog.pipelines) {
      if (!sourceIds.has(pipeline.sourceId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pipelines', pipeline.id],
          message: `unknown source '${pipeline.sourceId}'`
        });
      }
      if (!tables.has(pipeline.targetTable)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pipelines', pipeline.id],
          message: `unknown target table '${pipeline.targetTable}'`
        });
      }
      for (const dependency of pipeline.dependsOn) {
        if (!pipelineIds.has(dependency)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['pipelines', pipeline.id, 'dependsOn'],
            message: `unknown pipeline dependency '${dependency}'`
          });
        }
      }
    }
  });

export type WarehouseCatalog = z.infer<typeof catalogSchema>;

export function parseCatalog(input: unknown): WarehouseCatalog {
  return catalogSchema.parse(input);
}

export function loadCatalogFile(filePath: string): WarehouseCatalog {
  const raw = readFileSync(filePath, 'utf8');
  return parseCatalog(JSON.parse(raw));
}

export function findTable(catalog: WarehouseCatalog, name: string): TableDefinition | undefined {
  return catalog.tables.find((table) => table.name === name);
}

export function findSource(catalog: WarehouseCatalog, id: string): SourceDefinition | undefined {
  return catalog.sources.find((source) => source.id === id);
}
