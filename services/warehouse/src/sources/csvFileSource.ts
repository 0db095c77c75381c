import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import type { CsvFileSourceDefinition } from '../config/catalog';
import { SourceSchemaMismatchError, SourceUnavailableError, throwIfAborted } from '../errors';
import type { SourceRecord } from '../model/types';
import { compareWatermarks, padCursor } from '../model/watermarks';
import { normalizeRow, requiredColumns, type RawRow } from './normalize';
import type { ExtractRequest, SourceAdapter } from './types';

/** Splits delimited text into rows of fields. Handles quoted fields, doubled quotes and CRLF. */
export function parseDelimited(text: string, delimiter = ','): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (inQuotes) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          field += '"';
          index += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }
    if (char === '"' && field.length === 0) {
      inQuotes = true;
    } else if (char === delimiter) {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[index + 1] === '\n') {
        index += 1;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((candidate) => !(candidate.length === 1 && candidate[0] === ''));
}

function cursorFile(cursor: string | null): string | null {
  if (cursor === null) {
    return null;
  }
  const separator = cursor.lastIndexOf('#');
  return separator < 0 ? null : cursor.slice(0, separator);
}

/**
 * Reads drop-folder CSV exports. Files are consumed in name order; a record's watermark is
 * `<file name>#<zero-padded data line>`, so already-loaded lines are skipped on re-read.
 */
export class CsvFileSource implements SourceAdapter {
  readonly kind = 'csv_file' as const;

  constructor(private readonly definition: CsvFileSourceDefinition) {}

  get id(): string {
    return this.definition.id;
  }

  async extract(request: ExtractRequest): Promise<SourceRecord[]> {
    const files = await this.listFiles();
    const sinceFile = cursorFile(request.since);
    const mapping = this.definition.mapping;
    const records: SourceRecord[] = [];

    for (const file of files) {
      if (sinceFile !== null && file < sinceFile) {
        continue;
      }
      throwIfAborted(request.signal, `extract ${this.id}`);
      const rows = await this.readRows(file);
      const [header, ...data] = rows;
      if (!header) {
        continue;
      }
      const columns = header.map((column) => column.trim());
      const missing = requiredColumns(mapping).filter((column) => !columns.includes(column));
      if (missing.length > 0) {
        throw new SourceSchemaMismatchError(this.id, `${file} is missing columns: ${missing.join(', ')}`);
      }

      for (let index = 0; index < data.length; index += 1) {
        const cursor = `${file}#${padCursor(index + 1)}`;
        if (request.since !== null && compareWatermarks(cursor, request.since) <= 0) {
          continue;
        }
        const values = data[index] ?? [];
        const row: RawRow = {};
        columns.forEach((column, position) => {
          const value = values[position]?.trim() ?? '';
          row[column] = value.length > 0 ? value : null;
        });
        records.push(
          normalizeRow(row, {
            sourceId: this.id,
            mapping,
            extractedAt: request.extractedAt,
            cursor
          })
        );
        if (records.length >= request.limit) {
          return records;
        }
      }
    }
    return records;
  }

  async close(): Promise<void> {
    // nothing held open between extracts
  }

  /** Export files matching the pattern, relative to the directory, in name order. */
  private async listFiles(): Promise<string[]> {
    const { directory, filePattern } = this.definition;
    // fast-glob reports a missing cwd as no matches, so the directory is checked first.
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(directory)).isDirectory();
    } catch (err) {
      throw this.unavailable(`cannot list ${directory}`, err);
    }
    if (!isDirectory) {
      throw new SourceUnavailableError(this.id, `${directory} is not a directory`);
    }
    try {
      const entries = await fg(filePattern, { cwd: directory, onlyFiles: true });
      return entries.sort();
    } catch (err) {
      throw this.unavailable(`cannot list ${directory}`, err);
    }
  }

  private unavailable(context: string, err: unknown): SourceUnavailableError {
    const detail = err instanceof Error ? err.message : String(err);
    return new SourceUnavailableError(this.id, `${context}: ${detail}`, { cause: err });
  }

  private async readRows(file: string): Promise<string[][]> {
    try {
      const text = await readFile(path.join(this.definition.directory, file), 'utf8');
      return parseDelimited(text, this.definition.delimiter);
    } catch (err) {
      throw this.unavailable(`cannot read ${file}`, err);
    }
  }
}
