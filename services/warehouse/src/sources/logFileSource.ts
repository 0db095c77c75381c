import { readFile } from 'node:fs/promises';
import type { LogFileSourceDefinition } from '../config/catalog';
import { SourceSchemaMismatchError, SourceUnavailableError } from '../errors';
import type { SourceRecord } from '../model/types';
import { normalizeRow, type RawRow } from './normalize';
import type { ExtractRequest, SourceAdapter } from './types';

const NEWLINE = 0x0a;

/**
 * Parses one ATM log line: an optional leading timestamp followed by `key=value` pairs.
 * Values may be double-quoted to carry spaces.
 */
export function parseLogLine(line: string): RawRow {
  const row: RawRow = {};
  const tokens = line.match(/[^\s"=]+="[^"]*"|\S+/g) ?? [];
  tokens.forEach((token, index) => {
    const separator = token.indexOf('=');
    if (separator <= 0) {
      if (index === 0) {
        row.logged_at = token;
      }
      return;
    }
    const key = token.slice(0, separator);
    let value = token.slice(separator + 1);
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    row[key] = value.length > 0 ? value : null;
  });
  return row;
}

/**
 * Tails an append-only ATM log. The watermark of a record is the byte offset where its line
 * starts; a committed offset that no longer lands on a line start means the file was truncated
 * or rewritten underneath us.
 */
export class LogFileSource implements SourceAdapter {
  readonly kind = 'log_file' as const;

  constructor(private readonly definition: LogFileSourceDefinition) {}

  get id(): string {
    return this.definition.id;
  }

  async extract(request: ExtractRequest): Promise<SourceRecord[]> {
    const buffer = await this.readLog();
    const since = request.since === null ? null : Number.parseInt(request.since, 10);

    if (since !== null) {
      if (!Number.isFinite(since) || since < 0) {
        throw new SourceSchemaMismatchError(this.id, `watermark '${request.since}' is not a byte offset`);
      }
      if (since >= buffer.length || (since > 0 && buffer[since - 1] !== NEWLINE)) {
        throw new SourceSchemaMismatchError(
          this.id,
          `log is ${buffer.length} bytes and offset ${since} is not a line start; the file was truncated or replaced`
        );
      }
    }

    const records: SourceRecord[] = [];
    let offset = 0;
    if (since !== null) {
      const lineEnd = buffer.indexOf(NEWLINE, since);
      offset = lineEnd < 0 ? buffer.length : lineEnd + 1;
    }
    while (offset < buffer.length) {
      const end = buffer.indexOf(NEWLINE, offset);
      if (end < 0) {
        // an unterminated last line is still being written
        break;
      }
      const line = buffer.subarray(offset, end).toString('utf8').trim();
      if (line.length > 0) {
        records.push(
          normalizeRow(parseLogLine(line), {
            sourceId: this.id,
            mapping: this.definition.mapping,
            extractedAt: request.extractedAt,
            cursor: String(offset)
          })
        );
        if (records.length >= request.limit) {
          break;
        }
      }
      offset = end + 1;
    }
    return records;
  }

  async close(): Promise<void> {
    // files are read whole on each extract
  }

  private async readLog(): Promise<Buffer> {
    try {
      return await readFile(this.definition.path);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceUnavailableError(this.id, `cannot read ${this.definition.path}: ${detail}`, { cause: err });
    }
  }
}
