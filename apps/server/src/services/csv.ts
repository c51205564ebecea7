import fs from 'node:fs';
import path from 'node:path';
import { CsvError, parse } from 'csv-parse';
import { FileNotFoundError, MalformedRecordError } from '../errors';

export interface CsvOptions {
  /** Treat the first row as a header and skip it */
  skipFirstRow?: boolean;
}

export type RowAction = (row: string[], line: number) => void;

interface ParsedRow {
  record: string[];
  info: { lines: number };
}

const isRow = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell) => typeof cell === 'string');

// With `info: true` csv-parse emits { record, info } for every row
function isParsedRow(value: unknown): value is ParsedRow {
  if (typeof value !== 'object' || value === null) return false;
  if (!('record' in value) || !('info' in value)) return false;
  const { record, info } = value;
  return isRow(record) && typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number';
}

/** Count newline-terminated rows without holding the file in memory. */
export async function countRows(filePath: string): Promise<number> {
  let rows = 0;
  let trailing = false;
  for await (const chunk of fs.createReadStream(filePath)) {
    if (!Buffer.isBuffer(chunk) || chunk.length === 0) continue;
    for (const byte of chunk) {
      if (byte === 0x0a) rows++;
    }
    trailing = chunk[chunk.length - 1] !== 0x0a;
  }
  return trailing ? rows + 1 : rows;
}

/**
 * Stream a CSV file top to bottom and run `action` on every row, in order.
 * Returns the number of rows handed to `action`.
 */
export async function executeOnCsv(filePath: string, action: RowAction, options: CsvOptions = {}): Promise<number> {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }

  const total = await countRows(filePath);
  console.log(`[CSV] Reading ${path.basename(filePath)}: ${total} rows`);

  const source = fs.createReadStream(filePath);
  const parser = source.pipe(
    parse({
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      from_line: options.skipFirstRow ? 2 : 1,
      info: true,
    }),
  );

  let processed = 0;
  try {
    for await (const entry of parser) {
      const parsed: unknown = entry;
      if (!isParsedRow(parsed)) continue;
      action(parsed.record, parsed.info.lines);
      processed++;
    }
  } catch (error) {
    if (error instanceof CsvError) {
      const line = typeof error.lines === 'number' ? `:${error.lines}` : '';
      throw new MalformedRecordError(`Malformed CSV at ${path.basename(filePath)}${line}: ${error.message}`);
    }
    throw error;
  } finally {
    // pipe() does not close the source when the parser is torn down early
    source.destroy();
  }
  return processed;
}
