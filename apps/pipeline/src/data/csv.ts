/**
 * CSV reading and writing for the comment datasets
 */

import fs from 'fs/promises';
import path from 'path';
import axios from 'axios';
import { parse as toCsv } from 'json2csv';
import {
  PipelineError,
  isSentimentLabel,
  withRetry,
  type LabeledComment,
} from '@sentiment/shared';
import { DATASET_COLUMNS } from '../constants';

export interface CsvTable {
  columns: string[];
  /** A field absent from a short row is undefined */
  rows: Array<Record<string, string | undefined>>;
}

/**
 * Split CSV text into records. Quoted fields may hold delimiters, doubled
 * quotes and line breaks.
 */
function parseRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(current);
      current = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      fields.push(current);
      records.push(fields);
      fields = [];
      current = '';
    } else {
      current += ch;
    }
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field at end of input');
  }
  if (current !== '' || fields.length > 0) {
    fields.push(current);
    records.push(fields);
  }
  return records;
}

export function parseCsv(text: string, delimiter: string = ','): CsvTable {
  const [header, ...body] = parseRecords(text.replace(/^\uFEFF/, ''), delimiter);
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = header.map(column => column.trim());
  const rows = body
    .filter(fields => !(fields.length === 1 && fields[0] === ''))
    .map(fields => {
      const row: Record<string, string | undefined> = {};
      columns.forEach((column, i) => {
        row[column] = fields[i];
      });
      return row;
    });

  return { columns, rows };
}

/**
 * Read CSV text from a local path or an http(s) URL
 */
export async function readCsvSource(source: string): Promise<string> {
  if (/^https?:\/\//i.test(source)) {
    const response = await withRetry(() =>
      axios.get<string>(source, { responseType: 'text', timeout: 60000 })
    );
    return response.data;
  }
  return fs.readFile(source, 'utf-8');
}

export async function readCsv(source: string): Promise<CsvTable> {
  return parseCsv(await readCsvSource(source));
}

export function requireColumns(table: CsvTable, step: string, source: string): void {
  const missing = DATASET_COLUMNS.filter(column => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new PipelineError(`${source} is missing column(s): ${missing.join(', ')}`, step);
  }
}

/**
 * Read a dataset this pipeline wrote. Every row must carry a comment and a valid label.
 */
export async function readDataset(filePath: string, step: string): Promise<LabeledComment[]> {
  let table: CsvTable;
  try {
    table = await readCsv(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new PipelineError(`${filePath} not found; run the previous pipeline step first`, step);
    }
    throw error;
  }
  requireColumns(table, step, filePath);

  return table.rows.map((row, i) => {
    const category = Number(row.category);
    if (row.clean_comment === undefined || !isSentimentLabel(category)) {
      throw new PipelineError(`${filePath} row ${i + 2} is malformed`, step);
    }
    return { clean_comment: row.clean_comment, category };
  });
}

export async function writeDataset(filePath: string, rows: LabeledComment[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const csv = toCsv(rows, { fields: [...DATASET_COLUMNS] });
  await fs.writeFile(filePath, csv + '\n', 'utf-8');
}
