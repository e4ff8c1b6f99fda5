// core/datasource.ts
// Dataset loader for CSV (header + rows) and JSON (object or array of objects)

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import type { DataRecord, Dataset, DatasetFormat, JsonValue } from '../types/index.js';
import { NotFoundError, ParseError, UnsupportedFormatError } from '../types/index.js';
import { formatSchemaErrors, getDatasetValidator } from './schema-registry.js';

const FORMATS: Record<string, DatasetFormat> = {
  '.csv': 'csv',
  '.json': 'json',
};

export interface LoadOptions {
  /** Fail with ParseError when the file holds no records */
  requireRecords?: boolean;
}

/**
 * Load a dataset from disk, choosing the parser by file extension
 */
export async function loadDataset(filePath: string, options: LoadOptions = {}): Promise<Dataset> {
  const extension = path.extname(filePath).toLowerCase();
  const format = FORMATS[extension];
  if (!format) {
    throw new UnsupportedFormatError(filePath, extension);
  }

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new NotFoundError(`Data file not found: ${filePath}`, filePath);
    }
    throw error;
  }

  const dataset = format === 'csv'
    ? parseCsvDataset(content, filePath)
    : parseJsonDataset(content, filePath);

  if (options.requireRecords && dataset.records.length === 0) {
    throw new ParseError('Data file contains no records', filePath, 'EMPTY_DATASET');
  }

  return dataset;
}

/**
 * Parse CSV content. The first row is the header; values stay strings.
 */
export function parseCsvDataset(content: string, filePath: string): Dataset {
  let header: string[] = [];
  let rows: unknown[];

  try {
    rows = parse(content, {
      bom: true,
      columns: (names: string[]) => {
        header = names;
        return names;
      },
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new ParseError(
      `Failed to parse CSV: ${path.basename(filePath)}`,
      filePath,
      error instanceof Error ? error.message : String(error),
      { cause: error }
    );
  }

  const duplicates = header.filter((name, index) => header.indexOf(name) !== index);
  if (duplicates.length > 0) {
    throw new ParseError(
      `Failed to parse CSV: ${path.basename(filePath)}`,
      filePath,
      `Duplicate column names: ${[...new Set(duplicates)].join(', ')}`
    );
  }

  const records: DataRecord[] = [];
  for (const row of rows) {
    if (typeof row !== 'object' || row === null) {
      continue;
    }
    const record: DataRecord = {};
    for (const [key, value] of Object.entries(row)) {
      record[key] = String(value ?? '');
    }
    records.push(record);
  }

  return {
    name: path.basename(filePath),
    path: filePath,
    format: 'csv',
    fields: header,
    records,
  };
}

/**
 * Parse JSON content. A single object is a one-record dataset,
 * an array of objects is a dataset of that length.
 */
export function parseJsonDataset(content: string, filePath: string): Dataset {
  let json: JsonValue;

  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ParseError(
      `Invalid JSON in ${path.basename(filePath)}`,
      filePath,
      error instanceof Error ? error.message : 'Parse error',
      { cause: error }
    );
  }

  const validateDataset = getDatasetValidator();
  if (!validateDataset(json)) {
    throw new ParseError(
      'JSON data must be an object or an array of objects',
      filePath,
      formatSchemaErrors(validateDataset.errors)
    );
  }

  const items = Array.isArray(json) ? json : [json];
  const records = items.filter(isJsonObject);

  return {
    name: path.basename(filePath),
    path: filePath,
    format: 'json',
    fields: collectFields(records),
    records,
  };
}

/**
 * List .csv and .json files in a directory, sorted by name
 */
export async function listDataFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }

  return entries
    .filter(name => path.extname(name).toLowerCase() in FORMATS)
    .sort()
    .map(name => path.join(dir, name));
}

/**
 * Union of record keys in first-seen order
 */
export function collectFields(records: DataRecord[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return [...fields];
}

export function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
