// core/selector.ts
// Record selection by identifier, or pass-through for catalog documents

import type { DataRecord, Dataset, JsonValue, Selection } from '../types/index.js';
import { MissingIdentifierError, RecordNotFoundError } from '../types/index.js';

export interface SelectOptions {
  identifier?: string;
  requiresIdentifier: boolean;
  identifierField?: string;
}

// Normalized field names, highest priority first
const IDENTIFIER_PRIORITY = ['invoiceid', 'invoice', 'invid', 'id'];

function normalizeFieldName(name: string): string {
  return name.toLowerCase().replace(/[\s_-]/g, '');
}

/**
 * Guess which field holds the record identifier
 */
export function detectIdentifierField(dataset: Dataset): string | undefined {
  const counts = new Map<string, number>();
  for (const record of dataset.records) {
    for (const key of Object.keys(record)) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  const fields = dataset.fields.length > 0 ? dataset.fields : [...counts.keys()];

  for (const candidate of IDENTIFIER_PRIORITY) {
    const match = fields.find(field => normalizeFieldName(field) === candidate);
    if (match) return match;
  }

  const partial = fields.filter(field => {
    const norm = normalizeFieldName(field);
    return norm.includes('invoice') && (norm.includes('id') || norm.endsWith('no') || norm.endsWith('number'));
  });
  partial.sort((a, b) => (counts.get(b) ?? 0) - (counts.get(a) ?? 0) || a.length - b.length);

  return partial[0];
}

/**
 * Unique identifier values in first-seen order
 */
export function listIdentifiers(dataset: Dataset, field: string): string[] {
  const seen = new Set<string>();
  for (const record of dataset.records) {
    const value = record[field];
    if (value === undefined || value === null) continue;
    seen.add(stringifyValue(value));
  }
  return [...seen];
}

/**
 * Select the record matching the identifier, or the whole dataset
 * when the document does not need one. Collection documents ignore
 * any identifier they are given.
 */
export function selectRecords(dataset: Dataset, options: SelectOptions): Selection {
  const { identifier, requiresIdentifier } = options;

  if (!requiresIdentifier) {
    return { kind: 'collection', records: dataset.records };
  }

  const field = options.identifierField ?? detectIdentifierField(dataset);
  if (!field) {
    throw new MissingIdentifierError(
      undefined,
      [],
      `No identifier field found. Available fields: ${dataset.fields.join(', ')}`
    );
  }

  const validIdentifiers = listIdentifiers(dataset, field);

  if (identifier === undefined) {
    throw new MissingIdentifierError(field, validIdentifiers);
  }

  const matches = dataset.records.filter(record => matchesIdentifier(record, field, identifier));
  const [first] = matches;
  if (!first) {
    throw new RecordNotFoundError(identifier, field, validIdentifiers);
  }

  return {
    kind: 'record',
    field,
    identifier,
    record: first,
    records: matches,
  };
}

function matchesIdentifier(record: DataRecord, field: string, identifier: string): boolean {
  const value = record[field];
  if (value === undefined || value === null) return false;
  return stringifyValue(value) === identifier;
}

function stringifyValue(value: JsonValue): string {
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}
