// core/template.ts
// Template discovery, resolution and dataset-based candidate detection

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Dataset, TemplateRef } from '../types/index.js';
import { NotFoundError } from '../types/index.js';
import { isMissingFile } from './datasource.js';

const TEMPLATE_EXTENSIONS = new Set(['.html', '.htm']);

interface CandidateRule {
  stem: string;
  nameHint: string;
  matches: (fields: Set<string>, dataset: Dataset) => boolean;
}

const CANDIDATE_RULES: CandidateRule[] = [
  {
    stem: 'invoice_simple',
    nameHint: 'invoice',
    matches: (fields) => ['item_name', 'qty', 'price'].every(f => fields.has(f)),
  },
  {
    stem: 'product_catalog',
    nameHint: 'product',
    matches: (fields) => ['product_id', 'name', 'unit'].every(f => fields.has(f)),
  },
  {
    stem: 'order_detailed',
    nameHint: 'order',
    matches: (_fields, dataset) => dataset.records.some(r => Array.isArray(r.items)),
  },
];

// File-name hints are checked in this order before any shape rule
const NAME_HINT_ORDER = ['invoice_simple', 'order_detailed', 'product_catalog'];

export function toTemplateRef(filePath: string): TemplateRef {
  const name = path.basename(filePath);
  return {
    name,
    stem: path.basename(name, path.extname(name)),
    path: filePath,
  };
}

/**
 * List .html/.htm templates in a directory, sorted by name
 */
export async function listTemplates(dir: string): Promise<TemplateRef[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (isMissingFile(error)) {
      throw new NotFoundError(`Templates directory not found: ${dir}`, dir);
    }
    throw error;
  }

  return entries
    .filter(name => TEMPLATE_EXTENSIONS.has(path.extname(name).toLowerCase()))
    .sort()
    .map(name => toTemplateRef(path.join(dir, name)));
}

/**
 * Resolve a template selector: an existing path, a file name, a stem,
 * a 1-based index or a case-insensitive substring.
 */
export async function resolveTemplate(
  selector: string,
  dir: string,
  templates?: TemplateRef[]
): Promise<TemplateRef> {
  if (TEMPLATE_EXTENSIONS.has(path.extname(selector).toLowerCase()) && await isFile(selector)) {
    return toTemplateRef(selector);
  }

  const available = templates ?? await listTemplates(dir);
  const match = pickByName(available, selector, t => t.name, t => t.stem);
  if (!match) {
    throw new NotFoundError(
      `Template not found: ${selector}`,
      dir,
      available.length > 0
        ? `Available: ${available.map(t => t.name).join(', ')}`
        : 'No templates available'
    );
  }
  return match;
}

/**
 * Pick an item by exact name, stem, 1-based index, then substring
 */
export function pickByName<T>(
  items: T[],
  selector: string,
  nameOf: (item: T) => string,
  stemOf?: (item: T) => string
): T | undefined {
  const exact = items.find(item => nameOf(item) === selector);
  if (exact) return exact;

  if (stemOf) {
    const byStem = items.find(item => stemOf(item) === selector);
    if (byStem) return byStem;
  }

  if (/^\d+$/.test(selector)) {
    const index = parseInt(selector, 10) - 1;
    if (index >= 0 && index < items.length) {
      return items[index];
    }
  }

  const needle = selector.toLowerCase();
  return items.find(item => nameOf(item).toLowerCase().includes(needle));
}

/**
 * Templates that fit the dataset, judged by file name first and record shape second.
 * Falls back to every template.
 */
export function detectTemplateCandidates(dataset: Dataset, templates: TemplateRef[]): TemplateRef[] {
  const byStem = new Map(templates.map(t => [t.stem.toLowerCase(), t]));
  const dataName = dataset.name.toLowerCase();

  for (const stem of NAME_HINT_ORDER) {
    const rule = CANDIDATE_RULES.find(r => r.stem === stem);
    const template = byStem.get(stem);
    if (rule && template && dataName.includes(rule.nameHint)) {
      return [template];
    }
  }

  const fields = new Set<string>();
  for (const record of dataset.records) {
    for (const key of Object.keys(record)) fields.add(key);
  }

  const candidates: TemplateRef[] = [];
  for (const rule of CANDIDATE_RULES) {
    const template = byStem.get(rule.stem);
    if (template && rule.matches(fields, dataset)) {
      candidates.push(template);
    }
  }

  return candidates.length > 0 ? candidates : templates;
}

/**
 * Catalog templates render the whole dataset; every other template needs a record identifier
 */
export function templateRequiresIdentifier(template: TemplateRef, catalogTemplates: string[]): boolean {
  const stem = template.stem.toLowerCase();
  return !catalogTemplates.some(name => name.toLowerCase() === stem);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}
