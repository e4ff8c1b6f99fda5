// core/arguments.ts
// Map optional invocation arguments to loader, binder and selector inputs

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Dataset, GeneratorConfig, TemplateRef } from '../types/index.js';
import { NotFoundError } from '../types/index.js';
import { isMissingFile, listDataFiles } from './datasource.js';
import { detectIdentifierField } from './selector.js';
import { detectTemplateCandidates, pickByName, resolveTemplate } from './template.js';

/**
 * Dataset path for a --data selector: an existing path, or a 1-based
 * index, file name or substring within the data directory.
 */
export async function resolveDataPath(
  selector: string | undefined,
  config: GeneratorConfig
): Promise<string> {
  if (!selector) {
    return config.defaultData;
  }

  const direct = path.resolve(config.rootDir, selector);
  if (await isFile(direct)) {
    return direct;
  }

  const files = await listDataFiles(config.dataDir);
  const match = pickByName(files, selector, file => path.basename(file));
  if (!match) {
    throw new NotFoundError(
      `Data file not found: ${selector}`,
      config.dataDir,
      files.length > 0
        ? `Available: ${files.map(f => path.basename(f)).join(', ')}`
        : 'No data files available'
    );
  }
  return match;
}

/**
 * Template for an invocation: the explicit selector, else the first
 * candidate detected from the dataset, else the configured default.
 */
export async function resolveTemplateSelector(
  selector: string | undefined,
  dataset: Dataset,
  templates: TemplateRef[],
  config: GeneratorConfig
): Promise<TemplateRef> {
  if (selector) {
    return resolveTemplate(selector, config.templatesDir, templates);
  }

  // Detection falls back to every template when nothing specific matches
  const candidates = detectTemplateCandidates(dataset, templates);
  if (candidates.length < templates.length && candidates[0]) {
    return candidates[0];
  }

  const fallback = pickByName(templates, config.defaultTemplate, t => t.name, t => t.stem) ?? candidates[0];
  return fallback ?? resolveTemplate(config.defaultTemplate, config.templatesDir, templates);
}

/**
 * Identifier field: CLI override, then config, then detection
 */
export function resolveIdentifierField(
  override: string | undefined,
  dataset: Dataset,
  config: GeneratorConfig
): string | undefined {
  return override ?? config.identifierField ?? detectIdentifierField(dataset);
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
