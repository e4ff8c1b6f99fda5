// core/binder.ts
// Binding context assembly and the Handlebars template engine

import * as fs from 'fs/promises';
import Handlebars from 'handlebars';
import type { BindingContext, Dataset, Selection, TemplateRef } from '../types/index.js';
import { NotFoundError, TemplateSyntaxError } from '../types/index.js';
import { isMissingFile } from './datasource.js';
import { registerHelpers } from './helpers.js';
import { formatGeneratedAt } from './output-namer.js';

/**
 * Turns a template plus a binding context into HTML markup
 */
export interface TemplateEngine {
  render(template: TemplateRef, context: BindingContext): Promise<string>;
}

export interface BindingInput {
  dataset: Dataset;
  selection: Selection;
  template: TemplateRef;
  generatedAt: Date;
}

/**
 * Build the data handed to the template. Record documents get the selected
 * record and its sibling rows; catalog documents get the full dataset.
 */
export function buildBindingContext(input: BindingInput): BindingContext {
  const { dataset, selection, template } = input;
  const isRecord = selection.kind === 'record';

  return {
    record: isRecord ? selection.record : {},
    records: selection.records,
    allRecords: dataset.records,
    identifier: isRecord ? selection.identifier : '',
    identifierField: isRecord ? selection.field : '',
    generatedAt: formatGeneratedAt(input.generatedAt),
    dataset: dataset.name.replace(/\.[^.]+$/, ''),
    dataFile: dataset.name,
    templateFile: template.name,
  };
}

export interface HandlebarsEngineOptions {
  locale: string;
}

type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

export class HandlebarsEngine implements TemplateEngine {
  private readonly hbs: typeof Handlebars;

  constructor(options: HandlebarsEngineOptions) {
    // Isolated environment so helpers never leak into the global instance
    this.hbs = Handlebars.create();
    registerHelpers(this.hbs, options.locale);
  }

  async render(template: TemplateRef, context: BindingContext): Promise<string> {
    let source: string;
    try {
      source = await fs.readFile(template.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Template not found: ${template.name}`, template.path);
      }
      throw error;
    }
    return this.renderSource(source, context, template.path);
  }

  renderSource(source: string, context: BindingContext, sourcePath: string): string {
    let compiled: CompiledTemplate;
    try {
      // compile() is lazy; parse() surfaces syntax errors up front
      this.hbs.parse(source);
      compiled = this.hbs.compile(source);
    } catch (error) {
      throw toTemplateError(error, sourcePath);
    }

    try {
      return compiled(context);
    } catch (error) {
      throw toTemplateError(error, sourcePath);
    }
  }
}

function toTemplateError(error: unknown, sourcePath: string): TemplateSyntaxError {
  const message = error instanceof Error ? error.message : String(error);
  return new TemplateSyntaxError(message, sourcePath, error);
}
