#!/usr/bin/env node
// cli.ts
// CLI entry point for recordprint

import { Command } from 'commander';
import * as path from 'path';
import { loadConfig } from './core/config.js';
import { DocumentGenerator } from './core/generator.js';
import type { GeneratorConfig } from './types/index.js';
import { MissingIdentifierError, RecordNotFoundError, RecordPrintError } from './types/index.js';

interface CommonOptions {
  root: string;
  config?: string;
}

interface GenerateOptions extends CommonOptions {
  data?: string;
  template?: string;
  id?: string;
  idField?: string;
  output?: string;
  open: boolean;
}

interface ListOptions extends CommonOptions {
  data?: string;
}

const program = new Command();

program
  .name('recordprint')
  .description('CSV/JSON records -> HTML template -> PDF')
  .version('0.1.0');

program
  .command('generate', { isDefault: true })
  .description('Render a dataset through a template into a PDF')
  .option('-d, --data <file>', 'Data file: path, name, number or part of a name')
  .option('-t, --template <name>', 'Template: path, name, number or part of a name')
  .option('-i, --id <identifier>', 'Record identifier (e.g. invoice id)')
  .option('--id-field <field>', 'Field holding the record identifier')
  .option('-o, --output <dir>', 'Output directory')
  .option('-c, --config <path>', 'Config file (default: recordprint.config.json)')
  .option('-r, --root <dir>', 'Project root', process.cwd())
  .option('--no-open', 'Do not open the PDF when done')
  .action(async (options: GenerateOptions) => {
    try {
      const loaded = await loadConfig({
        rootDir: options.root,
        configPath: options.config,
        env: process.env,
      });
      const config: GeneratorConfig = {
        ...loaded,
        outputDir: options.output ? path.resolve(options.output) : loaded.outputDir,
        open: loaded.open && options.open,
      };

      console.log('recordprint: CSV/JSON -> HTML template -> PDF');
      const generator = new DocumentGenerator(config);
      await generator.generate({
        data: options.data,
        template: options.template,
        identifier: options.id,
        identifierField: options.idField,
      });
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('list')
  .description('List data files and templates; with --data, also candidates and identifiers')
  .option('-d, --data <file>', 'Data file to inspect')
  .option('-c, --config <path>', 'Config file (default: recordprint.config.json)')
  .option('-r, --root <dir>', 'Project root', process.cwd())
  .action(async (options: ListOptions) => {
    try {
      const config = await loadConfig({
        rootDir: options.root,
        configPath: options.config,
        env: process.env,
      });
      const generator = new DocumentGenerator(config);
      const description = await generator.describe(options.data);

      printNumbered(`Data files (${config.dataDir}):`, description.dataFiles.map(f => path.basename(f)));
      printNumbered(`Templates (${config.templatesDir}):`, description.templates.map(t => t.name));

      const dataset = description.dataset;
      if (dataset) {
        console.log(`\n${path.basename(dataset.path)}: ${dataset.recordCount} records`);
        printNumbered('Templates for this data:', dataset.candidates.map(t => t.name));
        if (dataset.identifierField) {
          printNumbered(`Identifiers (field "${dataset.identifierField}"):`, dataset.identifiers);
        } else {
          console.log('\nNo identifier field detected');
        }
      }
    } catch (error) {
      handleError(error);
    }
  });

function printNumbered(title: string, items: string[]): void {
  console.log(`\n${title}`);
  if (items.length === 0) {
    console.log('  (none)');
  }
  items.forEach((item, index) => {
    console.log(`  ${index + 1}. ${item}`);
  });
}

function handleError(error: unknown): void {
  if (error instanceof RecordPrintError) {
    console.error(`\nError: ${error.message}`);
    if (error.path) console.error(`  Path: ${error.path}`);
    if (error.reason) console.error(`  Reason: ${error.reason}`);
    if (error instanceof MissingIdentifierError || error instanceof RecordNotFoundError) {
      if (error.validIdentifiers.length > 0) {
        console.error(`  Valid identifiers: ${error.validIdentifiers.join(', ')}`);
      }
    }
  } else if (error instanceof Error) {
    console.error(`\nError: ${error.message}`);
    console.error(error.stack);
  } else {
    console.error('\nUnknown error:', error);
  }
  process.exit(1);
}

program.parseAsync().catch(handleError);
