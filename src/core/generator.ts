// core/generator.ts
// Pipeline: load dataset -> select record -> bind template -> render -> write -> open

import * as os from 'os';
import * as path from 'path';
import type { Dataset, GeneratorConfig, TemplateRef } from '../types/index.js';
import { resolveDataPath, resolveIdentifierField, resolveTemplateSelector } from './arguments.js';
import { buildBindingContext, HandlebarsEngine, type TemplateEngine } from './binder.js';
import { listDataFiles, loadDataset } from './datasource.js';
import { findFontFile, loadFontCss } from './fonts.js';
import { SystemFileOpener, type FileOpener } from './opener.js';
import { buildOutputName, writeArtifact } from './output-namer.js';
import { PuppeteerRenderer, type Renderer } from './renderer.js';
import { listIdentifiers, selectRecords } from './selector.js';
import { detectTemplateCandidates, listTemplates, templateRequiresIdentifier } from './template.js';

export interface GenerateRequest {
  /** Data file path, name, 1-based index or substring */
  data?: string;
  /** Template path, name, stem, 1-based index or substring */
  template?: string;
  identifier?: string;
  identifierField?: string;
}

export interface GenerateResult {
  outputPath: string;
  fileName: string;
  dataset: string;
  template: string;
  identifier?: string;
  recordCount: number;
}

export interface DatasetDescription {
  path: string;
  recordCount: number;
  candidates: TemplateRef[];
  identifierField?: string;
  identifiers: string[];
}

export interface WorkspaceDescription {
  dataFiles: string[];
  templates: TemplateRef[];
  dataset?: DatasetDescription;
}

export interface GeneratorDeps {
  engine?: TemplateEngine;
  renderer?: Renderer;
  opener?: FileOpener;
  clock?: () => Date;
  log?: (line: string) => void;
  warn?: (line: string) => void;
  platform?: NodeJS.Platform;
  homeDir?: string;
}

export class DocumentGenerator {
  private readonly engine: TemplateEngine;
  private readonly renderer: Renderer;
  private readonly opener: FileOpener;
  private readonly clock: () => Date;
  private readonly log: (line: string) => void;
  private readonly warn: (line: string) => void;
  private readonly platform: NodeJS.Platform;
  private readonly homeDir: string;

  constructor(private readonly config: GeneratorConfig, deps: GeneratorDeps = {}) {
    this.platform = deps.platform ?? process.platform;
    this.homeDir = deps.homeDir ?? os.homedir();
    this.clock = deps.clock ?? (() => new Date());
    this.log = deps.log ?? ((line: string) => console.log(line));
    this.warn = deps.warn ?? ((line: string) => console.warn(line));
    this.engine = deps.engine ?? new HandlebarsEngine({ locale: config.locale });
    this.renderer = deps.renderer ?? new PuppeteerRenderer(
      {
        executablePath: config.browser.executablePath,
        args: config.browser.args,
        pdf: config.pdf,
        warn: this.warn,
      },
      this.platform
    );
    this.opener = deps.opener ?? new SystemFileOpener(this.platform);
  }

  async generate(request: GenerateRequest = {}): Promise<GenerateResult> {
    const dataPath = await resolveDataPath(request.data, this.config);
    this.log(`Loading data: ${path.basename(dataPath)}`);
    const dataset = await loadDataset(dataPath, { requireRecords: true });
    this.log(`Loaded ${dataset.records.length} records`);

    const templates = await listTemplates(this.config.templatesDir);
    const template = await resolveTemplateSelector(request.template, dataset, templates, this.config);
    const requiresIdentifier = templateRequiresIdentifier(template, this.config.catalogTemplates);
    this.log(`Template: ${template.name}`);

    const selection = selectRecords(dataset, {
      identifier: request.identifier,
      requiresIdentifier,
      identifierField: resolveIdentifierField(request.identifierField, dataset, this.config),
    });
    if (selection.kind === 'record') {
      this.log(`Record: ${selection.field}=${selection.identifier} (${selection.records.length} rows)`);
    }

    const now = this.clock();
    const context = buildBindingContext({ dataset, selection, template, generatedAt: now });
    const markup = await this.engine.render(template, context);

    const fontFile = await findFontFile({
      fontsDir: this.config.fontsDir,
      platform: this.platform,
      homeDir: this.homeDir,
    });
    const fontCss = await loadFontCss(fontFile);

    const identifier = requiresIdentifier && selection.kind === 'record' ? selection.identifier : undefined;
    const fileName = buildOutputName({
      identifier,
      datasetPath: dataset.path,
      templatePath: template.path,
      date: now,
    });

    this.log(`Generating PDF: ${fileName}`);
    // Rendered fully in memory; nothing touches the output directory before this succeeds
    const bytes = await this.renderer.render(markup, { stylesheets: [fontCss] });
    const artifact = await writeArtifact(this.config.outputDir, fileName, bytes);
    if (artifact.fileName !== fileName) {
      this.warn(`${fileName} already exists, written as ${artifact.fileName}`);
    }
    this.log(`Done: ${artifact.outputPath}`);

    if (this.config.open) {
      await this.openArtifact(artifact.outputPath);
    }

    return {
      outputPath: artifact.outputPath,
      fileName: artifact.fileName,
      dataset: dataset.name,
      template: template.name,
      identifier,
      recordCount: selection.records.length,
    };
  }

  /**
   * Data files and templates on disk; with a data selector, also the
   * template candidates and identifiers for that dataset.
   */
  async describe(dataSelector?: string): Promise<WorkspaceDescription> {
    const dataFiles = await listDataFiles(this.config.dataDir);
    const templates = await listTemplates(this.config.templatesDir);

    if (dataSelector === undefined) {
      return { dataFiles, templates };
    }

    const dataPath = await resolveDataPath(dataSelector, this.config);
    const dataset = await loadDataset(dataPath);
    return { dataFiles, templates, dataset: this.describeDataset(dataset, templates) };
  }

  private describeDataset(dataset: Dataset, templates: TemplateRef[]): DatasetDescription {
    const identifierField = resolveIdentifierField(undefined, dataset, this.config);
    return {
      path: dataset.path,
      recordCount: dataset.records.length,
      candidates: detectTemplateCandidates(dataset, templates),
      identifierField,
      identifiers: identifierField ? listIdentifiers(dataset, identifierField) : [],
    };
  }

  private async openArtifact(outputPath: string): Promise<void> {
    this.log('Opening PDF...');
    try {
      await this.opener.open(outputPath);
    } catch (error) {
      // The artifact is already on disk at this point
      const message = error instanceof Error ? error.message : String(error);
      this.warn(`Could not open the PDF automatically: ${message}`);
    }
  }
}
