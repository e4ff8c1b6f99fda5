// core/config.ts
// Generator configuration: defaults, recordprint.config.json, environment fallbacks

import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileConfig, GeneratorConfig } from '../types/index.js';
import { ConfigError } from '../types/index.js';
import { isMissingFile } from './datasource.js';
import { formatSchemaErrors, getConfigValidator } from './schema-registry.js';

export const CONFIG_FILE_NAME = 'recordprint.config.json';

export interface LoadConfigOptions {
  rootDir: string;
  /** Explicit config file; a missing file is then an error */
  configPath?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Built-in defaults, with directories resolved against rootDir
 */
export function defaultConfig(rootDir: string): GeneratorConfig {
  const root = path.resolve(rootDir);
  const dataDir = path.join(root, 'data');
  return {
    rootDir: root,
    dataDir,
    templatesDir: path.join(root, 'templates'),
    outputDir: path.join(root, 'output'),
    fontsDir: path.join(root, 'assets', 'fonts'),
    defaultData: path.join(dataDir, 'invoices.csv'),
    defaultTemplate: 'invoice_simple.html',
    catalogTemplates: ['product_catalog'],
    locale: 'en-US',
    browser: {
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--font-render-hinting=medium'],
    },
    pdf: {
      format: 'A4',
      margin: { top: '15mm', right: '12mm', bottom: '15mm', left: '12mm' },
      printBackground: true,
    },
    open: true,
  };
}

/**
 * Parse and validate recordprint.config.json content
 */
export function parseConfigFile(content: string, filePath: string): FileConfig {
  let json: unknown;

  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${path.basename(filePath)}`,
      filePath,
      error instanceof Error ? error.message : 'Parse error'
    );
  }

  const validateConfig = getConfigValidator();
  if (!validateConfig(json)) {
    throw new ConfigError(
      'Configuration validation failed',
      filePath,
      formatSchemaErrors(validateConfig.errors)
    );
  }

  return json;
}

/**
 * Overlay a file config on a base config. Relative directories resolve
 * against rootDir; defaultData resolves against the data directory.
 */
export function mergeConfig(base: GeneratorConfig, file: FileConfig): GeneratorConfig {
  const resolveDir = (value: string | undefined, fallback: string) =>
    value ? path.resolve(base.rootDir, value) : fallback;

  const dataDir = resolveDir(file.dataDir, base.dataDir);
  const defaultData = file.defaultData
    ? path.resolve(dataDir, file.defaultData)
    : path.join(dataDir, path.basename(base.defaultData));

  return {
    ...base,
    dataDir,
    templatesDir: resolveDir(file.templatesDir, base.templatesDir),
    outputDir: resolveDir(file.outputDir, base.outputDir),
    fontsDir: resolveDir(file.fontsDir, base.fontsDir),
    defaultData,
    defaultTemplate: file.defaultTemplate ?? base.defaultTemplate,
    catalogTemplates: file.catalogTemplates ?? base.catalogTemplates,
    identifierField: file.identifierField ?? base.identifierField,
    locale: file.locale ?? base.locale,
    browser: {
      executablePath: file.browser?.executablePath ?? base.browser.executablePath,
      args: file.browser?.args ?? base.browser.args,
    },
    pdf: {
      format: file.pdf?.format ?? base.pdf.format,
      margin: { ...base.pdf.margin, ...file.pdf?.margin },
      printBackground: file.pdf?.printBackground ?? base.pdf.printBackground,
    },
    open: file.open ?? base.open,
  };
}

/**
 * Build the configuration once, at startup. This is the only place
 * that reads the environment.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<GeneratorConfig> {
  const base = defaultConfig(options.rootDir);
  const configPath = options.configPath
    ? path.resolve(options.rootDir, options.configPath)
    : path.join(base.rootDir, CONFIG_FILE_NAME);

  let content: string | undefined;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    if (options.configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
  }

  const config = content === undefined ? base : mergeConfig(base, parseConfigFile(content, configPath));

  const env = options.env ?? {};
  const envBrowser = env.RECORDPRINT_CHROME_PATH || env.PUPPETEER_EXECUTABLE_PATH;
  if (!config.browser.executablePath && envBrowser) {
    return { ...config, browser: { ...config.browser, executablePath: envBrowser } };
  }

  return config;
}
