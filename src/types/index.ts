// types/index.ts

// ============================================
// Data Types
// ============================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type DataRecord = Record<string, JsonValue>;

export type DatasetFormat = 'csv' | 'json';

export interface Dataset {
  /** File name without directory, e.g. `invoices.csv` */
  name: string;
  path: string;
  format: DatasetFormat;
  fields: string[];
  records: DataRecord[];
}

// ============================================
// Template Types
// ============================================

export interface TemplateRef {
  name: string;
  stem: string;
  path: string;
}

export type Selection = RecordSelection | CollectionSelection;

export interface RecordSelection {
  kind: 'record';
  field: string;
  identifier: string;
  record: DataRecord;
  /** Every record sharing the identifier (line-item datasets) */
  records: DataRecord[];
}

export interface CollectionSelection {
  kind: 'collection';
  records: DataRecord[];
}

export interface BindingContext {
  record: DataRecord;
  records: DataRecord[];
  allRecords: DataRecord[];
  identifier: string;
  identifierField: string;
  generatedAt: string;
  dataset: string;
  dataFile: string;
  templateFile: string;
}

// ============================================
// Configuration Types
// ============================================

export type PaperFormat = 'A3' | 'A4' | 'A5' | 'Letter' | 'Legal';

export interface PdfMargin {
  top: string;
  right: string;
  bottom: string;
  left: string;
}

export interface GeneratorConfig {
  rootDir: string;
  dataDir: string;
  templatesDir: string;
  outputDir: string;
  fontsDir: string;
  defaultData: string;
  defaultTemplate: string;
  catalogTemplates: string[];
  identifierField?: string;
  locale: string;
  browser: {
    executablePath?: string;
    args: string[];
  };
  pdf: {
    format: PaperFormat;
    margin: PdfMargin;
    printBackground: boolean;
  };
  open: boolean;
}

/**
 * Shape of recordprint.config.json; every field is optional
 */
export interface FileConfig {
  dataDir?: string;
  templatesDir?: string;
  outputDir?: string;
  fontsDir?: string;
  defaultData?: string;
  defaultTemplate?: string;
  catalogTemplates?: string[];
  identifierField?: string;
  locale?: string;
  browser?: {
    executablePath?: string;
    args?: string[];
  };
  pdf?: {
    format?: PaperFormat;
    margin?: Partial<PdfMargin>;
    printBackground?: boolean;
  };
  open?: boolean;
}

// ============================================
// Error Types
// ============================================

export class RecordPrintError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly reason?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RecordPrintError';
  }
}

export class NotFoundError extends RecordPrintError {
  constructor(message: string, path?: string, reason?: string) {
    super(message, path, reason);
    this.name = 'NotFoundError';
  }
}

export class UnsupportedFormatError extends RecordPrintError {
  constructor(path: string, extension: string) {
    super(
      `Unsupported data format: ${extension || '(no extension)'}`,
      path,
      'Supported formats: .csv, .json'
    );
    this.name = 'UnsupportedFormatError';
  }
}

export class ParseError extends RecordPrintError {
  constructor(message: string, path?: string, reason?: string, options?: { cause?: unknown }) {
    super(message, path, reason, options);
    this.name = 'ParseError';
  }
}

export class MissingIdentifierError extends RecordPrintError {
  constructor(
    public readonly field: string | undefined,
    public readonly validIdentifiers: string[],
    reason?: string
  ) {
    super(
      field
        ? `A record identifier is required (field "${field}")`
        : 'A record identifier is required but no identifier field was found',
      undefined,
      reason
    );
    this.name = 'MissingIdentifierError';
  }
}

export class RecordNotFoundError extends RecordPrintError {
  constructor(
    public readonly identifier: string,
    public readonly field: string,
    public readonly validIdentifiers: string[]
  ) {
    super(`Record not found: ${field}=${identifier}`);
    this.name = 'RecordNotFoundError';
  }
}

/**
 * Raised when the templating engine rejects a template.
 * The message is the engine's own.
 */
export class TemplateSyntaxError extends RecordPrintError {
  constructor(message: string, path: string, cause: unknown) {
    super(message, path, undefined, { cause });
    this.name = 'TemplateSyntaxError';
  }
}

export class RenderError extends RecordPrintError {
  constructor(message: string, reason?: string, cause?: unknown) {
    super(message, undefined, reason, { cause });
    this.name = 'RenderError';
  }
}

export class ConfigError extends RecordPrintError {
  constructor(message: string, path?: string, reason?: string) {
    super(message, path, reason);
    this.name = 'ConfigError';
  }
}
