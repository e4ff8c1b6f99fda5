// schemas/config.ts
// recordprint.config.json schema

const MARGIN = { type: 'string', minLength: 1 } as const;

export const RECORDPRINT_CONFIG_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'recordprint-config/v1.schema.json',
  title: 'recordprint configuration',
  type: 'object',
  properties: {
    dataDir: { type: 'string', minLength: 1 },
    templatesDir: { type: 'string', minLength: 1 },
    outputDir: { type: 'string', minLength: 1 },
    fontsDir: { type: 'string', minLength: 1 },
    defaultData: { type: 'string', minLength: 1 },
    defaultTemplate: { type: 'string', minLength: 1 },
    catalogTemplates: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
      description: 'Template stems rendered from the whole dataset (no record identifier).',
    },
    identifierField: { type: 'string', minLength: 1 },
    locale: { type: 'string', minLength: 2 },
    browser: {
      type: 'object',
      properties: {
        executablePath: { type: 'string', minLength: 1 },
        args: { type: 'array', items: { type: 'string' } },
      },
      additionalProperties: false,
    },
    pdf: {
      type: 'object',
      properties: {
        format: { enum: ['A3', 'A4', 'A5', 'Letter', 'Legal'] },
        margin: {
          type: 'object',
          properties: { top: MARGIN, right: MARGIN, bottom: MARGIN, left: MARGIN },
          additionalProperties: false,
        },
        printBackground: { type: 'boolean' },
      },
      additionalProperties: false,
    },
    open: { type: 'boolean' },
  },
  additionalProperties: false,
} as const;
