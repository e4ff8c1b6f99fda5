// core/schema-registry.ts
// Centralized AJV schema registry for validation

import { Ajv } from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { FileConfig } from '../types/index.js';
import { DATASET_JSON_SCHEMA } from '../schemas/dataset-json.js';
import { RECORDPRINT_CONFIG_SCHEMA } from '../schemas/config.js';

// Create singleton AJV instance
const ajv = new Ajv({ strict: true, allErrors: true });

const validateDataset = ajv.compile(DATASET_JSON_SCHEMA);
const validateConfig = ajv.compile<FileConfig>(RECORDPRINT_CONFIG_SCHEMA);

/**
 * Get compiled validator for JSON datasets
 */
export function getDatasetValidator(): ValidateFunction {
  return validateDataset;
}

/**
 * Get compiled validator for recordprint.config.json
 */
export function getConfigValidator(): ValidateFunction<FileConfig> {
  return validateConfig;
}

/**
 * Join AJV errors into one reason line
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map(e => `${e.instancePath || 'root'}: ${e.message}`).join('; ');
}

export { DATASET_JSON_SCHEMA, RECORDPRINT_CONFIG_SCHEMA };
