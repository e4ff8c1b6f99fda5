// schemas/dataset-json.ts
// Accepted shapes for JSON datasets: one object, or an array of objects

export const DATASET_JSON_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'recordprint-dataset/v1.schema.json',
  title: 'recordprint JSON dataset',
  oneOf: [
    { type: 'object' },
    {
      type: 'array',
      items: { type: 'object' },
    },
  ],
} as const;
