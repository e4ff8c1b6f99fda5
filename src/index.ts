// index.ts
// Main exports for recordprint

export * from './types/index.js';
export * from './core/datasource.js';
export * from './core/selector.js';
export * from './core/template.js';
export * from './core/helpers.js';
export * from './core/binder.js';
export * from './core/output-namer.js';
export * from './core/fonts.js';
export * from './core/renderer.js';
export * from './core/opener.js';
export * from './core/config.js';
export * from './core/arguments.js';
export * from './core/generator.js';
export * from './core/schema-registry.js';
