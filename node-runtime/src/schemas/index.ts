export * from './wizard.schema.js';
export * from './data-schema.schema.js';
export * from './config.schema.js';
