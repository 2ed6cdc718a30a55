export type * from './wizard.js';
export type * from './data-schema.js';
export type * from './execution.js';
export type * from './config.js';
