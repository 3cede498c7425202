export * from './constants/index.js';
export * from './utils/npi.utils.js';
export * from './schemas/generator.schema.js';
