export * from './types.js';
export * from './format.js';
export { RULES } from './rules.js';
