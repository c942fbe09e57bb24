/**
 * Commands module exports
 *
 * Exports all CLI commands for registration with Commander.js
 */

export { checkCommand } from './check.js';
export { rulesCommand } from './rules.js';
export { parserCommand } from './parser.js';
