/**
 * stylelens Configuration
 *
 * Configuration types and defaults, with validation and merging
 * utilities. Only the analysis scope and file discovery are configurable;
 * the checkers themselves are fixed.
 */

import type { ConfigFieldError } from '../errors/index.js';
import type { VariableScope } from '../extractors/syntax-facts.js';

// ============================================
// Configuration Interface
// ============================================

export interface AnalyzerConfig {
  /** Where assignments are checked for snake_case names (default: 'tree') */
  variableScope: VariableScope;
}

export interface DiscoveryConfig {
  /** File extensions analyzed when walking a directory (default: ['.py']) */
  extensions: string[];

  /** Glob patterns, relative to the scanned directory, to skip (default: []) */
  exclude: string[];

  /** Skip virtualenvs, caches, VCS and build directories (default: true) */
  useDefaultIgnores: boolean;
}

export interface StyleLensConfig extends AnalyzerConfig, DiscoveryConfig {}

// ============================================
// Default Configuration
// ============================================

export const DEFAULT_CONFIG: Readonly<StyleLensConfig> = {
  variableScope: 'tree',
  extensions: ['.py'],
  exclude: [],
  useDefaultIgnores: true,
};

// ============================================
// Configuration Validation
// ============================================

/**
 * Result of configuration validation.
 */
export interface ConfigValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  /** Validation errors if any */
  errors: ConfigFieldError[];
  /** Validated and normalized configuration */
  config: StyleLensConfig;
}

const VARIABLE_SCOPES: readonly VariableScope[] = ['tree', 'function'];

function isVariableScope(value: unknown): value is VariableScope {
  return VARIABLE_SCOPES.some((scope) => scope === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a configuration object, typically parsed from JSON.
 * Unknown keys are reported as errors.
 */
export function validateConfig(input: unknown): ConfigValidationResult {
  const errors: ConfigFieldError[] = [];
  const normalized: StyleLensConfig = {
    ...DEFAULT_CONFIG,
    extensions: [...DEFAULT_CONFIG.extensions],
    exclude: [...DEFAULT_CONFIG.exclude],
  };

  if (!isRecord(input)) {
    errors.push({ field: '(root)', message: 'must be an object', value: input });
    return { valid: false, errors, config: normalized };
  }

  for (const [field, value] of Object.entries(input)) {
    switch (field) {
      case 'variableScope':
        if (isVariableScope(value)) {
          normalized.variableScope = value;
        } else {
          errors.push({ field, message: `must be one of ${VARIABLE_SCOPES.join(', ')}`, value });
        }
        break;

      case 'extensions':
        if (isStringArray(value) && value.every((ext) => ext.startsWith('.') && ext.length > 1)) {
          normalized.extensions = value.map((ext) => ext.toLowerCase());
        } else {
          errors.push({ field, message: 'must be an array of extensions like ".py"', value });
        }
        break;

      case 'exclude':
        if (isStringArray(value)) {
          normalized.exclude = [...value];
        } else {
          errors.push({ field, message: 'must be an array of glob patterns', value });
        }
        break;

      case 'useDefaultIgnores':
        if (typeof value === 'boolean') {
          normalized.useDefaultIgnores = value;
        } else {
          errors.push({ field, message: 'must be a boolean', value });
        }
        break;

      default:
        errors.push({ field, message: 'is not a known option', value });
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    config: normalized,
  };
}

/**
 * Merge partial configuration with defaults.
 */
export function mergeConfig(config: Partial<StyleLensConfig>): StyleLensConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
  };
}

/**
 * Create configuration from environment variables.
 *
 * - STYLELENS_VARIABLE_SCOPE: 'tree' or 'function'
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<StyleLensConfig> {
  const config: Partial<StyleLensConfig> = {};

  const variableScope = env['STYLELENS_VARIABLE_SCOPE']?.toLowerCase();
  if (isVariableScope(variableScope)) {
    config.variableScope = variableScope;
  }

  return config;
}
