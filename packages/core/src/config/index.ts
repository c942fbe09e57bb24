export {
  DEFAULT_CONFIG,
  validateConfig,
  mergeConfig,
  configFromEnv,
  type AnalyzerConfig,
  type DiscoveryConfig,
  type StyleLensConfig,
  type ConfigValidationResult,
} from './schema.js';
export { CONFIG_FILE_NAME, loadConfigFile, loadProjectConfig, type LoadConfigOptions } from './loader.js';
