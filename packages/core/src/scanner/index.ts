export {
  DEFAULT_IGNORE_DIRECTORIES,
  shouldIgnoreDirectory,
  getDefaultIgnoreDirectories,
} from './default-ignores.js';
export { discoverSourceFiles, type DiscoveryOptions } from './file-discovery.js';
