/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  mergeConfig,
  CONFIG_DIR,
  DEFAULT_CONFIG,
  validateVersion,
  validatePatterns,
  validateRules,
  validateDiscardPattern,
  validateConcurrency,
} from './ConfigLoader.js';
