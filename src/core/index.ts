/**
 * API Assert - Core Module Index
 *
 * Re-exports all core functionality
 */

// Chain
export { Chain, type FailCallback } from './chain';

// Canonicalization
export {
  canonicalDecode,
  canonicalizeArray,
  canonicalizeNumber,
  canonicalizeObject,
  canonicalizeValue,
  compareNumbers,
  deepEqual,
  isCanonicalObject,
  isNumber,
  toNumber,
  type CanonResult,
  type Comparison,
} from './canon';

// Failure validation
export { isAssertionType, validateFailure } from './failure';

// Environment
export { Environment } from './environment';

// Configuration
export {
  CONFIG_SCHEMA,
  DEFAULT_CONFIG_PATH,
  buildConfig,
  loadConfig,
  resolveConfig,
  validateConfig,
  type ConfigFile,
  type LoadConfigOptions,
} from './config';
