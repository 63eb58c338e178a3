/**
 * Core types, errors, schemas and settings shared by every bitcache module.
 */

export * from './errors.js'
export * from './types/index.js'
export {
  validateConfigDocument,
  validateMetadataDocument,
  type ValidationError,
  type ValidationResult,
} from './schemas/index.js'
export { atomicWrite, type AtomicWriteOptions } from './atomic.js'
export {
  CONFIG_FILENAME,
  DEFAULT_SETTINGS,
  loadSettings,
  parseConfigToml,
  readConfigFile,
  resolveSettings,
  type LoadSettingsOptions,
  type SettingsOverrides,
} from './config/settings.js'
