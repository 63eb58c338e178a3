/**
 * JSON Schema validation for bitcache documents
 */

import { createRequire } from 'node:module'
import { Ajv, type ErrorObject } from 'ajv'

import type { MetadataDocument } from '../types/artifact.js'
import type { BitcacheTomlDocument } from '../types/settings.js'

const require = createRequire(import.meta.url)
const metadataSchema: object = require('./metadata.schema.json')
const configSchema: object = require('./config.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

const ajv = new Ajv({
  strict: true,
  allErrors: true,
})

const validateMetadataSchema = ajv.compile<MetadataDocument>(metadataSchema)
const validateConfigSchema = ajv.compile<BitcacheTomlDocument>(configSchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

/**
 * Provide a more helpful error message for known validation patterns.
 */
function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message || 'Unknown error'

  if (err.keyword === 'additionalProperties') {
    const prop = err.params['additionalProperty']
    return `unknown property "${String(prop)}"`
  }

  if (err.keyword === 'propertyNames' || err.instancePath.endsWith('/md5')) {
    return 'digest keys must be 32 lowercase hex characters'
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: { ...err.params },
  }))
}

/**
 * Validate a parsed bitcache_metadata.json document
 */
export function validateMetadataDocument(data: unknown): ValidationResult<MetadataDocument> {
  if (validateMetadataSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateMetadataSchema.errors) }
}

/**
 * Validate a parsed bitcache.toml document
 */
export function validateConfigDocument(data: unknown): ValidationResult<BitcacheTomlDocument> {
  if (validateConfigSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateConfigSchema.errors) }
}
