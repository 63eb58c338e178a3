/**
 * Typed error classes for bitcache
 *
 * Error hierarchy:
 * - BitcacheError (base)
 *   - ConfigError (configuration issues)
 *     - ConfigParseError (TOML parse failures, bad env values)
 *     - ConfigValidationError (schema validation failures)
 *   - InputError (bad caller input)
 *     - SourceUnreadableError (source/binary cannot be read)
 *     - InvalidTargetPathError (target path escapes the store)
 *     - InvalidDigestError (malformed digest string)
 *   - StoreError (store contents)
 *     - MetadataParseError (corrupt metadata document)
 *     - DigestNotFoundError (digest absent from index)
 *     - ArtifactMissingError (index references a missing file)
 *     - StoreIoError (local filesystem failure)
 *   - RemoteError (clone/push failures, auth, timeouts)
 *     - PublishConflictExhaustedError (retries exceeded)
 *   - GitError (git plumbing)
 */

import type { ValidationError } from './schemas/index.js'

/** Base error class for all bitcache errors */
export class BitcacheError extends Error {
  readonly code: string

  constructor(message: string, code: string) {
    super(message)
    this.name = 'BitcacheError'
    this.code = code
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends BitcacheError {
  readonly source: string

  constructor(message: string, code: string, source: string) {
    super(message, code)
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when TOML parsing or an environment value fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(`${source}: ${message}`, 'CONFIG_PARSE_ERROR', source)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

// ============================================================================
// Input errors
// ============================================================================

/** Base class for errors caused by caller input */
export class InputError extends BitcacheError {
  constructor(message: string, code: string) {
    super(message, code)
    this.name = 'InputError'
  }
}

/** Error thrown when the source or binary file cannot be read */
export class SourceUnreadableError extends InputError {
  readonly path: string

  constructor(path: string, reason: string) {
    super(`Cannot read "${path}": ${reason}`, 'SOURCE_UNREADABLE')
    this.name = 'SourceUnreadableError'
    this.path = path
  }
}

/** Error thrown when a target path would land outside the artifact tree */
export class InvalidTargetPathError extends InputError {
  readonly targetPath: string

  constructor(targetPath: string, reason: string) {
    super(`Invalid target path "${targetPath}": ${reason}`, 'INVALID_TARGET_PATH')
    this.name = 'InvalidTargetPathError'
    this.targetPath = targetPath
  }
}

/** Error thrown when a digest string is not a 32-char hex MD5 */
export class InvalidDigestError extends InputError {
  readonly digest: string

  constructor(digest: string) {
    super(`Invalid digest "${digest}": expected 32 hexadecimal characters`, 'INVALID_DIGEST')
    this.name = 'InvalidDigestError'
    this.digest = digest
  }
}

// ============================================================================
// Store errors
// ============================================================================

/** Base class for store-related errors */
export class StoreError extends BitcacheError {
  constructor(message: string, code: string) {
    super(message, code)
    this.name = 'StoreError'
  }
}

/** Error thrown when the metadata document is present but unreadable */
export class MetadataParseError extends StoreError {
  readonly source: string

  constructor(message: string, source: string) {
    super(`Corrupt metadata in ${source}: ${message}`, 'METADATA_PARSE_ERROR')
    this.name = 'MetadataParseError'
    this.source = source
  }
}

/** Error thrown when a digest has no entry in the index */
export class DigestNotFoundError extends StoreError {
  readonly digest: string

  constructor(digest: string) {
    super(`No binary found for MD5: ${digest}`, 'DIGEST_NOT_FOUND')
    this.name = 'DigestNotFoundError'
    this.digest = digest
  }
}

/** Error thrown when the index points at a file missing from the tree */
export class ArtifactMissingError extends StoreError {
  readonly digest: string
  readonly artifactPath: string

  constructor(digest: string, artifactPath: string) {
    super(
      `Binary file not found: ${artifactPath} (referenced by MD5 ${digest})`,
      'ARTIFACT_MISSING'
    )
    this.name = 'ArtifactMissingError'
    this.digest = digest
    this.artifactPath = artifactPath
  }
}

/** Error thrown on local filesystem failures inside a session or output dir */
export class StoreIoError extends StoreError {
  readonly path: string

  constructor(path: string, message: string) {
    super(`I/O error at "${path}": ${message}`, 'STORE_IO_ERROR')
    this.name = 'StoreIoError'
    this.path = path
  }
}

// ============================================================================
// Remote errors
// ============================================================================

/** Error thrown when the remote cannot be cloned or pushed to */
export class RemoteError extends BitcacheError {
  readonly remoteUrl: string

  constructor(remoteUrl: string, message: string, code = 'REMOTE_ERROR') {
    super(`${message} (remote: ${remoteUrl})`, code)
    this.name = 'RemoteError'
    this.remoteUrl = remoteUrl
  }
}

/** Error thrown when every publish attempt lost the race to another writer */
export class PublishConflictExhaustedError extends RemoteError {
  readonly attempts: number

  constructor(remoteUrl: string, attempts: number) {
    super(
      remoteUrl,
      `Gave up after ${attempts} publish attempts: the remote kept advancing`,
      'PUBLISH_CONFLICT_EXHAUSTED'
    )
    this.name = 'PublishConflictExhaustedError'
    this.attempts = attempts
  }
}

// ============================================================================
// Git errors
// ============================================================================

/** Error thrown during git operations */
export class GitError extends BitcacheError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string

  constructor(command: string, exitCode: number, stderr: string) {
    super(`Git command failed (exit ${exitCode}): ${command}\n${stderr}`, 'GIT_ERROR')
    this.name = 'GitError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isBitcacheError(error: unknown): error is BitcacheError {
  return error instanceof BitcacheError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError
}

export function isRemoteError(error: unknown): error is RemoteError {
  return error instanceof RemoteError
}

export function isGitError(error: unknown): error is GitError {
  return error instanceof GitError
}

/** Extract a message from an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** errno code of a failed fs/child_process call, if any */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined
  }
  return undefined
}
