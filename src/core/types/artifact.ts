/**
 * Artifact record types for bitcache
 *
 * A digest is the MD5 of a source file's bytes, rendered as 32 lowercase
 * hex characters. It keys every record in the metadata index.
 */

import { InvalidDigestError } from '../errors.js'

/** MD5 digest of a source file (32 lowercase hex chars) */
export type Digest = string & { readonly __brand: 'Digest' }

/** One published artifact */
export interface ArtifactRecord {
  /** Digest of the source that produced the artifact */
  digest: Digest
  /** POSIX path of the binary relative to the store root */
  artifactPath: string
  /** Original source filename (display only) */
  sourceName: string
  /** ISO-8601 UTC timestamp of the last write to this record */
  publishedAt: string
}

/**
 * On-disk form of a record inside bitcache_metadata.json.
 * Fields other tools add are kept as they are.
 */
export interface MetadataEntryDocument {
  md5: string
  binary_path: string
  source_file: string
  timestamp: string
  [field: string]: unknown
}

/** On-disk form of bitcache_metadata.json */
export interface MetadataDocument {
  entries: Record<string, MetadataEntryDocument>
  [field: string]: unknown
}

/** Fields of the index document this tool does not interpret */
export type ExtraFields = Record<string, unknown>

// ============================================================================
// Type guards and constructors
// ============================================================================

const DIGEST_PATTERN = /^[0-9a-f]{32}$/

/** Filename of the metadata index at the store root */
export const METADATA_FILENAME = 'bitcache_metadata.json'

export function isDigest(value: string): value is Digest {
  return DIGEST_PATTERN.test(value)
}

/**
 * Normalize and brand a digest string.
 * Returns null when the value is not an MD5 hex digest.
 */
export function parseDigest(value: string): Digest | null {
  const normalized = value.trim().toLowerCase()
  return isDigest(normalized) ? normalized : null
}

/**
 * Brand an already-normalized digest.
 *
 * @throws InvalidDigestError when the value is not 32 lowercase hex chars
 */
export function asDigest(value: string): Digest {
  if (!isDigest(value)) {
    throw new InvalidDigestError(value)
  }
  return value
}
