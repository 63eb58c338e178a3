/**
 * The metadata index: digest -> artifact record.
 *
 * Persisted as bitcache_metadata.json at the store root. Serialization is
 * canonical (entries sorted by digest, fixed field order) so an unchanged
 * index never produces a diff in the store. Fields written by other tools,
 * on the document or on an entry, survive a rewrite.
 */

import {
  type ArtifactRecord,
  type Digest,
  type ExtraFields,
  METADATA_FILENAME,
  type MetadataDocument,
  type MetadataEntryDocument,
  MetadataParseError,
  asDigest,
  errorMessage,
  validateMetadataDocument,
} from '../core/index.js'

/**
 * In-memory index of published artifacts.
 */
export class MetadataIndex {
  private readonly records = new Map<Digest, ArtifactRecord>()
  private readonly entryExtras = new Map<Digest, ExtraFields>()
  private readonly documentExtras: ExtraFields

  /**
   * @param records - Initial records
   * @param extras - Uninterpreted fields of the document and of its entries
   */
  constructor(
    records: Iterable<ArtifactRecord> = [],
    extras: {
      document?: ExtraFields | undefined
      entries?: ReadonlyMap<Digest, ExtraFields> | undefined
    } = {}
  ) {
    for (const record of records) {
      this.records.set(record.digest, { ...record })
    }
    for (const [digest, fields] of extras.entries ?? []) {
      if (Object.keys(fields).length > 0) {
        this.entryExtras.set(digest, { ...fields })
      }
    }
    this.documentExtras = { ...extras.document }
  }

  /** Number of records */
  get size(): number {
    return this.records.size
  }

  /**
   * Find the record for a digest.
   */
  lookup(digest: Digest): ArtifactRecord | undefined {
    const record = this.records.get(digest)
    return record ? { ...record } : undefined
  }

  /**
   * Insert or replace the record for a digest.
   *
   * The stored timestamp never moves backwards: if the existing record is
   * newer than the incoming one, its timestamp is kept. Applying the same
   * upsert twice leaves the index as applying it once.
   *
   * @returns The record as stored
   */
  upsert(digest: Digest, record: Omit<ArtifactRecord, 'digest'>): ArtifactRecord {
    const existing = this.records.get(digest)
    const stored: ArtifactRecord = {
      digest,
      artifactPath: record.artifactPath,
      sourceName: record.sourceName,
      publishedAt:
        existing && isLater(existing.publishedAt, record.publishedAt)
          ? existing.publishedAt
          : record.publishedAt,
    }
    this.records.set(digest, stored)
    return { ...stored }
  }

  /**
   * All records, sorted by digest.
   */
  entries(): ArtifactRecord[] {
    return [...this.records.values()]
      .sort((a, b) => (a.digest < b.digest ? -1 : a.digest > b.digest ? 1 : 0))
      .map((record) => ({ ...record }))
  }

  /**
   * On-disk document form.
   * Extra fields follow the known ones, sorted by name.
   */
  toDocument(): MetadataDocument {
    const entries: Record<string, MetadataEntryDocument> = {}
    for (const record of this.entries()) {
      entries[record.digest] = {
        md5: record.digest,
        binary_path: record.artifactPath,
        source_file: record.sourceName,
        timestamp: record.publishedAt,
        ...sortedFields(this.entryExtras.get(record.digest) ?? {}),
      }
    }
    return { entries, ...sortedFields(this.documentExtras) }
  }
}

function sortedFields(fields: ExtraFields): ExtraFields {
  return Object.fromEntries(
    Object.entries(fields).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  )
}

function isLater(a: string, b: string): boolean {
  const left = Date.parse(a)
  const right = Date.parse(b)
  return !Number.isNaN(left) && !Number.isNaN(right) && left > right
}

/**
 * Parse the metadata document.
 *
 * Absent or blank input is an empty index. Anything else that is not a
 * valid document is a corrupt store, never silently treated as empty.
 *
 * @param text - Raw file content, or null when the file does not exist
 * @param source - Name used in error messages
 * @throws MetadataParseError on invalid JSON, schema violations, or an
 *   entry whose md5 differs from its key
 */
export function loadMetadataIndex(
  text: string | null | undefined,
  source: string = METADATA_FILENAME
): MetadataIndex {
  if (text === null || text === undefined || text.trim() === '') {
    return new MetadataIndex()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw new MetadataParseError(`Invalid JSON: ${errorMessage(err)}`, source)
  }

  const result = validateMetadataDocument(parsed)
  if (!result.valid) {
    const details = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')
    throw new MetadataParseError(details, source)
  }

  const { entries, ...documentExtras } = result.data
  const records: ArtifactRecord[] = []
  const entryExtras = new Map<Digest, ExtraFields>()
  for (const [key, entry] of Object.entries(entries)) {
    const { md5, binary_path, source_file, timestamp, ...fields } = entry
    if (md5 !== key) {
      throw new MetadataParseError(`entry "${key}" has mismatched md5 "${md5}"`, source)
    }
    const digest = asDigest(key)
    records.push({
      digest,
      artifactPath: binary_path,
      sourceName: source_file,
      publishedAt: timestamp,
    })
    entryExtras.set(digest, fields)
  }

  return new MetadataIndex(records, { document: documentExtras, entries: entryExtras })
}

/**
 * Canonical serialization: same logical content, same bytes.
 */
export function serializeMetadataIndex(index: MetadataIndex): string {
  return `${JSON.stringify(index.toDocument(), null, 2)}\n`
}
