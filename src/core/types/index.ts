export {
  type ArtifactRecord,
  type Digest,
  type ExtraFields,
  type MetadataDocument,
  type MetadataEntryDocument,
  METADATA_FILENAME,
  asDigest,
  isDigest,
  parseDigest,
} from './artifact.js'

export type {
  BitcacheSettings,
  BitcacheTomlDocument,
  GitSettings,
  RetrySettings,
  RetryStrategy,
} from './settings.js'
