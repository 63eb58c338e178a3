/**
 * The store: digests, the metadata index, and sessions on the remote.
 */

export { hashBytes, hashFile } from './hasher.js'
export { MetadataIndex, loadMetadataIndex, serializeMetadataIndex } from './metadata-index.js'
export {
  SESSION_DIR_PREFIX,
  WORKING_COPY_DIRNAME,
  artifactPathFor,
  normalizeStorePath,
  resolveInStore,
} from './paths.js'
export {
  WorkingCopySession,
  withSession,
  type PublishOutcome,
  type RepositoryBackend,
  type RepositorySession,
  type SessionAuth,
} from './session.js'
export {
  GitRepositoryBackend,
  GitRepositorySession,
  gitTransportEnv,
  type GitRepositoryBackendOptions,
} from './git-session.js'
