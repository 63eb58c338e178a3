/**
 * Repository sessions: one ephemeral working copy of the store per operation.
 *
 * Workflows only see the RepositorySession interface; how a working copy
 * is obtained and published (git, or an in-process stand-in in tests)
 * lives behind a RepositoryBackend.
 */

import { readFile, rm } from 'node:fs/promises'
import { join } from 'node:path'

import {
  METADATA_FILENAME,
  StoreIoError,
  atomicWrite,
  errnoCode,
  errorMessage,
} from '../core/index.js'
import { type MetadataIndex, loadMetadataIndex, serializeMetadataIndex } from './metadata-index.js'
import { normalizeStorePath, resolveInStore } from './paths.js'

/**
 * Transport credentials, passed through untouched.
 */
export interface SessionAuth {
  /** Path of an SSH private key for the transport */
  sshKey?: string | undefined
}

/**
 * Result of publishing a session's changes.
 * A conflict means the remote advanced since the session was acquired.
 */
export type PublishOutcome =
  | { status: 'published'; commit: string }
  | { status: 'unchanged' }
  | { status: 'conflict' }

/**
 * One working copy of the store, owned by a single operation.
 */
export interface RepositorySession {
  readonly remoteUrl: string
  /** Root of the working copy */
  readonly root: string
  /** Load the index; an absent document is an empty index */
  readMetadata(): Promise<MetadataIndex>
  /** Write the index back in canonical form */
  writeMetadata(index: MetadataIndex): Promise<void>
  /** Materialize a binary, creating directories and replacing any existing file */
  writeArtifact(storePath: string, bytes: Uint8Array): Promise<void>
  /** Read a binary; null when the working copy has no such file */
  readArtifact(storePath: string): Promise<Buffer | null>
  /** Commit everything and try to advance the remote */
  publish(message: string): Promise<PublishOutcome>
  /** Remove the working copy. Idempotent. */
  release(): Promise<void>
}

/**
 * Source of fresh sessions.
 */
export interface RepositoryBackend {
  /**
   * Obtain a fresh working copy of the remote's default branch.
   *
   * @throws RemoteError when the remote cannot be reached or read
   */
  acquire(remoteUrl: string, auth?: SessionAuth): Promise<RepositorySession>
}

function isMissingFile(err: unknown): boolean {
  const code = errnoCode(err)
  return code === 'ENOENT' || code === 'EISDIR' || code === 'ENOTDIR'
}

/**
 * Filesystem half of a session: reading and writing the working copy.
 * Subclasses supply publish().
 */
export abstract class WorkingCopySession implements RepositorySession {
  private released = false
  private readonly written = new Set<string>()

  /**
   * @param remoteUrl - Remote the working copy came from
   * @param root - Working copy root
   * @param ownedDir - Directory removed on release (contains root)
   */
  constructor(
    readonly remoteUrl: string,
    readonly root: string,
    private readonly ownedDir: string
  ) {}

  /** Whether release() has run */
  get isReleased(): boolean {
    return this.released
  }

  /** Store paths written through this session, sorted */
  protected writtenPaths(): string[] {
    return [...this.written].sort()
  }

  async readMetadata(): Promise<MetadataIndex> {
    const metadataPath = join(this.root, METADATA_FILENAME)
    let text: string | null
    try {
      text = await readFile(metadataPath, 'utf8')
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        throw new StoreIoError(metadataPath, errorMessage(err))
      }
      text = null
    }
    return loadMetadataIndex(text, METADATA_FILENAME)
  }

  async writeMetadata(index: MetadataIndex): Promise<void> {
    const metadataPath = join(this.root, METADATA_FILENAME)
    try {
      await atomicWrite(metadataPath, serializeMetadataIndex(index), { fsync: false })
    } catch (err) {
      throw new StoreIoError(metadataPath, errorMessage(err))
    }
    this.written.add(METADATA_FILENAME)
  }

  async writeArtifact(storePath: string, bytes: Uint8Array): Promise<void> {
    const fullPath = resolveInStore(this.root, storePath)
    try {
      await atomicWrite(fullPath, bytes, { fsync: false })
    } catch (err) {
      throw new StoreIoError(fullPath, errorMessage(err))
    }
    this.written.add(normalizeStorePath(storePath))
  }

  async readArtifact(storePath: string): Promise<Buffer | null> {
    const fullPath = resolveInStore(this.root, storePath)
    try {
      return await readFile(fullPath)
    } catch (err) {
      if (isMissingFile(err)) {
        return null
      }
      throw new StoreIoError(fullPath, errorMessage(err))
    }
  }

  abstract publish(message: string): Promise<PublishOutcome>

  async release(): Promise<void> {
    if (this.released) {
      return
    }
    this.released = true
    await rm(this.ownedDir, { recursive: true, force: true })
  }
}

/**
 * Run fn against a fresh session and release it on every exit path.
 */
export async function withSession<T>(
  backend: RepositoryBackend,
  remoteUrl: string,
  auth: SessionAuth,
  fn: (session: RepositorySession) => Promise<T>
): Promise<T> {
  const session = await backend.acquire(remoteUrl, auth)
  try {
    return await fn(session)
  } finally {
    await session.release()
  }
}
