/**
 * Publish orchestration.
 *
 * WHY: Several machines publish into the same remote with no lock and no
 * server. Each attempt works on a fresh clone and pushes without force;
 * when another writer got there first the push is refused, and the attempt
 * is replayed on top of the new remote state. Nothing already on the
 * remote is ever overwritten except the record for the same digest.
 */

import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'

import {
  type ArtifactRecord,
  type Digest,
  PublishConflictExhaustedError,
  type RetrySettings,
  SourceUnreadableError,
  errorMessage,
} from '../core/index.js'
import {
  GitRepositoryBackend,
  type PublishOutcome,
  type RepositoryBackend,
  artifactPathFor,
  hashFile,
  withSession,
} from '../store/index.js'
import { type Sleep, backoffDelay, retryPolicy, sleep as defaultSleep } from './retry.js'

/** Stages of a publish; `publishing` returns to `acquiring` on conflict */
export type PublishState = 'hashing' | 'acquiring' | 'writing' | 'committing' | 'publishing' | 'done'

export type PublishProgress =
  | { type: 'state'; state: PublishState; attempt: number }
  | { type: 'conflict'; attempt: number; delayMs: number }

/**
 * Options for publishArtifact.
 */
export interface PublishOptions {
  /** Remote holding the store */
  remoteUrl: string
  /** Source file whose digest keys the artifact */
  sourcePath: string
  /** Binary to store */
  binaryPath: string
  /** Directory inside the store for the binary */
  targetPath: string
  /** SSH key handed to the git transport */
  sshKey?: string | undefined
  /** Conflict retry policy (defaults fill the gaps) */
  retry?: Partial<RetrySettings> | undefined
  /** Session backend (default: git) */
  backend?: RepositoryBackend | undefined
  /** Clock for publishedAt */
  now?: (() => Date) | undefined
  sleep?: Sleep | undefined
  onProgress?: ((event: PublishProgress) => void) | undefined
}

export interface PublishResult {
  digest: Digest
  /** Record as stored in the index */
  record: ArtifactRecord
  /** Attempts made, including the successful one */
  attempts: number
  /** Commit that landed on the remote; absent when nothing changed */
  commit?: string | undefined
  /** True when the store already held exactly this content */
  unchanged: boolean
}

/** Commit message for a publish */
export function publishCommitMessage(digest: Digest): string {
  return `Add bitstream for source MD5: ${digest}`
}

async function readBinary(binaryPath: string): Promise<Buffer> {
  try {
    return await readFile(binaryPath)
  } catch (err) {
    throw new SourceUnreadableError(binaryPath, errorMessage(err))
  }
}

/**
 * Publish a binary under the digest of its source file.
 *
 * @throws SourceUnreadableError if the source or binary cannot be read
 * @throws InvalidTargetPathError if the target path leaves the store
 * @throws RemoteError if the remote cannot be cloned or pushed to
 * @throws MetadataParseError if the remote's index is corrupt
 * @throws PublishConflictExhaustedError when every retry hits a conflict
 */
export async function publishArtifact(options: PublishOptions): Promise<PublishResult> {
  const policy = retryPolicy(options.retry)
  const backend = options.backend ?? new GitRepositoryBackend()
  const now = options.now ?? (() => new Date())
  const wait = options.sleep ?? defaultSleep
  const report = options.onProgress ?? (() => {})
  const auth = { sshKey: options.sshKey }

  report({ type: 'state', state: 'hashing', attempt: 1 })
  const digest = await hashFile(options.sourcePath)
  const bytes = await readBinary(options.binaryPath)
  const artifactPath = artifactPathFor(options.targetPath, basename(options.binaryPath))
  const sourceName = basename(options.sourcePath) || 'unknown'
  const message = publishCommitMessage(digest)

  for (let attempt = 1; ; attempt++) {
    report({ type: 'state', state: 'acquiring', attempt })
    const { outcome, record } = await withSession(
      backend,
      options.remoteUrl,
      auth,
      async (session): Promise<{ outcome: PublishOutcome; record: ArtifactRecord }> => {
        report({ type: 'state', state: 'writing', attempt })
        const index = await session.readMetadata()
        await session.writeArtifact(artifactPath, bytes)
        const stored = index.upsert(digest, {
          artifactPath,
          sourceName,
          publishedAt: now().toISOString(),
        })

        report({ type: 'state', state: 'committing', attempt })
        await session.writeMetadata(index)

        report({ type: 'state', state: 'publishing', attempt })
        return { outcome: await session.publish(message), record: stored }
      }
    )

    if (outcome.status === 'conflict') {
      if (attempt > policy.maxRetries) {
        throw new PublishConflictExhaustedError(options.remoteUrl, attempt)
      }
      const delayMs = backoffDelay(policy, attempt)
      report({ type: 'conflict', attempt, delayMs })
      await wait(delayMs)
      continue
    }

    report({ type: 'state', state: 'done', attempt })
    if (outcome.status === 'unchanged') {
      return { digest, record, attempts: attempt, unchanged: true }
    }
    return { digest, record, attempts: attempt, commit: outcome.commit, unchanged: false }
  }
}
