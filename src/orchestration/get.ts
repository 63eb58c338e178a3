/**
 * Get orchestration: fetch the binary stored for a source digest.
 */

import { posix, resolve } from 'node:path'

import {
  ArtifactMissingError,
  type ArtifactRecord,
  DigestNotFoundError,
  InvalidDigestError,
  StoreIoError,
  atomicWrite,
  errorMessage,
  parseDigest,
} from '../core/index.js'
import { GitRepositoryBackend, type RepositoryBackend, withSession } from '../store/index.js'

export type GetState = 'acquiring' | 'reading' | 'writing' | 'done'

export interface GetOptions {
  /** Remote holding the store */
  remoteUrl: string
  /** Source digest; case and surrounding whitespace are ignored */
  digest: string
  /** Directory to save the binary in (default: cwd) */
  outputDir?: string | undefined
  sshKey?: string | undefined
  /** Session backend (default: git) */
  backend?: RepositoryBackend | undefined
  onProgress?: ((state: GetState) => void) | undefined
}

export interface GetResult {
  record: ArtifactRecord
  /** Where the binary was written */
  outputPath: string
  /** Size of the binary */
  bytes: number
}

/**
 * Look up a digest and save its binary under the binary's own name.
 *
 * The output directory is only written once the binary has been read in
 * full, so every failure leaves it as it was.
 *
 * @throws InvalidDigestError if the digest is not 32 hex characters
 * @throws DigestNotFoundError if the index has no such digest
 * @throws ArtifactMissingError if the index points at a missing file
 * @throws RemoteError if the remote cannot be cloned
 * @throws StoreIoError if the output cannot be written
 */
export async function getArtifact(options: GetOptions): Promise<GetResult> {
  const digest = parseDigest(options.digest)
  if (!digest) {
    throw new InvalidDigestError(options.digest)
  }
  const backend = options.backend ?? new GitRepositoryBackend()
  const report = options.onProgress ?? (() => {})

  report('acquiring')
  const { record, content } = await withSession(
    backend,
    options.remoteUrl,
    { sshKey: options.sshKey },
    async (session) => {
      report('reading')
      const index = await session.readMetadata()
      const found = index.lookup(digest)
      if (!found) {
        throw new DigestNotFoundError(digest)
      }
      const data = await session.readArtifact(found.artifactPath)
      if (!data) {
        throw new ArtifactMissingError(digest, found.artifactPath)
      }
      return { record: found, content: data }
    }
  )

  report('writing')
  const outputPath = resolve(options.outputDir ?? process.cwd(), posix.basename(record.artifactPath))
  try {
    await atomicWrite(outputPath, content, { mkdirs: false })
  } catch (err) {
    throw new StoreIoError(outputPath, errorMessage(err))
  }

  report('done')
  return { record, outputPath, bytes: content.length }
}
