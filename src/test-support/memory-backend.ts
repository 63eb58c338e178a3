/**
 * In-process stand-in for a git remote.
 *
 * Sessions work on real temporary directories through WorkingCopySession,
 * so the filesystem half is the production code. Only publish() differs:
 * it compares the session's base revision with the remote's current one
 * instead of pushing.
 */

import { mkdir, mkdtemp, readFile, readdir, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'

import { RemoteError } from '../core/index.js'
import {
  type PublishOutcome,
  type RepositoryBackend,
  type SessionAuth,
  WorkingCopySession,
} from '../store/session.js'

type Snapshot = Map<string, Buffer>

/**
 * A remote: a list of file snapshots, one per revision.
 */
export class MemoryRemote {
  private snapshots: Snapshot[] = [new Map()]
  readonly messages: string[] = []

  /** Number of commits on the default branch */
  get revision(): number {
    return this.snapshots.length - 1
  }

  /** Files at the current revision */
  files(): Snapshot {
    return new Map(this.current())
  }

  /** Current content of one file, as text */
  readText(path: string): string | undefined {
    return this.current().get(path)?.toString('utf8')
  }

  /**
   * Commit files directly, as another writer would.
   */
  write(files: Record<string, string | Uint8Array>, message = 'External write'): void {
    const next = new Map(this.current())
    for (const [path, content] of Object.entries(files)) {
      next.set(path, Buffer.from(content))
    }
    this.commit(next, message)
  }

  /** @internal */
  commit(snapshot: Snapshot, message: string): number {
    this.snapshots.push(new Map(snapshot))
    this.messages.push(message)
    return this.revision
  }

  /** @internal */
  snapshotAt(revision: number): Snapshot {
    return this.snapshots[revision] ?? new Map()
  }

  private current(): Snapshot {
    return this.snapshotAt(this.revision)
  }
}

/** Hook run before each publish, with the 1-based publish number */
export type BeforePublishHook = (remote: MemoryRemote, publishNumber: number) => void

/**
 * Backend serving MemoryRemotes registered by URL.
 */
export class MemoryBackend implements RepositoryBackend {
  private readonly remotes = new Map<string, MemoryRemote>()
  private publishCount = 0

  /** Every session handed out, in order */
  readonly sessions: MemorySession[] = []
  /** Credentials passed to each acquire */
  readonly auths: SessionAuth[] = []
  /** Thrown by the next acquire calls while set */
  failAcquire: Error | null = null
  /** Runs before every publish; a write here makes that publish conflict */
  beforePublish: BeforePublishHook | null = null

  constructor(private readonly tmpRoot: string = tmpdir()) {}

  /** Register a remote under a URL */
  createRemote(url: string): MemoryRemote {
    const remote = new MemoryRemote()
    this.remotes.set(url, remote)
    return remote
  }

  /**
   * Make the next `count` publishes conflict by committing an unrelated
   * file to the remote just before each of them.
   */
  conflictNext(count: number): void {
    let remaining = count
    this.beforePublish = (remote, publishNumber) => {
      if (remaining <= 0) return
      remaining -= 1
      remote.write({ [`other/writer-${publishNumber}.txt`]: `write ${publishNumber}\n` })
    }
  }

  async acquire(remoteUrl: string, auth: SessionAuth = {}): Promise<MemorySession> {
    this.auths.push(auth)
    if (this.failAcquire) {
      throw this.failAcquire
    }
    const remote = this.remotes.get(remoteUrl)
    if (!remote) {
      throw new RemoteError(remoteUrl, 'Failed to clone repository: repository not found')
    }

    const tempDir = await mkdtemp(join(this.tmpRoot, 'bitcache-'))
    const root = join(tempDir, 'repo')
    await mkdir(root)
    const base = remote.revision
    for (const [path, content] of remote.snapshotAt(base)) {
      const fullPath = join(root, path)
      await mkdir(dirname(fullPath), { recursive: true })
      await writeFile(fullPath, content)
    }

    const session = new MemorySession(remoteUrl, root, tempDir, remote, base, () => {
      this.publishCount += 1
      this.beforePublish?.(remote, this.publishCount)
    })
    this.sessions.push(session)
    return session
  }
}

async function readTree(root: string, prefix = ''): Promise<Snapshot> {
  const files: Snapshot = new Map()
  const entries = await readdir(join(root, prefix), { withFileTypes: true })
  for (const entry of entries) {
    const path = prefix === '' ? entry.name : `${prefix}/${entry.name}`
    if (entry.isDirectory()) {
      for (const [nested, content] of await readTree(root, path)) {
        files.set(nested, content)
      }
    } else if (entry.isFile()) {
      files.set(path, await readFile(join(root, path)))
    }
  }
  return files
}

function sameSnapshot(a: Snapshot, b: Snapshot): boolean {
  if (a.size !== b.size) return false
  for (const [path, content] of a) {
    const other = b.get(path)
    if (!other || !other.equals(content)) return false
  }
  return true
}

/**
 * Session over a MemoryRemote.
 */
export class MemorySession extends WorkingCopySession {
  /** Messages passed to publish(), including conflicting ones */
  readonly publishMessages: string[] = []

  constructor(
    remoteUrl: string,
    root: string,
    tempDir: string,
    private readonly remote: MemoryRemote,
    /** Remote revision the working copy was taken from */
    readonly baseRevision: number,
    private readonly onPublish: () => void
  ) {
    super(remoteUrl, root, tempDir)
  }

  async publish(message: string): Promise<PublishOutcome> {
    this.publishMessages.push(message)
    this.onPublish()

    const tree = await readTree(this.root)
    if (sameSnapshot(tree, this.remote.snapshotAt(this.baseRevision))) {
      return { status: 'unchanged' }
    }
    if (this.remote.revision !== this.baseRevision) {
      return { status: 'conflict' }
    }
    const revision = this.remote.commit(tree, message)
    return { status: 'published', commit: `rev-${revision}` }
  }
}
