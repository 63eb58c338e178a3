/**
 * Git-backed sessions.
 *
 * acquire() clones the remote into a fresh temporary directory; publish()
 * stages everything, forcing the files the session wrote past ignore rules,
 * then commits and pushes HEAD to the default branch without force. A push
 * refused because the branch moved is a conflict, which the publish
 * workflow answers with a fresh clone.
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import {
  DEFAULT_SETTINGS,
  type GitSettings,
  GitError,
  RemoteError,
  StoreIoError,
  errorMessage,
} from '../core/index.js'
import {
  addAll,
  addPathsForced,
  cloneRepo,
  commit,
  getConfig,
  getDefaultBranch,
  listChangedPaths,
  pushHead,
  setConfig,
} from '../git/index.js'
import { SESSION_DIR_PREFIX, WORKING_COPY_DIRNAME } from './paths.js'
import {
  type PublishOutcome,
  type RepositoryBackend,
  type SessionAuth,
  WorkingCopySession,
} from './session.js'

function shellQuote(value: string): string {
  if (/^[a-zA-Z0-9_./-]+$/.test(value)) return value
  return `'${value.replace(/'/g, "'\\''")}'`
}

/**
 * Environment handed to every git process of a session.
 * The key path is passed to ssh as-is; its contents are never read here.
 */
export function gitTransportEnv(auth: SessionAuth = {}): Record<string, string> {
  if (!auth.sshKey) {
    return {}
  }
  return { GIT_SSH_COMMAND: `ssh -i ${shellQuote(auth.sshKey)} -o IdentitiesOnly=yes` }
}

/** Last meaningful line of git's output, for user-facing messages */
function describeGitFailure(err: unknown): string {
  if (err instanceof GitError) {
    const lines = err.stderr
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('hint:'))
    return lines.at(-1) ?? `exit ${err.exitCode}`
  }
  return errorMessage(err)
}

export interface GitRepositoryBackendOptions {
  /** Clone/push timeouts and fallback commit identity */
  git?: Partial<GitSettings> | undefined
  /** Parent of session directories (default: os.tmpdir()) */
  tmpRoot?: string | undefined
}

/**
 * Backend that clones the remote fresh for every session.
 */
export class GitRepositoryBackend implements RepositoryBackend {
  private readonly git: GitSettings
  private readonly tmpRoot: string

  constructor(options: GitRepositoryBackendOptions = {}) {
    this.git = { ...DEFAULT_SETTINGS.git, ...options.git }
    this.tmpRoot = options.tmpRoot ?? tmpdir()
  }

  async acquire(remoteUrl: string, auth: SessionAuth = {}): Promise<GitRepositorySession> {
    let tempDir: string
    try {
      tempDir = await mkdtemp(join(this.tmpRoot, SESSION_DIR_PREFIX))
    } catch (err) {
      throw new StoreIoError(this.tmpRoot, errorMessage(err))
    }

    const workdir = join(tempDir, WORKING_COPY_DIRNAME)
    const env = gitTransportEnv(auth)

    try {
      await cloneRepo(remoteUrl, workdir, { env, timeout: this.git.cloneTimeoutMs })
    } catch (err) {
      await rm(tempDir, { recursive: true, force: true })
      throw new RemoteError(remoteUrl, `Failed to clone repository: ${describeGitFailure(err)}`)
    }

    try {
      const branch = await getDefaultBranch('origin', {
        cwd: workdir,
        env,
        timeout: this.git.cloneTimeoutMs,
      })
      if (!branch) {
        throw new RemoteError(remoteUrl, 'Remote has no default branch to publish to')
      }
      await this.ensureIdentity(workdir)

      return new GitRepositorySession({
        remoteUrl,
        tempDir,
        workdir,
        branch,
        env,
        pushTimeoutMs: this.git.pushTimeoutMs,
      })
    } catch (err) {
      await rm(tempDir, { recursive: true, force: true })
      if (err instanceof RemoteError) throw err
      throw new StoreIoError(workdir, describeGitFailure(err))
    }
  }

  /**
   * Commits need an author; fall back to the configured identity when the
   * user has none. Only the temporary clone's config is touched.
   */
  private async ensureIdentity(workdir: string): Promise<void> {
    if ((await getConfig('user.name', { cwd: workdir })) === null) {
      await setConfig('user.name', this.git.userName, { cwd: workdir })
    }
    if ((await getConfig('user.email', { cwd: workdir })) === null) {
      await setConfig('user.email', this.git.userEmail, { cwd: workdir })
    }
  }
}

interface GitRepositorySessionInit {
  remoteUrl: string
  tempDir: string
  workdir: string
  branch: string
  env: Record<string, string>
  pushTimeoutMs: number
}

/**
 * A cloned working copy of the store.
 */
export class GitRepositorySession extends WorkingCopySession {
  /** Default branch the session publishes to */
  readonly branch: string
  private readonly env: Record<string, string>
  private readonly pushTimeoutMs: number

  constructor(init: GitRepositorySessionInit) {
    super(init.remoteUrl, init.workdir, init.tempDir)
    this.branch = init.branch
    this.env = init.env
    this.pushTimeoutMs = init.pushTimeoutMs
  }

  async publish(message: string): Promise<PublishOutcome> {
    let sha: string
    try {
      await addAll({ cwd: this.root })
      // Ignore rules in the store must not drop what this session wrote
      await addPathsForced(this.writtenPaths(), { cwd: this.root })
      const changed = await listChangedPaths({ cwd: this.root })
      if (changed.length === 0) {
        return { status: 'unchanged' }
      }
      sha = await commit(message, { cwd: this.root })
    } catch (err) {
      throw new StoreIoError(this.root, `Failed to commit: ${describeGitFailure(err)}`)
    }

    let result: Awaited<ReturnType<typeof pushHead>>
    try {
      result = await pushHead(this.branch, {
        cwd: this.root,
        env: this.env,
        timeout: this.pushTimeoutMs,
      })
    } catch (err) {
      throw new RemoteError(this.remoteUrl, `Failed to push: ${describeGitFailure(err)}`)
    }

    switch (result.status) {
      case 'pushed':
        return { status: 'published', commit: sha }
      case 'rejected':
        return { status: 'conflict' }
      case 'failed':
        throw new RemoteError(
          this.remoteUrl,
          `Failed to push: ${describeGitFailure(new GitError('git push', result.exitCode, result.stderr))}`
        )
    }
  }
}
