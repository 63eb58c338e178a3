import { gitExec, gitExecLines, gitExecStdout } from './exec.js'

/**
 * Options shared by the repository helpers.
 */
export interface RepoCommandOptions {
  /** Repository working directory */
  cwd?: string | undefined
  /** Extra environment for the git process (e.g. GIT_SSH_COMMAND) */
  env?: Record<string, string> | undefined
  /** Timeout in milliseconds */
  timeout?: number | undefined
}

/**
 * Outcome of a non-forced push.
 */
export type PushResult =
  | { status: 'pushed' }
  | { status: 'rejected'; stderr: string }
  | { status: 'failed'; exitCode: number; stderr: string }

/**
 * Initialize a new git repository.
 *
 * @example
 * ```typescript
 * await initRepo('/srv/cache.git', { bare: true, initialBranch: 'main' })
 * ```
 */
export async function initRepo(
  path: string,
  options: {
    bare?: boolean | undefined
    initialBranch?: string | undefined
  } = {}
): Promise<void> {
  const args = ['init']

  if (options.bare) {
    args.push('--bare')
  }

  if (options.initialBranch) {
    args.push('-b', options.initialBranch)
  }

  args.push(path)

  await gitExec(args)
}

/**
 * Clone a git repository.
 *
 * Cloning an empty repository succeeds; the clone then has an unborn
 * branch named after the remote's HEAD.
 *
 * @throws GitError if clone fails or times out
 */
export async function cloneRepo(
  url: string,
  destPath: string,
  options: RepoCommandOptions & {
    branch?: string | undefined
    depth?: number | undefined
  } = {}
): Promise<void> {
  const args = ['clone']

  if (options.branch) {
    args.push('-b', options.branch)
  }

  if (options.depth !== undefined) {
    args.push('--depth', String(options.depth))
  }

  args.push(url, destPath)

  await gitExec(args, {
    cwd: options.cwd,
    env: options.env,
    timeout: options.timeout ?? 300000, // 5 minute timeout for clone
  })
}

/**
 * Get the current branch name.
 *
 * @returns Branch name (also for an unborn branch), or null in detached HEAD state
 */
export async function getCurrentBranch(
  options: { cwd?: string | undefined } = {}
): Promise<string | null> {
  const result = await gitExec(['symbolic-ref', '--short', 'HEAD'], {
    ...options,
    ignoreExitCode: true,
  })

  if (result.exitCode !== 0) {
    // Detached HEAD state
    return null
  }

  return result.stdout.trim()
}

/**
 * Get the default branch name of a remote.
 *
 * Looks at the remote-tracking HEAD first, then asks the remote directly
 * (which also works for an empty remote whose branch is still unborn),
 * then falls back to the checked-out branch.
 *
 * @returns Default branch name, or null when none can be determined
 */
export async function getDefaultBranch(
  remote = 'origin',
  options: RepoCommandOptions = {}
): Promise<string | null> {
  const result = await gitExec(['symbolic-ref', `refs/remotes/${remote}/HEAD`], {
    cwd: options.cwd,
    ignoreExitCode: true,
  })

  if (result.exitCode === 0) {
    // refs/remotes/origin/HEAD -> refs/remotes/origin/main
    return result.stdout.trim().replace(`refs/remotes/${remote}/`, '')
  }

  const lsRemote = await gitExec(['ls-remote', '--symref', remote, 'HEAD'], {
    cwd: options.cwd,
    env: options.env,
    timeout: options.timeout,
    ignoreExitCode: true,
  })
  if (lsRemote.exitCode === 0) {
    // ref: refs/heads/main\tHEAD
    const match = lsRemote.stdout.match(/^ref: refs\/heads\/(\S+)\s+HEAD$/m)
    if (match?.[1]) {
      return match[1]
    }
  }

  return getCurrentBranch({ cwd: options.cwd })
}

/**
 * Get the current HEAD commit SHA.
 *
 * @throws GitError if HEAD has no commit yet
 */
export async function getHead(options: { cwd?: string | undefined } = {}): Promise<string> {
  return gitExecStdout(['rev-parse', 'HEAD'], options)
}

/**
 * Read a config value from the repository.
 *
 * @returns The value, or null when unset
 */
export async function getConfig(
  key: string,
  options: { cwd?: string | undefined } = {}
): Promise<string | null> {
  const result = await gitExec(['config', '--get', key], { ...options, ignoreExitCode: true })
  if (result.exitCode !== 0) {
    return null
  }
  const value = result.stdout.trim()
  return value.length > 0 ? value : null
}

/**
 * Set a config value in the repository's local config.
 */
export async function setConfig(
  key: string,
  value: string,
  options: { cwd?: string | undefined } = {}
): Promise<void> {
  await gitExec(['config', key, value], options)
}

/**
 * Stage all changes (new, modified and deleted files).
 */
export async function addAll(options: { cwd?: string | undefined } = {}): Promise<void> {
  await gitExec(['add', '-A'], options)
}

/**
 * Stage specific paths, including ones a .gitignore would skip.
 */
export async function addPathsForced(
  paths: string[],
  options: { cwd?: string | undefined } = {}
): Promise<void> {
  if (paths.length === 0) return
  await gitExec(['add', '--force', '--', ...paths], options)
}

/**
 * List paths with staged or unstaged changes.
 */
export async function listChangedPaths(
  options: { cwd?: string | undefined } = {}
): Promise<string[]> {
  const lines = await gitExecLines(['status', '--porcelain'], options)
  // Each line has format: XY filename
  return lines.filter((line) => line.length > 3).map((line) => line.slice(3))
}

/**
 * Create a new commit with staged changes.
 *
 * @returns Commit SHA of the new commit
 */
export async function commit(
  message: string,
  options: { cwd?: string | undefined; env?: Record<string, string> | undefined } = {}
): Promise<string> {
  await gitExec(['commit', '-m', message], { cwd: options.cwd, env: options.env })

  return getHead({ cwd: options.cwd })
}

const REJECTION_PATTERNS = [
  /\[rejected\]/,
  /\[remote rejected\].*(?:cannot lock ref|failed to lock|incorrect old value|failed to update ref)/,
  /non-fast-forward/,
  /\(fetch first\)/,
  /\(stale info\)/,
  /Updates were rejected because/,
]

/**
 * Whether a push failure means the remote branch moved underneath us.
 */
export function isPushRejection(stderr: string): boolean {
  return REJECTION_PATTERNS.some((pattern) => pattern.test(stderr))
}

/**
 * Push the current HEAD to a remote branch without forcing.
 *
 * A rejection because the remote advanced is reported as a result rather
 * than thrown, so callers can refresh and try again.
 *
 * @throws GitError if git cannot be run or times out
 */
export async function pushHead(
  branch: string,
  options: RepoCommandOptions & { remote?: string | undefined } = {}
): Promise<PushResult> {
  const remote = options.remote ?? 'origin'
  const result = await gitExec(['push', '--porcelain', remote, `HEAD:refs/heads/${branch}`], {
    cwd: options.cwd,
    env: options.env,
    timeout: options.timeout ?? 120000,
    ignoreExitCode: true,
  })

  if (result.exitCode === 0) {
    return { status: 'pushed' }
  }

  // --porcelain reports per-ref status on stdout, hints on stderr
  const output = `${result.stdout}\n${result.stderr}`
  if (isPushRejection(output)) {
    return { status: 'rejected', stderr: result.stderr.trim() }
  }

  return { status: 'failed', exitCode: result.exitCode, stderr: output.trim() }
}
