/**
 * Safe git command execution using argv arrays (no shell interpolation).
 *
 * Arguments go straight to the git process, so repository URLs, paths and
 * commit messages are never interpreted by a shell.
 */

import { spawn } from 'node:child_process'

import { GitError } from '../core/index.js'

/**
 * Result of a git command execution.
 */
export interface GitExecResult {
  /** Exit code from the git process */
  exitCode: number
  /** Standard output from the command */
  stdout: string
  /** Standard error from the command */
  stderr: string
}

/**
 * Options for git command execution.
 */
export interface GitExecOptions {
  /** Working directory for the command (defaults to cwd) */
  cwd?: string | undefined
  /** Environment variables added to the inherited environment */
  env?: Record<string, string> | undefined
  /** Timeout in milliseconds (default: 60000ms = 1 minute) */
  timeout?: number | undefined
  /** If true, don't throw on non-zero exit code */
  ignoreExitCode?: boolean | undefined
}

/**
 * Execute a git command safely using argv array (no shell).
 *
 * Git never prompts for credentials here (GIT_TERMINAL_PROMPT=0): an
 * invocation without usable credentials fails instead of hanging.
 *
 * @throws GitError if the command fails (unless ignoreExitCode is true),
 *   cannot be spawned, or exceeds the timeout
 *
 * @example
 * ```typescript
 * const result = await gitExec(['clone', url, destPath], { timeout: 300000 })
 * const push = await gitExec(['push', 'origin', 'HEAD:refs/heads/main'], { cwd, ignoreExitCode: true })
 * ```
 */
export function gitExec(args: string[], options: GitExecOptions = {}): Promise<GitExecResult> {
  const { cwd, env, timeout = 60000, ignoreExitCode = false } = options
  const command = ['git', ...args]
  const commandText = command.join(' ')

  return new Promise<GitExecResult>((resolve, reject) => {
    const proc = spawn('git', args, {
      cwd,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0', ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    proc.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk))
    proc.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk))

    let settled = false
    const timeoutId = setTimeout(() => {
      if (settled) return
      settled = true
      proc.kill('SIGKILL')
      reject(new GitError(commandText, -1, `Timeout exceeded (${timeout}ms)`))
    }, timeout)

    proc.on('error', (error) => {
      if (settled) return
      settled = true
      clearTimeout(timeoutId)
      reject(new GitError(commandText, -1, error.message))
    })

    proc.on('close', (code, signal) => {
      if (settled) return
      settled = true
      clearTimeout(timeoutId)

      const result: GitExecResult = {
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
      }

      if (code === null) {
        reject(new GitError(commandText, -1, `Terminated by ${signal ?? 'signal'}`))
        return
      }

      if (result.exitCode !== 0 && !ignoreExitCode) {
        reject(new GitError(commandText, result.exitCode, result.stderr || result.stdout))
        return
      }

      resolve(result)
    })
  })
}

/**
 * Execute a git command and return stdout, trimming trailing whitespace.
 *
 * @throws GitError if the command fails
 */
export async function gitExecStdout(args: string[], options: GitExecOptions = {}): Promise<string> {
  const result = await gitExec(args, options)
  return result.stdout.trim()
}

/**
 * Execute a git command and return stdout lines as an array.
 * Empty lines are filtered out.
 *
 * @throws GitError if the command fails
 */
export async function gitExecLines(args: string[], options: GitExecOptions = {}): Promise<string[]> {
  const stdout = await gitExecStdout(args, options)
  if (!stdout) {
    return []
  }
  return stdout.split('\n').filter((line) => line.length > 0)
}
