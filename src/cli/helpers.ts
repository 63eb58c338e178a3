/**
 * Shared CLI helper utilities: settings, backend wiring, error output.
 */

import { resolve } from 'node:path'

import chalk from 'chalk'

import {
  type BitcacheSettings,
  ConfigValidationError,
  DigestNotFoundError,
  PublishConflictExhaustedError,
  RemoteError,
  type SettingsOverrides,
  isBitcacheError,
  loadSettings,
} from '../core/index.js'
import { GitRepositoryBackend, type RepositoryBackend } from '../store/index.js'

/**
 * What commands need from the outside world; tests swap these.
 */
export interface CliContext {
  /** Build the session backend for resolved settings */
  createBackend: (settings: BitcacheSettings) => RepositoryBackend
  env: NodeJS.ProcessEnv
  cwd: () => string
}

export const defaultCliContext: CliContext = {
  createBackend: (settings) => new GitRepositoryBackend({ git: settings.git }),
  env: process.env,
  cwd: () => process.cwd(),
}

/**
 * Resolve settings for a command from --config, the environment and flags.
 */
export function resolveCommandSettings(
  context: CliContext,
  configPath: string | undefined,
  overrides: SettingsOverrides
): Promise<BitcacheSettings> {
  const cwd = context.cwd()
  return loadSettings({
    configPath: configPath === undefined ? undefined : resolve(cwd, configPath),
    cwd,
    env: context.env,
    overrides,
  })
}

/**
 * Hint shown under an error where the user can do something about it.
 */
function hintFor(error: unknown): string | undefined {
  if (error instanceof PublishConflictExhaustedError) {
    return 'Other publishes kept landing first; try again or raise --max-retries'
  }
  if (error instanceof DigestNotFoundError) {
    return 'Check the MD5 of the source file, or publish it first'
  }
  if (error instanceof RemoteError) {
    return 'Check the repository URL and that your SSH key has access'
  }
  return undefined
}

/**
 * Format error for display.
 */
export function formatError(error: unknown): string {
  if (isBitcacheError(error)) {
    const lines: string[] = [chalk.red(`Error: ${error.message}`)]
    if (error.cause instanceof Error) {
      lines.push(chalk.gray(`  Cause: ${error.cause.message}`))
    }
    if (error instanceof ConfigValidationError) {
      lines.push(chalk.gray(`  Source: ${error.source}`))
    }
    const hint = hintFor(error)
    if (hint) {
      lines.push(chalk.gray(`  ${hint}`))
    }
    return lines.join('\n')
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`)
  }

  return chalk.red(`Error: ${String(error)}`)
}

/**
 * Handle CLI errors with consistent formatting.
 * Prints error message and exits with code 1.
 */
export function handleCliError(error: unknown): never {
  console.error(formatError(error))
  process.exit(1)
}
