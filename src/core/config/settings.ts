/**
 * Settings loader (bitcache.toml + environment + CLI overrides)
 *
 * Precedence, lowest first: built-in defaults, bitcache.toml, BITCACHE_*
 * environment variables, explicit overrides from the command line.
 */

import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import TOML from '@iarna/toml'

import { ConfigParseError, ConfigValidationError, errnoCode, errorMessage } from '../errors.js'
import { validateConfigDocument } from '../schemas/index.js'
import type {
  BitcacheSettings,
  BitcacheTomlDocument,
  RetryStrategy,
} from '../types/settings.js'

/** Default filename looked up in the working directory */
export const CONFIG_FILENAME = 'bitcache.toml'

export const DEFAULT_SETTINGS: BitcacheSettings = {
  retry: {
    maxRetries: 4,
    strategy: 'exponential',
    baseDelayMs: 250,
    maxDelayMs: 5000,
  },
  git: {
    cloneTimeoutMs: 300000, // 5 minutes, same as a plain clone
    pushTimeoutMs: 120000,
    userName: 'bitcache',
    userEmail: 'bitcache@localhost',
  },
}

/** Values coming from command line flags */
export interface SettingsOverrides {
  sshKey?: string | undefined
  maxRetries?: number | undefined
}

export interface LoadSettingsOptions {
  /** Explicit config file; must exist when given */
  configPath?: string | undefined
  /** Directory searched for bitcache.toml (default: process.cwd()) */
  cwd?: string | undefined
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv | undefined
  overrides?: SettingsOverrides | undefined
}

/**
 * Parse bitcache.toml content into a validated document
 *
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseConfigToml(content: string, source = CONFIG_FILENAME): BitcacheTomlDocument {
  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    throw new ConfigParseError(`Failed to parse TOML: ${errorMessage(err)}`, source)
  }

  const result = validateConfigDocument(parsed)
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${CONFIG_FILENAME}`, source, result.errors)
  }

  return result.data
}

/**
 * Read a config file from disk.
 * A missing file is only an error when the caller named it explicitly.
 */
export async function readConfigFile(
  filePath: string,
  options: { required?: boolean } = {}
): Promise<BitcacheTomlDocument | null> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if (errnoCode(err) === 'ENOENT' && !options.required) {
      return null
    }
    if (errnoCode(err) === 'ENOENT') {
      throw new ConfigParseError('File not found', filePath)
    }
    throw new ConfigParseError(`Failed to read file: ${errorMessage(err)}`, filePath)
  }
  return parseConfigToml(content, filePath)
}

function expandHome(value: string): string {
  if (value === '~') return homedir()
  if (value.startsWith('~/')) return join(homedir(), value.slice(2))
  return value
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, name: string, min: number): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigParseError(`expected an integer >= ${min}, got "${raw}"`, name)
  }
  return value
}

function parseStrategyEnv(env: NodeJS.ProcessEnv): RetryStrategy | undefined {
  const raw = env['BITCACHE_RETRY_STRATEGY']
  if (raw === undefined || raw.trim() === '') return undefined
  if (raw === 'fixed' || raw === 'exponential') return raw
  throw new ConfigParseError(
    `expected "fixed" or "exponential", got "${raw}"`,
    'BITCACHE_RETRY_STRATEGY'
  )
}

/**
 * Merge a config document, environment and overrides onto the defaults.
 */
export function resolveSettings(
  document: BitcacheTomlDocument | null,
  env: NodeJS.ProcessEnv = {},
  overrides: SettingsOverrides = {}
): BitcacheSettings {
  const retry = { ...DEFAULT_SETTINGS.retry }
  const git = { ...DEFAULT_SETTINGS.git }
  let sshKey: string | undefined

  // bitcache.toml
  if (document) {
    sshKey = document.ssh_key
    retry.maxRetries = document.retry?.max_retries ?? retry.maxRetries
    retry.strategy = document.retry?.strategy ?? retry.strategy
    retry.baseDelayMs = document.retry?.base_delay_ms ?? retry.baseDelayMs
    retry.maxDelayMs = document.retry?.max_delay_ms ?? retry.maxDelayMs
    git.cloneTimeoutMs = document.git?.clone_timeout_ms ?? git.cloneTimeoutMs
    git.pushTimeoutMs = document.git?.push_timeout_ms ?? git.pushTimeoutMs
    git.userName = document.git?.user_name ?? git.userName
    git.userEmail = document.git?.user_email ?? git.userEmail
  }

  // Environment
  const envSshKey = env['BITCACHE_SSH_KEY']
  if (envSshKey) sshKey = envSshKey
  retry.maxRetries = parseIntegerEnv(env, 'BITCACHE_MAX_RETRIES', 0) ?? retry.maxRetries
  retry.strategy = parseStrategyEnv(env) ?? retry.strategy
  retry.baseDelayMs = parseIntegerEnv(env, 'BITCACHE_RETRY_DELAY_MS', 0) ?? retry.baseDelayMs
  const gitTimeout = parseIntegerEnv(env, 'BITCACHE_GIT_TIMEOUT_MS', 1)
  if (gitTimeout !== undefined) {
    git.cloneTimeoutMs = gitTimeout
    git.pushTimeoutMs = gitTimeout
  }

  // Command line
  if (overrides.sshKey) sshKey = overrides.sshKey
  if (overrides.maxRetries !== undefined) retry.maxRetries = overrides.maxRetries

  if (retry.maxDelayMs < retry.baseDelayMs) {
    retry.maxDelayMs = retry.baseDelayMs
  }

  return {
    sshKey: sshKey === undefined ? undefined : expandHome(sshKey),
    retry,
    git,
  }
}

/**
 * Load settings for one invocation.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<BitcacheSettings> {
  const document = options.configPath
    ? await readConfigFile(options.configPath, { required: true })
    : await readConfigFile(join(options.cwd ?? process.cwd(), CONFIG_FILENAME))

  return resolveSettings(document, options.env ?? process.env, options.overrides ?? {})
}
