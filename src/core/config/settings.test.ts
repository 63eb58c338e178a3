import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { homedir, tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import {
  DEFAULT_SETTINGS,
  loadSettings,
  parseConfigToml,
  readConfigFile,
  resolveSettings,
} from './settings.js'

describe('parseConfigToml', () => {
  test('parses a full document', () => {
    const doc = parseConfigToml(`
ssh_key = "/keys/deploy"

[retry]
max_retries = 2
strategy = "fixed"
base_delay_ms = 10
max_delay_ms = 20

[git]
clone_timeout_ms = 1000
push_timeout_ms = 2000
user_name = "ci"
user_email = "ci@example.com"
`)
    expect(doc.ssh_key).toBe('/keys/deploy')
    expect(doc.retry?.max_retries).toBe(2)
    expect(doc.retry?.strategy).toBe('fixed')
    expect(doc.git?.user_email).toBe('ci@example.com')
  })

  test('accepts an empty document', () => {
    expect(parseConfigToml('')).toEqual({})
  })

  test('throws ConfigParseError on invalid TOML', () => {
    expect(() => parseConfigToml('retry = [', 'custom.toml')).toThrow(ConfigParseError)
  })

  test('throws ConfigValidationError on unknown keys', () => {
    expect(() => parseConfigToml('[retry]\nattempts = 3\n')).toThrow(ConfigValidationError)
    expect(() => parseConfigToml('[retry]\nattempts = 3\n')).toThrow(
      'unknown property "attempts"'
    )
  })

  test('throws ConfigValidationError on a bad strategy', () => {
    expect(() => parseConfigToml('[retry]\nstrategy = "random"\n')).toThrow(
      ConfigValidationError
    )
  })
})

describe('resolveSettings', () => {
  test('returns defaults with nothing configured', () => {
    expect(resolveSettings(null)).toEqual({ ...DEFAULT_SETTINGS, sshKey: undefined })
  })

  test('environment overrides the config file', () => {
    const settings = resolveSettings(
      { retry: { max_retries: 2, base_delay_ms: 100 } },
      { BITCACHE_MAX_RETRIES: '7', BITCACHE_GIT_TIMEOUT_MS: '500' }
    )
    expect(settings.retry.maxRetries).toBe(7)
    expect(settings.retry.baseDelayMs).toBe(100)
    expect(settings.git.cloneTimeoutMs).toBe(500)
    expect(settings.git.pushTimeoutMs).toBe(500)
  })

  test('overrides win over environment', () => {
    const settings = resolveSettings(
      { ssh_key: '/from/file' },
      { BITCACHE_SSH_KEY: '/from/env', BITCACHE_MAX_RETRIES: '7' },
      { sshKey: '/from/flag', maxRetries: 0 }
    )
    expect(settings.sshKey).toBe('/from/flag')
    expect(settings.retry.maxRetries).toBe(0)
  })

  test('expands a leading ~ in the ssh key', () => {
    const settings = resolveSettings({ ssh_key: '~/.ssh/deploy_key' })
    expect(settings.sshKey).toBe(join(homedir(), '.ssh/deploy_key'))
  })

  test('raises the max delay to the base delay', () => {
    const settings = resolveSettings({ retry: { base_delay_ms: 9000 } })
    expect(settings.retry.maxDelayMs).toBe(9000)
  })

  test('rejects a non-integer retry count from the environment', () => {
    expect(() => resolveSettings(null, { BITCACHE_MAX_RETRIES: 'many' })).toThrow(
      'BITCACHE_MAX_RETRIES: expected an integer >= 0, got "many"'
    )
  })

  test('rejects an unknown strategy from the environment', () => {
    expect(() => resolveSettings(null, { BITCACHE_RETRY_STRATEGY: 'linear' })).toThrow(
      ConfigParseError
    )
  })
})

describe('loadSettings', () => {
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'bitcache-settings-'))
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  test('picks up bitcache.toml from cwd', async () => {
    await writeFile(join(tmpDir, 'bitcache.toml'), '[retry]\nmax_retries = 1\n')
    const settings = await loadSettings({ cwd: tmpDir, env: {} })
    expect(settings.retry.maxRetries).toBe(1)
  })

  test('falls back to defaults when no file exists', async () => {
    const settings = await loadSettings({ cwd: tmpDir, env: {} })
    expect(settings.retry).toEqual(DEFAULT_SETTINGS.retry)
  })

  test('explicit config path must exist', async () => {
    await expect(
      loadSettings({ configPath: join(tmpDir, 'nope.toml'), env: {} })
    ).rejects.toThrow(ConfigParseError)
  })

  test('readConfigFile returns null for a missing optional file', async () => {
    expect(await readConfigFile(join(tmpDir, 'bitcache.toml'))).toBeNull()
  })
})
