/**
 * Settings types for bitcache (bitcache.toml + environment + flags)
 */

/** Backoff shape between publish attempts */
export type RetryStrategy = 'fixed' | 'exponential'

/** Publish conflict retry policy */
export interface RetrySettings {
  /** Retries after the first attempt */
  maxRetries: number
  strategy: RetryStrategy
  /** First delay (and every delay for 'fixed') in ms */
  baseDelayMs: number
  /** Upper bound for exponential delays in ms */
  maxDelayMs: number
}

/** Git transport settings */
export interface GitSettings {
  cloneTimeoutMs: number
  pushTimeoutMs: number
  /** Identity used in the temporary clone when none is configured */
  userName: string
  userEmail: string
}

/** Fully resolved settings */
export interface BitcacheSettings {
  /** SSH private key handed to git's ssh transport */
  sshKey?: string | undefined
  retry: RetrySettings
  git: GitSettings
}

/** On-disk form of bitcache.toml */
export interface BitcacheTomlDocument {
  ssh_key?: string
  retry?: {
    max_retries?: number
    strategy?: RetryStrategy
    base_delay_ms?: number
    max_delay_ms?: number
  }
  git?: {
    clone_timeout_ms?: number
    push_timeout_ms?: number
    user_name?: string
    user_email?: string
  }
}
