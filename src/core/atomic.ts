/**
 * Atomic file write utilities for bitcache
 *
 * Files handed to the user (a retrieved binary) and files committed to the
 * store are written to a sibling temp file and renamed into place, so a
 * reader never observes a partial file.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs'
import * as path from 'node:path'

/** Options for atomic write operations */
export interface AtomicWriteOptions {
  /** File mode (default: 0o644) */
  mode?: number
  /** Temporary file suffix (default: .tmp) */
  tmpSuffix?: string
  /** Whether to fsync before rename (default: true) */
  fsync?: boolean
  /** Create missing parent directories (default: true) */
  mkdirs?: boolean
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o644,
  tmpSuffix: '.tmp',
  fsync: true,
  mkdirs: true,
}

/**
 * Generate a unique temporary file path next to the target
 */
function getTmpPath(targetPath: string, suffix: string): string {
  const dir = path.dirname(targetPath)
  const base = path.basename(targetPath)
  const rand = crypto.randomBytes(6).toString('hex')
  return path.join(dir, `.${base}.${rand}${suffix}`)
}

/**
 * Write content to a file atomically
 *
 * @param filePath - Target file path
 * @param content - Content to write
 * @param options - Write options
 */
export async function atomicWrite(
  filePath: string,
  content: string | Uint8Array,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const opts = { ...DEFAULT_OPTIONS, ...options }

  if (opts.mkdirs) {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  }

  const tmpPath = getTmpPath(filePath, opts.tmpSuffix)

  try {
    await fs.promises.writeFile(tmpPath, content, { mode: opts.mode })

    if (opts.fsync) {
      const fd = await fs.promises.open(tmpPath, 'r')
      try {
        await fd.sync()
      } finally {
        await fd.close()
      }
    }

    await fs.promises.rename(tmpPath, filePath)
  } catch (err) {
    // The temp file may never have been created
    await fs.promises.rm(tmpPath, { force: true })
    throw err
  }
}
