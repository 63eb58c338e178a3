/**
 * Path handling inside the store.
 *
 * Paths recorded in the index are POSIX and relative to the store root.
 * Every path that comes from the user or from the index is checked to stay
 * inside the working copy and out of git's own directory.
 */

import { isAbsolute, join, posix, relative, resolve, sep } from 'node:path'

import { InvalidTargetPathError, METADATA_FILENAME } from '../core/index.js'

/** Prefix of every session's temporary directory */
export const SESSION_DIR_PREFIX = 'bitcache-'

/** Name of the working copy inside a session's temporary directory */
export const WORKING_COPY_DIRNAME = 'repo'

/**
 * Normalize a caller-supplied directory inside the store.
 *
 * Accepts `/` or `\` separators; returns a POSIX path without leading or
 * trailing slashes (`''` means the store root).
 *
 * @throws InvalidTargetPathError for absolute paths, `..` segments or
 *   anything under `.git`
 */
export function normalizeStorePath(input: string): string {
  const raw = input.trim()
  if (isAbsolute(raw) || posix.isAbsolute(raw) || /^[a-zA-Z]:[\\/]/.test(raw)) {
    throw new InvalidTargetPathError(input, 'must be relative to the store root')
  }

  const segments = raw.split(/[\\/]+/).filter((segment) => segment !== '' && segment !== '.')
  if (segments.includes('..')) {
    throw new InvalidTargetPathError(input, 'must not contain ".." segments')
  }
  if (segments.some((segment) => segment.toLowerCase() === '.git')) {
    throw new InvalidTargetPathError(input, 'must not point into .git')
  }

  return segments.join('/')
}

/**
 * Store path of a binary published under a target directory:
 * the target joined with the binary's own filename.
 *
 * @throws InvalidTargetPathError if the result would replace the metadata file
 */
export function artifactPathFor(targetDir: string, binaryFileName: string): string {
  const directory = normalizeStorePath(targetDir)
  const fileName = normalizeStorePath(binaryFileName)
  if (fileName === '' || fileName.includes('/')) {
    throw new InvalidTargetPathError(binaryFileName, 'binary must be a file name')
  }

  const artifactPath = directory === '' ? fileName : `${directory}/${fileName}`
  if (artifactPath === METADATA_FILENAME) {
    throw new InvalidTargetPathError(targetDir, `would overwrite ${METADATA_FILENAME}`)
  }
  return artifactPath
}

/**
 * Resolve a store-relative path against a working copy root.
 *
 * @throws InvalidTargetPathError if the path escapes the root
 */
export function resolveInStore(root: string, storePath: string): string {
  const normalized = normalizeStorePath(storePath)
  if (normalized === '') {
    throw new InvalidTargetPathError(storePath, 'must name a file')
  }

  const fullPath = resolve(root, normalized)
  const rel = relative(resolve(root), fullPath)
  if (rel === '' || rel.startsWith(`..${sep}`) || rel === '..' || isAbsolute(rel)) {
    throw new InvalidTargetPathError(storePath, 'escapes the store root')
  }
  return join(root, normalized)
}
