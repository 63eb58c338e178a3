/**
 * Helpers for tests that drive a real git binary against local repositories.
 */

import { spawnSync } from 'node:child_process'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'

import { addAll, cloneRepo, commit, initRepo, pushHead, setConfig } from '../git/index.js'

/** True when a git binary can be run; git-backed suites skip otherwise */
export const hasGit = spawnSync('git', ['--version'], { stdio: 'ignore' }).status === 0

/** Identity for commits made by the test helpers themselves */
export async function configureTestIdentity(cwd: string): Promise<void> {
  await setConfig('user.name', 'Test User', { cwd })
  await setConfig('user.email', 'test@example.com', { cwd })
}

/**
 * Create a bare repository acting as the shared remote.
 * Returns its path; callers use it directly as the remote URL.
 */
export async function createBareRemote(root: string, name = 'remote.git'): Promise<string> {
  const remotePath = join(root, name)
  await initRepo(remotePath, { bare: true, initialBranch: 'main' })
  return remotePath
}

/**
 * Commit files to the remote's main branch from a throwaway clone,
 * standing in for another machine writing to the store.
 */
export async function pushFilesToRemote(
  remotePath: string,
  files: Record<string, string | Uint8Array>,
  message = 'Seed store'
): Promise<void> {
  const scratch = await mkdtemp(join(tmpdir(), 'bitcache-writer-'))
  try {
    const workdir = join(scratch, 'repo')
    await cloneRepo(remotePath, workdir)
    await configureTestIdentity(workdir)
    for (const [relativePath, content] of Object.entries(files)) {
      const fullPath = join(workdir, relativePath)
      await mkdir(dirname(fullPath), { recursive: true })
      await writeFile(fullPath, content)
    }
    await addAll({ cwd: workdir })
    await commit(message, { cwd: workdir })
    const result = await pushHead('main', { cwd: workdir })
    if (result.status !== 'pushed') {
      throw new Error(`Seeding the remote failed: ${JSON.stringify(result)}`)
    }
  } finally {
    await rm(scratch, { recursive: true, force: true })
  }
}
