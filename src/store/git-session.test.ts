/**
 * Tests for git-backed sessions against local bare repositories.
 */

import { mkdtemp, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { RemoteError, asDigest } from '../core/index.js'
import { cloneRepo, gitExecStdout } from '../git/index.js'
import { createBareRemote, hasGit, pushFilesToRemote } from '../test-support/git.js'
import { GitRepositoryBackend, gitTransportEnv } from './git-session.js'
import { MetadataIndex } from './metadata-index.js'

describe('gitTransportEnv', () => {
  it('is empty without a key', () => {
    expect(gitTransportEnv()).toEqual({})
    expect(gitTransportEnv({ sshKey: '' })).toEqual({})
  })

  it('points ssh at the key', () => {
    expect(gitTransportEnv({ sshKey: '/home/ci/.ssh/deploy_key' })).toEqual({
      GIT_SSH_COMMAND: 'ssh -i /home/ci/.ssh/deploy_key -o IdentitiesOnly=yes',
    })
  })

  it('quotes key paths with spaces', () => {
    expect(gitTransportEnv({ sshKey: '/keys/my key' })).toEqual({
      GIT_SSH_COMMAND: "ssh -i '/keys/my key' -o IdentitiesOnly=yes",
    })
  })
})

describe.skipIf(!hasGit)('GitRepositoryBackend', () => {
  let root: string
  let remote: string
  let backend: GitRepositoryBackend

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bitcache-git-session-test-'))
    remote = await createBareRemote(root)
    backend = new GitRepositoryBackend({
      tmpRoot: await mkdtemp(join(root, 'sessions-')),
      git: { userName: 'Store Bot', userEmail: 'store-bot@example.com' },
    })
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('acquires a working copy of an empty remote', async () => {
    const session = await backend.acquire(remote)
    expect(session.root).toMatch(/bitcache-[^/\\]+[/\\]repo$/)
    expect((await session.readMetadata()).size).toBe(0)
    await session.release()
  })

  it('publishes to an empty remote and creates its branch', async () => {
    const session = await backend.acquire(remote)
    await session.writeArtifact('builds/top.bit', Buffer.from('bits'))
    const outcome = await session.publish('Add bitstream for source MD5: test')
    await session.release()

    const tip = await gitExecStdout(['rev-parse', `refs/heads/${session.branch}`], { cwd: remote })
    expect(outcome).toEqual({ status: 'published', commit: tip })
  })

  it('reports unchanged when nothing was written', async () => {
    await pushFilesToRemote(remote, { 'README.md': 'store\n' })
    const session = await backend.acquire(remote)
    expect(await session.publish('noop')).toEqual({ status: 'unchanged' })
    await session.release()
  })

  it('reports a conflict when the remote advanced after acquire', async () => {
    await pushFilesToRemote(remote, { 'README.md': 'store\n' })
    const session = await backend.acquire(remote)
    await pushFilesToRemote(remote, { 'other.txt': 'someone else\n' }, 'Concurrent write')

    await session.writeArtifact('mine.bit', Buffer.from('mine'))
    expect(await session.publish('mine')).toEqual({ status: 'conflict' })
    await session.release()

    // The concurrent write survives; nothing was forced
    const check = join(root, 'check')
    await cloneRepo(remote, check)
    const files = await readdir(check)
    expect(files).toContain('other.txt')
    expect(files).not.toContain('mine.bit')
  })

  it('commits written files even when the store ignores them', async () => {
    await pushFilesToRemote(remote, { '.gitignore': '*.bit\nbitcache_metadata.json\n' })
    const digest = asDigest('eeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee')
    const first = await backend.acquire(remote)
    const index = new MetadataIndex()
    index.upsert(digest, {
      artifactPath: 'builds/a.bit',
      sourceName: 'a.vhd',
      publishedAt: '2026-04-01T00:00:00.000Z',
    })
    await first.writeArtifact('builds/a.bit', Buffer.from('bits'))
    await first.writeMetadata(index)
    expect((await first.publish('ignored paths')).status).toBe('published')
    await first.release()

    const second = await backend.acquire(remote)
    expect((await second.readMetadata()).lookup(digest)?.artifactPath).toBe('builds/a.bit')
    expect(await second.readArtifact('builds/a.bit')).toEqual(Buffer.from('bits'))
    await second.release()
  })

  it('reads back what an earlier session published', async () => {
    const digest = asDigest('ffffffffffffffffffffffffffffffff')
    const first = await backend.acquire(remote)
    const index = new MetadataIndex()
    index.upsert(digest, {
      artifactPath: 'a/b.bit',
      sourceName: 'b.vhd',
      publishedAt: '2026-04-01T00:00:00.000Z',
    })
    await first.writeArtifact('a/b.bit', Buffer.from([0, 1, 2, 255]))
    await first.writeMetadata(index)
    await first.publish('seed')
    await first.release()

    const second = await backend.acquire(remote)
    expect((await second.readMetadata()).lookup(digest)?.artifactPath).toBe('a/b.bit')
    expect(await second.readArtifact('a/b.bit')).toEqual(Buffer.from([0, 1, 2, 255]))
    await second.release()
  })

  it('fails with RemoteError for a missing remote and leaves no temp dir', async () => {
    const sessionsRoot = await mkdtemp(join(root, 'isolated-'))
    const isolated = new GitRepositoryBackend({ tmpRoot: sessionsRoot })
    const missing = join(root, 'does-not-exist.git')

    await expect(isolated.acquire(missing)).rejects.toThrow(RemoteError)
    await expect(isolated.acquire(missing)).rejects.toThrow(`(remote: ${missing})`)
    expect(await readdir(sessionsRoot)).toEqual([])
  })

  it('release removes the session directory', async () => {
    const sessionsRoot = await mkdtemp(join(root, 'isolated-'))
    const isolated = new GitRepositoryBackend({ tmpRoot: sessionsRoot })
    const session = await isolated.acquire(remote)
    expect(await readdir(sessionsRoot)).toHaveLength(1)
    await session.release()
    await session.release()
    expect(await readdir(sessionsRoot)).toEqual([])
  })
})
