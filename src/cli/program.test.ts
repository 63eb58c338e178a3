/**
 * CLI tests.
 *
 * Commands run against an in-process store; process.exit is replaced so
 * fatal paths can be asserted.
 */

import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { stripVTControlCharacters } from 'node:util'
import { CommanderError } from 'commander'
import { type MockInstance, afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { hashBytes } from '../store/index.js'
import { MemoryBackend, type MemoryRemote } from '../test-support/memory-backend.js'
import { createProgram } from './program.js'

const REMOTE_URL = 'memory://hw-cache'
const SOURCE = 'module top(); endmodule\n'
const DIGEST = hashBytes(SOURCE)
const BINARY = Buffer.from('bitstream-bytes')

class ExitCalled extends Error {
  constructor(readonly exitCode: number | undefined) {
    super(`process.exit(${exitCode})`)
  }
}

describe('bitcache CLI', () => {
  let root: string
  let workDir: string
  let backend: MemoryBackend
  let remote: MemoryRemote
  let logSpy: MockInstance<typeof console.log>
  let errorSpy: MockInstance<typeof console.error>

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bitcache-cli-test-'))
    workDir = join(root, 'work')
    await mkdir(workDir)
    await mkdir(join(root, 'sessions'))
    await writeFile(join(workDir, 'top.v'), SOURCE)
    await writeFile(join(workDir, 'top.bit'), BINARY)

    backend = new MemoryBackend(join(root, 'sessions'))
    remote = backend.createRemote(REMOTE_URL)

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(typeof code === 'number' ? code : undefined)
    })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(root, { recursive: true, force: true })
  })

  function run(args: string[], env: NodeJS.ProcessEnv = {}): Promise<unknown> {
    const program = createProgram({
      createBackend: () => backend,
      env: { BITCACHE_RETRY_DELAY_MS: '0', ...env },
      cwd: () => workDir,
    })
    for (const command of [program, ...program.commands]) {
      command.exitOverride()
      command.configureOutput({ writeOut: () => {}, writeErr: () => {} })
    }
    return program.parseAsync(args, { from: 'user' })
  }

  function stdout(): string[] {
    return logSpy.mock.calls.map((call) => stripVTControlCharacters(call.map(String).join(' ')))
  }

  function stderr(): string[] {
    return errorSpy.mock.calls.map((call) => stripVTControlCharacters(call.map(String).join(' ')))
  }

  const publishArgs = [
    'publish',
    '--repo',
    REMOTE_URL,
    '--source',
    'top.v',
    '--bitstream',
    'top.bit',
    '--path',
    'fpga/rev1',
  ]

  test('publish then get round-trips a binary', async () => {
    await run(publishArgs)
    expect(stdout()).toContain(`  md5        ${DIGEST}`)
    expect(stdout()).toContain('  stored at  fpga/rev1/top.bit')
    expect(stdout()).toContain('  source     top.v')

    const outDir = join(root, 'out')
    await mkdir(outDir)
    await run(['get', '--repo', REMOTE_URL, '--md5', DIGEST, '--output', outDir])

    expect(await readFile(join(outDir, 'top.bit'))).toEqual(BINARY)
    expect(stdout()).toContain(`  saved to   ${join(outDir, 'top.bit')}`)
  })

  test('get saves into the working directory by default', async () => {
    await run(publishArgs)
    await rm(join(workDir, 'top.bit'))
    await run(['get', '--repo', REMOTE_URL, '--md5', DIGEST.toUpperCase()])
    expect(await readFile(join(workDir, 'top.bit'))).toEqual(BINARY)
  })

  test('republishing a rebuilt binary replaces the stored bytes', async () => {
    await run(publishArgs)
    await writeFile(join(workDir, 'top.bit'), 'rebuilt')
    await run(publishArgs)

    expect(remote.readText('fpga/rev1/top.bit')).toBe('rebuilt')
    expect(remote.messages).toEqual([
      `Add bitstream for source MD5: ${DIGEST}`,
      `Add bitstream for source MD5: ${DIGEST}`,
    ])
  })

  test('an unknown digest exits 1 with the digest in the message', async () => {
    const unknown = '00000000000000000000000000000000'
    await expect(run(['get', '--repo', REMOTE_URL, '--md5', unknown])).rejects.toThrow(
      ExitCalled
    )
    expect(process.exit).toHaveBeenCalledWith(1)
    expect(stderr()[0]).toBe(
      [
        `Error: No binary found for MD5: ${unknown}`,
        '  Check the MD5 of the source file, or publish it first',
      ].join('\n')
    )
    expect((await readdir(workDir)).sort()).toEqual(['top.bit', 'top.v'])
  })

  test('a malformed digest exits 1', async () => {
    await expect(run(['get', '--repo', REMOTE_URL, '--md5', 'abc'])).rejects.toThrow(ExitCalled)
    expect(stderr()[0]).toBe(
      'Error: Invalid digest "abc": expected 32 hexadecimal characters'
    )
  })

  test('--max-retries bounds conflict retries', async () => {
    backend.conflictNext(100)
    await expect(run([...publishArgs, '--max-retries', '1'])).rejects.toThrow(ExitCalled)
    expect(backend.sessions).toHaveLength(2)
    expect(stderr()[0]?.split('\n')[0]).toBe(
      `Error: Gave up after 2 publish attempts: the remote kept advancing (remote: ${REMOTE_URL})`
    )
  })

  test('BITCACHE_MAX_RETRIES applies when no flag is given', async () => {
    backend.conflictNext(100)
    await expect(run(publishArgs, { BITCACHE_MAX_RETRIES: '0' })).rejects.toThrow(ExitCalled)
    expect(backend.sessions).toHaveLength(1)
  })

  test('a conflict that clears is retried without an error', async () => {
    backend.conflictNext(2)
    await run(publishArgs)
    expect(backend.sessions).toHaveLength(3)
    expect(stdout()).toContain('  attempts   3')
    expect(errorSpy).not.toHaveBeenCalled()
  })

  test('rejects a negative --max-retries', async () => {
    await expect(run([...publishArgs, '--max-retries', '-1'])).rejects.toThrow(CommanderError)
    expect(backend.sessions).toHaveLength(0)
  })

  test('requires --repo', async () => {
    await expect(run(['get', '--md5', DIGEST])).rejects.toThrow(CommanderError)
  })

  test('passes --ssh-key through to the backend', async () => {
    await run([...publishArgs, '--ssh-key', '/keys/ci_key'])
    expect(backend.auths).toEqual([{ sshKey: '/keys/ci_key' }])
  })

  test('reads ssh_key from bitcache.toml in the working directory', async () => {
    await writeFile(join(workDir, 'bitcache.toml'), 'ssh_key = "/keys/from_config"\n')
    await run(publishArgs)
    expect(backend.auths).toEqual([{ sshKey: '/keys/from_config' }])
  })

  test('a missing --config file exits 1', async () => {
    const configPath = join(root, 'nope.toml')
    await expect(run([...publishArgs, '--config', configPath])).rejects.toThrow(ExitCalled)
    expect(stderr()[0]).toBe(`Error: ${configPath}: File not found`)
    expect(backend.sessions).toHaveLength(0)
  })

  test('an unreadable bitstream exits 1 and leaves the store alone', async () => {
    await expect(
      run(['publish', '--repo', REMOTE_URL, '--source', 'top.v', '--bitstream', 'gone.bit', '--path', 'x'])
    ).rejects.toThrow(ExitCalled)
    expect(stderr()[0]?.startsWith(`Error: Cannot read "${join(workDir, 'gone.bit')}"`)).toBe(true)
    expect(backend.sessions).toHaveLength(0)
  })
})
