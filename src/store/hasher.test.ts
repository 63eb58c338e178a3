import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { SourceUnreadableError } from '../core/index.js'
import { hashBytes, hashFile } from './hasher.js'

describe('hashBytes', () => {
  test('produces the MD5 of the bytes', () => {
    expect(hashBytes('')).toBe('d41d8cd98f00b204e9800998ecf8427e')
    expect(hashBytes('abc')).toBe('900150983cd24fb0d6963f7d28e17f72')
  })

  test('distinct fixtures never collide', () => {
    const fixtures = ['entity a is end;', 'entity b is end;', 'entity a is end; ', '', '\0']
    const digests = new Set(fixtures.map((f) => hashBytes(f)))
    expect(digests.size).toBe(fixtures.length)
  })
})

describe('hashFile', () => {
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'bitcache-hash-'))
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  test('matches hashBytes for the same content', async () => {
    const file = join(tmpDir, 'top.vhd')
    await writeFile(file, 'abc')
    expect(await hashFile(file)).toBe('900150983cd24fb0d6963f7d28e17f72')
  })

  test('depends on content only, not on the filename', async () => {
    const a = join(tmpDir, 'a.vhd')
    const b = join(tmpDir, 'renamed-copy.vhd')
    await writeFile(a, 'library IEEE;')
    await writeFile(b, 'library IEEE;')
    expect(await hashFile(a)).toBe(await hashFile(b))
  })

  test('streams files larger than one read chunk', async () => {
    const file = join(tmpDir, 'big.vhd')
    const content = Buffer.alloc(200 * 1024, 7)
    await writeFile(file, content)
    expect(await hashFile(file)).toBe(hashBytes(content))
  })

  test('fails with SourceUnreadableError for a missing file', async () => {
    const file = join(tmpDir, 'missing.vhd')
    await expect(hashFile(file)).rejects.toBeInstanceOf(SourceUnreadableError)
  })

  test('fails with SourceUnreadableError for a directory', async () => {
    await expect(hashFile(tmpDir)).rejects.toBeInstanceOf(SourceUnreadableError)
  })
})
