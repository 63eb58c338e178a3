/**
 * Content hashing for source files.
 *
 * The digest is the MD5 of the file's bytes and nothing else: the filename,
 * timestamps and location never feed into it.
 */

import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'

import { type Digest, SourceUnreadableError, asDigest } from '../core/index.js'

/**
 * Digest an in-memory buffer.
 */
export function hashBytes(bytes: Uint8Array | string): Digest {
  return asDigest(createHash('md5').update(bytes).digest('hex'))
}

/**
 * Digest a file by streaming its contents.
 *
 * @throws SourceUnreadableError if the file cannot be opened or read
 */
export function hashFile(filePath: string): Promise<Digest> {
  return new Promise<Digest>((resolve, reject) => {
    const hash = createHash('md5')
    const stream = createReadStream(filePath)

    stream.on('data', (chunk) => hash.update(chunk))
    stream.on('error', (err) => reject(new SourceUnreadableError(filePath, err.message)))
    stream.on('end', () => resolve(asDigest(hash.digest('hex'))))
  })
}
