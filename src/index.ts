/**
 * bitcache - content-addressed binary cache on a git remote.
 *
 * @example
 * ```typescript
 * import { getArtifact, publishArtifact } from 'bitcache'
 *
 * const { digest } = await publishArtifact({
 *   remoteUrl: 'git@example.com:hw/bitcache.git',
 *   sourcePath: 'rtl/top.vhd',
 *   binaryPath: 'build/top.bit',
 *   targetPath: 'builds/top',
 * })
 * await getArtifact({ remoteUrl: 'git@example.com:hw/bitcache.git', digest })
 * ```
 */

export * from './core/index.js'
export * from './store/index.js'
export * from './orchestration/index.js'
