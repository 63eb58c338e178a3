/**
 * Publish command - store a binary under the MD5 of its source file.
 */

import { resolve } from 'node:path'

import { type Command, InvalidArgumentError } from 'commander'

import { CONFIG_FILENAME } from '../../core/index.js'
import { type PublishProgress, publishArtifact } from '../../orchestration/index.js'
import { type CliContext, handleCliError, resolveCommandSettings } from '../helpers.js'
import {
  blank,
  colors,
  createSpinner,
  formatDuration,
  formatPath,
  info,
  success,
} from '../ui.js'

export interface PublishCommandOptions {
  repo: string
  source: string
  bitstream: string
  path: string
  sshKey?: string | undefined
  maxRetries?: number | undefined
  config?: string | undefined
}

/**
 * Parse --max-retries.
 */
export function parseRetryCount(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

const STATE_TEXT = {
  hashing: 'Hashing source...',
  acquiring: 'Cloning store...',
  writing: 'Writing binary...',
  committing: 'Updating metadata...',
  publishing: 'Pushing...',
  done: 'Done',
} as const

function progressText(event: PublishProgress): string | null {
  // Conflicts are retried quietly; only the attempt number shows
  if (event.type === 'conflict') return null
  const text = STATE_TEXT[event.state]
  return event.attempt > 1 ? `${text} (attempt ${event.attempt})` : text
}

export function registerPublishCommand(program: Command, context: CliContext): void {
  program
    .command('publish')
    .description('Publish a binary under the MD5 of its source file')
    .requiredOption('--repo <url>', 'Git remote holding the store')
    .requiredOption('--source <file>', 'Source file whose MD5 keys the binary')
    .requiredOption('--bitstream <file>', 'Binary file to publish')
    .requiredOption('--path <dir>', 'Directory inside the store for the binary')
    .option('--ssh-key <path>', 'SSH private key for the git transport')
    .option('--max-retries <n>', 'Retries after a publish conflict', parseRetryCount)
    .option('--config <file>', `Settings file (default: ./${CONFIG_FILENAME})`)
    .action(async (options: PublishCommandOptions) => {
      const startTime = Date.now()
      const spinner = createSpinner('Loading settings...')

      try {
        const cwd = context.cwd()
        const settings = await resolveCommandSettings(context, options.config, {
          sshKey: options.sshKey,
          maxRetries: options.maxRetries,
        })

        spinner.start()
        const result = await publishArtifact({
          remoteUrl: options.repo,
          sourcePath: resolve(cwd, options.source),
          binaryPath: resolve(cwd, options.bitstream),
          targetPath: options.path,
          sshKey: settings.sshKey,
          retry: settings.retry,
          backend: context.createBackend(settings),
          onProgress: (event) => {
            const text = progressText(event)
            if (text) spinner.text = colors.muted(text)
          },
        })
        spinner.stop()

        const duration = formatDuration(Date.now() - startTime)
        blank()
        if (result.unchanged) {
          success(`Already published in ${duration}; the store was up to date`)
        } else {
          success(`Published in ${duration}`)
        }
        info('source', result.record.sourceName)
        info('md5', colors.code(result.digest))
        info('stored at', result.record.artifactPath)
        info('timestamp', result.record.publishedAt)
        info('repo', formatPath(options.repo))
        if (result.commit) {
          info('commit', colors.code(result.commit.slice(0, 12)))
        }
        if (result.attempts > 1) {
          info('attempts', String(result.attempts))
        }
      } catch (err) {
        spinner.stop()
        handleCliError(err)
      }
    })
}
