/**
 * Get command - fetch the binary stored for a source MD5.
 */

import { resolve } from 'node:path'

import type { Command } from 'commander'

import { CONFIG_FILENAME } from '../../core/index.js'
import { type GetState, getArtifact } from '../../orchestration/index.js'
import { type CliContext, handleCliError, resolveCommandSettings } from '../helpers.js'
import {
  blank,
  colors,
  createSpinner,
  formatBytes,
  formatDuration,
  formatPath,
  info,
  success,
} from '../ui.js'

export interface GetCommandOptions {
  repo: string
  md5: string
  output?: string | undefined
  sshKey?: string | undefined
  config?: string | undefined
}

const STATE_TEXT: Record<GetState, string> = {
  acquiring: 'Cloning store...',
  reading: 'Looking up digest...',
  writing: 'Saving binary...',
  done: 'Done',
}

export function registerGetCommand(program: Command, context: CliContext): void {
  program
    .command('get')
    .description('Fetch the binary published for a source MD5')
    .requiredOption('--repo <url>', 'Git remote holding the store')
    .requiredOption('--md5 <digest>', 'MD5 of the source file')
    .option('--output <dir>', 'Directory to save the binary in (default: current directory)')
    .option('--ssh-key <path>', 'SSH private key for the git transport')
    .option('--config <file>', `Settings file (default: ./${CONFIG_FILENAME})`)
    .action(async (options: GetCommandOptions) => {
      const startTime = Date.now()
      const spinner = createSpinner('Loading settings...')

      try {
        const settings = await resolveCommandSettings(context, options.config, {
          sshKey: options.sshKey,
        })

        spinner.start()
        const result = await getArtifact({
          remoteUrl: options.repo,
          digest: options.md5,
          outputDir: resolve(context.cwd(), options.output ?? '.'),
          sshKey: settings.sshKey,
          backend: context.createBackend(settings),
          onProgress: (state) => {
            spinner.text = colors.muted(STATE_TEXT[state])
          },
        })
        spinner.stop()

        blank()
        success(`Retrieved ${formatBytes(result.bytes)} in ${formatDuration(Date.now() - startTime)}`)
        info('source', result.record.sourceName)
        info('md5', colors.code(result.record.digest))
        info('timestamp', result.record.publishedAt)
        info('saved to', formatPath(result.outputPath))
      } catch (err) {
        spinner.stop()
        handleCliError(err)
      }
    })
}
