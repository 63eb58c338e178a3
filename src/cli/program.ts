/**
 * bitcache CLI program.
 *
 * WHY: A thin argument parsing layer; the workflows live in orchestration
 * and the CLI only maps their progress and results onto the terminal.
 */

import { Command } from 'commander'

import { registerGetCommand } from './commands/get.js'
import { registerPublishCommand } from './commands/publish.js'
import { type CliContext, defaultCliContext } from './helpers.js'

export const VERSION = '0.1.0'

/**
 * Create the CLI program.
 */
export function createProgram(overrides: Partial<CliContext> = {}): Command {
  const context: CliContext = { ...defaultCliContext, ...overrides }
  const program = new Command()
    .name('bitcache')
    .description('Content-addressed binary cache on a git remote')
    .version(VERSION)

  registerPublishCommand(program, context)
  registerGetCommand(program, context)

  return program
}
