#!/usr/bin/env node
/**
 * bitcache command line entry point.
 */

import { formatError } from './helpers.js'
import { createProgram } from './program.js'

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const program = createProgram()
  await program.parseAsync(process.argv)
}

main().catch((error) => {
  console.error(formatError(error))
  process.exit(1)
})
