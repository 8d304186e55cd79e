#!/usr/bin/env node
/**
 * hpcmon CLI entry point
 *
 * Health checks for HPC cluster nodes
 */

import { realpathSync } from 'fs'
import { fileURLToPath } from 'url'
import { Command } from 'commander'
import { configureLogger, createLogger } from '../utils/logger.js'
import { createConfigLoader } from '../core/config/loader.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerRunCommand } from './commands/run.js'

/**
 * Exit codes for the CLI
 * - 0: run completed, whatever the node's health
 * - 1: error (bad arguments, unreadable or invalid config, crash)
 */
export const ExitCode = {
  OK: 0,
  ERROR: 1
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('hpcmon')
    .description('Health checks for HPC cluster nodes')
    .version('1.0.0')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to a YAML configuration file')
    .hook('preAction', () => {
      const opts = program.opts<GlobalOptions>()
      configureLogger({ level: opts.verbose ? 'debug' : 'info', quiet: opts.quiet ?? false })
    })

  registerRunCommand(program)

  program
    .command('init')
    .description('Generate a default configuration file')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const result = await initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        logger.info(`Created config file: ${result.outputPath}`)
        process.exit(ExitCode.OK)
      } else {
        logger.error(`Failed to create config file: ${result.error}`)
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('validate <config>')
    .description('Validate a configuration file')
    .action(async (configPath: string) => {
      const result = await createConfigLoader().validate(configPath)

      if (result.valid) {
        logger.info(`✓ Config file is valid: ${configPath}`)
        process.exit(ExitCode.OK)
      } else {
        logger.error(`✗ Config file is invalid: ${configPath}`)
        for (const error of result.errors) {
          logger.error(`  - ${error}`)
        }
        process.exit(ExitCode.ERROR)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`CLI error: ${message}`)
    process.exit(ExitCode.ERROR)
  }
}

// Run when executed directly, including through the npm bin symlink
function isMainModule(): boolean {
  const entry = process.argv[1]
  if (entry === undefined) {
    return false
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

if (isMainModule()) {
  void run()
}
