/**
 * run command - one monitoring pass over this node
 *
 * Config -> Monitor (checks in order) -> CSV log -> HTML report when needed
 */

import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger, finding as printFinding, success } from '../../utils/logger.js'
import { ConfigLoader, ConfigLoadError } from '../../core/config/loader.js'
import { createMonitor, type MonitorOptions } from '../../core/monitor/index.js'
import { parseDiskList } from '../../core/check/disk-health.js'
import type { RunSummary } from '../../types/index.js'

const logger = createLogger('run')

/**
 * run command options
 */
export interface RunOptions {
  forceHtml?: boolean
  smartDisks?: string
  demo?: boolean
  outputDir?: string
}

function printSummary(result: RunSummary, verbose: boolean): void {
  if (verbose) {
    for (const f of result.findings) {
      printFinding(f.status, `${f.category} / ${f.item}`, f.details)
    }
  }
  for (const error of result.errors) {
    logger.warn(`Check fault: ${error}`)
  }
  const { fail, warn, normal } = result.summary
  success(`${result.hostname} (${result.scenario}): ${fail} fail, ${warn} warn, ${normal} normal`)
}

/**
 * Execute run command
 * @param overrides Monitor options that replace the defaults, e.g. a scripted runner
 */
export async function executeRun(
  options: RunOptions,
  globalOptions: GlobalOptions,
  overrides: Partial<MonitorOptions> = {}
): Promise<number> {
  try {
    const loader = new ConfigLoader()
    const config = globalOptions.config
      ? await loader.load(globalOptions.config)
      : loader.loadDefault()

    if (globalOptions.verbose) {
      logger.info(options.demo ? 'Rendering the demo report...' : 'Starting node health checks...')
    }

    const monitor = await createMonitor({
      config,
      outputDir: options.outputDir,
      force: options.forceHtml ?? false,
      demo: options.demo ?? false,
      smartDisks: options.smartDisks ? parseDiskList(options.smartDisks) : [],
      ...overrides
    })
    const result = await monitor.run()

    if (!globalOptions.quiet) {
      printSummary(result, globalOptions.verbose ?? false)
    }
    return ExitCode.OK
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      logger.error(error.message)
      return ExitCode.ERROR
    }
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`Run failed: ${message}`)
    return ExitCode.ERROR
  }
}

/**
 * Register run command on the program
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the health checks on this node')
    .option('--force-html', 'Render the HTML report even when no issue is found')
    .option('--smart-disks <list>', 'Comma-separated disks for the S.M.A.R.T. check, e.g. /dev/sda,/dev/sdb:megaraid,0')
    .option('--demo', 'Render the report from bundled sample findings instead of running checks')
    .option('--output-dir <dir>', 'Directory for the CSV log and the HTML report')
    .action(async (options: RunOptions) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeRun(options, globalOpts)
      process.exit(exitCode)
    })
}
