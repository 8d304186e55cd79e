import { BaseCheck, type CheckContext } from './base.js'
import type { CheckId, Finding } from '../../types/index.js'

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

/**
 * Build the kernel log search for the configured keywords
 */
export function buildDmesgCommand(keywords: readonly string[]): string {
  return `dmesg 2>&1 | grep -iE ${shellQuote(`(${keywords.join('|')})`)}`
}

/**
 * Scans the kernel ring buffer for hardware error keywords
 */
export class DmesgCheck extends BaseCheck {
  readonly id: CheckId = 'dmesg'
  readonly category = 'Hardware & OS'
  readonly item = 'Kernel Log (dmesg)'

  async check(context: CheckContext): Promise<Finding[]> {
    const { output, exitCode } = await context.runner.run(
      buildDmesgCommand(context.config.hardwareErrorKeywords)
    )

    if (output.includes('Operation not permitted')) {
      return [this.finding('Warn', 'P3-Medium', "Could not read the kernel log. Run with 'sudo'.")]
    }
    if (exitCode === 0 && output !== '') {
      return [this.finding('Warn', 'P2-High', `Possible hardware errors found:\n${output}`)]
    }
    return [this.finding('Normal', 'P4-Info', 'No recent critical errors found.')]
  }
}
