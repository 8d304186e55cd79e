import { BaseCheck, exceedsThreshold, type CheckContext } from './base.js'
import { parseInteger, parseNumber } from './utils.js'
import type { CheckId, Finding } from '../../types/index.js'

const PROC_LOADAVG = '/proc/loadavg'

/**
 * Compares the 1-minute load average with the core count
 */
export class LoadAverageCheck extends BaseCheck {
  readonly id: CheckId = 'load'
  readonly category = 'System Resources'
  readonly item = 'Load Average'

  async check(context: CheckContext): Promise<Finding[]> {
    let fields: string[]
    let load1: number
    try {
      fields = (await context.files.read(PROC_LOADAVG)).trim().split(/\s+/).slice(0, 3)
      const parsed = parseNumber(fields[0])
      if (fields.length < 3 || parsed === null) {
        throw new Error(`unexpected content '${fields.join(' ')}'`)
      }
      load1 = parsed
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return [this.finding('Fail', 'P2-High', `Could not read ${PROC_LOADAVG}: ${message}`)]
    }

    const cores = await this.countCores(context)
    const ratio = load1 / cores
    let details = `Load (1m, 5m, 15m): ${fields.join(', ')} (${cores} cores).`

    if (exceedsThreshold(ratio, context.config.thresholds.loadRatioWarn)) {
      details += ` The 1-minute load (${load1}) is high for the core count.`
      return [this.finding('Warn', 'P2-High', details)]
    }
    return [this.finding('Normal', 'P4-Info', details)]
  }

  private async countCores(context: CheckContext): Promise<number> {
    const { output, exitCode } = await context.runner.run('nproc')
    const cores = exitCode === 0 ? parseInteger(output) : null
    return cores !== null && cores > 0 ? cores : 1
  }
}
