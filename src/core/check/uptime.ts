import { BaseCheck, type CheckContext } from './base.js'
import { formatDuration } from '../../utils/format.js'
import type { CheckId, Finding } from '../../types/index.js'

/**
 * Parse `uptime -s` output ("YYYY-MM-DD HH:MM:SS", local time)
 */
export function parseBootTime(output: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/.exec(output.trim())
  if (!match) {
    return null
  }
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number)
  return new Date(year, month - 1, day, hour, minute, second)
}

/**
 * Reports a reboot within the configured window
 */
export class UptimeCheck extends BaseCheck {
  readonly id: CheckId = 'uptime'
  readonly category = 'OS Health'
  readonly item = 'Uptime'

  constructor(private readonly now: () => Date = () => new Date()) {
    super()
  }

  async check(context: CheckContext): Promise<Finding[]> {
    const { output, exitCode } = await context.runner.run('uptime -s')
    if (exitCode !== 0) {
      return [this.finding('Fail', 'P3-Medium', `Could not get the uptime. Output: ${output}`)]
    }

    const bootTime = parseBootTime(output)
    if (bootTime === null) {
      return [this.finding('Fail', 'P3-Medium', `Could not parse the boot time: '${output}'`)]
    }

    const uptimeMs = this.now().getTime() - bootTime.getTime()
    const hours = context.config.thresholds.minUptimeHours
    const uptime = formatDuration(uptimeMs)

    if (uptimeMs < hours * 3600 * 1000) {
      return [this.finding('Warn', 'P3-Medium', `The server was rebooted in the last ${hours} hours. Uptime: ${uptime}.`)]
    }
    return [this.finding('Normal', 'P4-Info', `The server has been up for more than ${hours} hours. Uptime: ${uptime}.`)]
  }
}
