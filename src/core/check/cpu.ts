import { BaseCheck, exceedsThreshold, type CheckContext } from './base.js'
import type { CheckId, Finding } from '../../types/index.js'

const PROC_STAT = '/proc/stat'

/**
 * Aggregate CPU counters from one /proc/stat sample
 */
export interface CpuTimes {
  total: number
  idle: number
}

/**
 * Parse the aggregate "cpu" line: total is the sum of the first eight
 * counters (user..steal), idle is the fourth.
 */
export function parseCpuTimes(content: string): CpuTimes {
  const line = content.split('\n').find(l => /^cpu\s/.test(l))
  if (!line) {
    throw new Error(`No aggregate cpu line in ${PROC_STAT}`)
  }
  const counters = line.trim().split(/\s+/).slice(1, 9).map(Number)
  if (counters.length < 4 || counters.some(n => !Number.isFinite(n))) {
    throw new Error(`Malformed cpu line in ${PROC_STAT}: ${line}`)
  }
  return {
    total: counters.reduce((sum, n) => sum + n, 0),
    idle: counters[3]
  }
}

/**
 * Busy percentage between two samples; 0 when no time elapsed
 */
export function computeCpuUsage(first: CpuTimes, second: CpuTimes): number {
  const deltaTotal = second.total - first.total
  const deltaIdle = second.idle - first.idle
  if (deltaTotal <= 0) {
    return 0
  }
  return (100 * (deltaTotal - deltaIdle)) / deltaTotal
}

/**
 * Samples overall CPU usage over one second
 */
export class CpuCheck extends BaseCheck {
  readonly id: CheckId = 'cpu'
  readonly category = 'System Resources'
  readonly item = 'CPU Usage'

  async check(context: CheckContext): Promise<Finding[]> {
    const first = await this.sample(context, 'first')
    if (!first.ok) {
      return [first.finding]
    }
    await context.sleep(1000)
    const second = await this.sample(context, 'second')
    if (!second.ok) {
      return [second.finding]
    }

    const usage = computeCpuUsage(first.times, second.times)
    const threshold = context.config.thresholds.cpuWarn
    if (exceedsThreshold(usage, threshold)) {
      return [this.finding('Warn', 'P2-High', `Usage of ${usage.toFixed(1)}% exceeds the limit of ${threshold}%.`)]
    }
    return [this.finding('Normal', 'P4-Info', `Usage of ${usage.toFixed(1)}%.`)]
  }

  private async sample(
    context: CheckContext,
    label: string
  ): Promise<{ ok: true; times: CpuTimes } | { ok: false; finding: Finding }> {
    try {
      return { ok: true, times: parseCpuTimes(await context.files.read(PROC_STAT)) }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return {
        ok: false,
        finding: this.finding('Fail', 'P1-Critical', `Could not read ${PROC_STAT} (${label} sample): ${message}`)
      }
    }
  }
}
