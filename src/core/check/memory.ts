import { BaseCheck, exceedsThreshold, type CheckContext } from './base.js'
import { parseInteger } from './utils.js'
import type { CheckId, Finding } from '../../types/index.js'

const PROC_MEMINFO = '/proc/meminfo'

/**
 * Parse /proc/meminfo into kB values
 */
export function parseMeminfo(content: string): Map<string, number> {
  const values = new Map<string, number>()
  for (const line of content.split('\n')) {
    const [key, value] = line.trim().split(/\s+/)
    const parsed = parseInteger(value)
    if (key && parsed !== null) {
      values.set(key.replace(/:$/, ''), parsed)
    }
  }
  return values
}

/**
 * Used memory percentage, discounting reclaimable caches.
 * Kernels without MemAvailable fall back to free + buffers + cache.
 */
export function computeMemoryUsage(meminfo: Map<string, number>): number {
  const total = meminfo.get('MemTotal')
  if (total === undefined) {
    throw new Error('MemTotal missing')
  }
  if (total <= 0) {
    return 0
  }
  let available = meminfo.get('MemAvailable')
  if (available === undefined) {
    const free = meminfo.get('MemFree')
    if (free === undefined) {
      throw new Error('MemAvailable and MemFree missing')
    }
    available = free +
      (meminfo.get('Buffers') ?? 0) +
      (meminfo.get('Cached') ?? 0) +
      (meminfo.get('SReclaimable') ?? 0)
  }
  return ((total - available) / total) * 100
}

/**
 * Checks RAM usage
 */
export class MemoryCheck extends BaseCheck {
  readonly id: CheckId = 'memory'
  readonly category = 'System Resources'
  readonly item = 'Memory Usage'

  async check(context: CheckContext): Promise<Finding[]> {
    let usage: number
    try {
      usage = computeMemoryUsage(parseMeminfo(await context.files.read(PROC_MEMINFO)))
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return [this.finding('Fail', 'P1-Critical', `Could not read ${PROC_MEMINFO}: ${message}`)]
    }

    const threshold = context.config.thresholds.memoryWarn
    if (exceedsThreshold(usage, threshold)) {
      return [this.finding('Warn', 'P2-High', `Usage of ${usage.toFixed(1)}% exceeds the limit of ${threshold}%.`)]
    }
    return [this.finding('Normal', 'P4-Info', `Usage of ${usage.toFixed(1)}%.`)]
  }
}
