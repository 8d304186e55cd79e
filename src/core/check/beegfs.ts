import { BaseCheck, exceedsThreshold, type CheckContext } from './base.js'
import { parseInteger, parseNumber } from './utils.js'
import { formatBytes } from '../../utils/format.js'
import type { CheckId, Finding } from '../../types/index.js'

const MOUNT_PREFIX = '/BeeGFS'

/**
 * Unique, sorted BeeGFS mount points from `mount` output
 */
export function findBeegfsMounts(output: string): string[] {
  const mounts = new Set<string>()
  for (const line of output.split('\n')) {
    const match = / on (\S+) /.exec(line)
    if (match && match[1].startsWith(MOUNT_PREFIX)) {
      mounts.add(match[1])
    }
  }
  return [...mounts].sort()
}

/**
 * Size figures in kB from the data row of `df -k`
 */
export interface DiskUsage {
  size: number
  used: number
  available: number
  percent: number
}

export function parseDf(output: string): DiskUsage | null {
  const row = output.split('\n')[1]
  if (row === undefined) {
    return null
  }
  const parts = row.trim().split(/\s+/)
  const size = parseInteger(parts[1])
  const used = parseInteger(parts[2])
  const available = parseInteger(parts[3])
  const percent = parseNumber(parts[4]?.replace('%', ''))
  if (size === null || used === null || available === null || percent === null) {
    return null
  }
  return { size, used, available, percent }
}

/**
 * Checks usage of BeeGFS partitions, one by one and in aggregate
 */
export class BeegfsUsageCheck extends BaseCheck {
  readonly id: CheckId = 'beegfs'
  readonly category = 'BeeGFS Disk Usage'
  readonly item = 'Partition Usage'

  async check(context: CheckContext): Promise<Finding[]> {
    const findings: Finding[] = []
    const mount = await this.runRecorded(context, 'mount', findings)
    if (mount === null || mount.exitCode !== 0) {
      return findings
    }
    const mounts = findBeegfsMounts(mount.output)
    if (mounts.length === 0) {
      return findings
    }

    const threshold = context.config.thresholds.beegfsUsageWarn
    let totalSize = 0
    let totalUsed = 0

    for (const mountPoint of mounts) {
      const df = await this.runRecorded(context, `df -k ${mountPoint}`, findings, `Partition Usage ${mountPoint}`)
      const usage = df !== null && df.exitCode === 0 ? parseDf(df.output) : null
      if (usage === null) {
        continue
      }
      totalSize += usage.size
      totalUsed += usage.used
      const warn = exceedsThreshold(usage.percent, threshold)
      findings.push(this.finding(
        warn ? 'Warn' : 'Normal',
        warn ? 'P2-High' : 'P4-Info',
        `Usage: ${usage.percent.toFixed(1)}%. Total: ${formatBytes(usage.size)}, ` +
        `Used: ${formatBytes(usage.used)}, Available: ${formatBytes(usage.available)}.`,
        `Partition Usage ${mountPoint}`
      ))
    }

    if (totalSize > 0) {
      const aggregate = (totalUsed / totalSize) * 100
      const warn = exceedsThreshold(aggregate, threshold)
      findings.push(this.finding(
        warn ? 'Warn' : 'Normal',
        warn ? 'P2-High' : 'P4-Info',
        `Total usage: ${aggregate.toFixed(1)}%. Total: ${formatBytes(totalSize)}, ` +
        `Used: ${formatBytes(totalUsed)}, Available: ${formatBytes(totalSize - totalUsed)}.`,
        'Aggregate Partition Usage'
      ))
    }

    return findings
  }
}
