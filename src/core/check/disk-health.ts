import { basename } from 'path'
import { BaseCheck, exceedsThreshold, type CheckContext } from './base.js'
import { parseNumber } from './utils.js'
import type { CheckId, Finding, Priority, Status } from '../../types/index.js'
import type { Thresholds } from '../config/schema.js'

/**
 * A disk given on the command line, optionally with a smartctl device type
 * ("/dev/sda" or "/dev/sdb:megaraid,0")
 */
export interface DiskTarget {
  path: string
  type?: string
}

export function parseDiskTarget(value: string): DiskTarget {
  const separator = value.indexOf(':')
  if (separator <= 0) {
    return { path: value }
  }
  return { path: value.slice(0, separator), type: value.slice(separator + 1) }
}

/**
 * Split a comma-separated disk list, dropping blanks
 */
export function parseDiskList(value: string): string[] {
  return value.split(',').map(d => d.trim()).filter(d => d !== '')
}

function smartctl(flag: string, target: DiskTarget): string {
  return ['smartctl', flag, target.type ? `-d ${target.type}` : '', target.path]
    .filter(part => part !== '')
    .join(' ')
}

/**
 * Wear and temperature warnings from `smartctl -A` output
 */
export function ssdWarnings(output: string, thresholds: Thresholds): string[] {
  const warnings: string[] = []
  for (const line of output.split('\n')) {
    const wear = /Percentage Used:\s+(\d+)%/.exec(line)
    if (wear) {
      const used = Number(wear[1])
      if (exceedsThreshold(used, thresholds.ssdWearWarn)) {
        warnings.push(`Wear (${used}%) exceeds the limit.`)
      }
      continue
    }
    let temperature: number | null = null
    const nvmeTemperature = /^Temperature:\s+(\d+) Celsius/.exec(line.trim())
    if (nvmeTemperature) {
      temperature = Number(nvmeTemperature[1])
    } else if (line.includes('Temperature_Celsius')) {
      // ATA attribute table: RAW_VALUE is the tenth column
      temperature = parseNumber(line.trim().split(/\s+/)[9])
    }
    if (temperature !== null && exceedsThreshold(temperature, thresholds.ssdTemperatureWarn)) {
      warnings.push(`Temperature (${temperature}°C) exceeds the limit.`)
    }
  }
  return warnings
}

/**
 * Checks S.M.A.R.T. health of the disks named on the command line
 */
export class DiskHealthCheck extends BaseCheck {
  readonly id: CheckId = 'disk-health'
  readonly category = 'Disk Health (S.M.A.R.T.)'
  readonly item = 'smartctl Tool'

  constructor(private readonly disks: readonly string[]) {
    super()
  }

  async check(context: CheckContext): Promise<Finding[]> {
    const findings: Finding[] = []
    const probe = await this.runRecorded(context, 'smartctl -V', findings)
    if (probe === null) {
      return findings
    }
    if (probe.exitCode !== 0) {
      return [this.finding('Fail', 'P3-Medium', "The 'smartctl' tool was not found.")]
    }

    for (const disk of this.disks) {
      await this.checkDisk(context, parseDiskTarget(disk), findings)
    }
    return findings
  }

  private async checkDisk(context: CheckContext, target: DiskTarget, findings: Finding[]): Promise<void> {
    const item = `Disk ${target.path}`
    const health = await this.runRecorded(context, smartctl('-H', target), findings, item)
    if (health === null) {
      return
    }
    const { output } = health

    let status: Status = 'Fail'
    let priority: Priority = 'P2-High'
    let details = `Could not determine the S.M.A.R.T. state. Output: ${output}`

    if (output.includes('PASSED')) {
      status = 'Normal'
      priority = 'P4-Info'
      details = 'The S.M.A.R.T. self-assessment test passed.'
    } else if (output.includes('FAILED')) {
      status = 'Fail'
      priority = 'P1-Critical'
      details = 'The S.M.A.R.T. test FAILED. Replacing the disk is recommended.'
    } else if (output.includes('Disabled')) {
      status = 'Warn'
      priority = 'P3-Medium'
      details = 'S.M.A.R.T. support is disabled.'
    }

    if (status === 'Normal' && await this.isSolidState(context, target)) {
      const attributes = await this.runRecorded(context, smartctl('-A', target), findings, item)
      const warnings = attributes === null ? [] : ssdWarnings(attributes.output, context.config.thresholds)
      if (warnings.length > 0) {
        status = 'Warn'
        priority = 'P2-High'
        details = `${details} ${warnings.join(' ')}`
      }
    }

    findings.push(this.finding(status, priority, details, item))
  }

  private async isSolidState(context: CheckContext, target: DiskTarget): Promise<boolean> {
    try {
      const rotational = await context.files.read(`/sys/block/${basename(target.path)}/queue/rotational`)
      return rotational.trim() === '0'
    } catch {
      // partitions and RAID volumes have no queue entry
      return false
    }
  }
}
