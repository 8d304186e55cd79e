import { minimatch } from 'minimatch'
import { BaseCheck, type CheckContext } from './base.js'
import { parseInteger } from './utils.js'
import type { CheckId, Finding } from '../../types/index.js'

const PROC_NET_DEV = '/proc/net/dev'

/**
 * Error and drop counters of one interface
 */
export interface InterfaceCounters {
  name: string
  rxErrors: number
  rxDropped: number
  txErrors: number
  txDropped: number
}

/**
 * Parse /proc/net/dev, skipping the two header lines and malformed rows
 */
export function parseNetDev(content: string): InterfaceCounters[] {
  const counters: InterfaceCounters[] = []
  for (const line of content.split('\n').slice(2)) {
    const separator = line.indexOf(':')
    if (separator <= 0) {
      continue
    }
    const name = line.slice(0, separator).trim()
    const fields = line.slice(separator + 1).trim().split(/\s+/)
    const [rxErrors, rxDropped, txErrors, txDropped] = [fields[2], fields[3], fields[10], fields[11]].map(parseInteger)
    if (rxErrors === null || rxDropped === null || txErrors === null || txDropped === null) {
      continue
    }
    counters.push({ name, rxErrors, rxDropped, txErrors, txDropped })
  }
  return counters
}

export function isIgnoredInterface(name: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(name, pattern))
}

/**
 * Checks error and drop counters of regular network interfaces
 */
export class NetworkErrorCheck extends BaseCheck {
  readonly id: CheckId = 'network'
  readonly category = 'Network Health'
  readonly item = 'Network Interface Errors'

  async check(context: CheckContext): Promise<Finding[]> {
    let content: string
    try {
      content = await context.files.read(PROC_NET_DEV)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return [this.finding('Fail', 'P3-Medium', `Could not read ${PROC_NET_DEV}: ${message}`)]
    }

    const ignore = context.config.network.ignoreInterfaces
    const findings: Finding[] = []

    for (const iface of parseNetDev(content)) {
      if (isIgnoredInterface(iface.name, ignore)) {
        continue
      }
      const errors = iface.rxErrors + iface.txErrors
      const dropped = iface.rxDropped + iface.txDropped
      if (errors > 0 || dropped > 0) {
        findings.push(this.finding(
          'Warn',
          'P3-Medium',
          `Errors: ${errors} (RX: ${iface.rxErrors}, TX: ${iface.txErrors}), ` +
          `Dropped: ${dropped} (RX: ${iface.rxDropped}, TX: ${iface.txDropped})`,
          `Interface ${iface.name}`
        ))
      }
    }

    if (findings.length === 0) {
      findings.push(this.finding('Normal', 'P4-Info', 'No errors or dropped packets found.'))
    }
    return findings
  }
}
