import { BaseCheck, type CheckContext } from './base.js'
import { parseInteger } from './utils.js'
import { isCommandNotFound } from '../runner/command.js'
import type { CheckId, Finding } from '../../types/index.js'

/**
 * One adapter port as reported by `ibstat`
 */
export interface IbPort {
  /** Adapter name, e.g. "mlx5_0" */
  ca: string
  /** Port number as printed, e.g. "1" */
  number: string
  /** Port attributes keyed by lower-cased name ("state", "port guid", ...) */
  attributes: Map<string, string>
}

/**
 * Remote end of a link, from `iblinkinfo`
 */
export interface IbPeer {
  lid: string
  port: string
  name: string
}

const ERROR_COUNTERS = [
  'symbol_error',
  'link_error_recovery',
  'link_downed',
  'port_rcv_errors',
  'port_xmit_discards'
] as const

const PEER_PATTERN = /==>\s+(\d+)\s+(\d+)\[\s*\]\s+"([^"]+)"/

export const SUMMARY_ITEM = 'InfiniBand Connection Summary'

function attribute(port: IbPort, key: string): string {
  return port.attributes.get(key) ?? 'N/A'
}

export function portGuid(port: IbPort): string | null {
  const guid = port.attributes.get('port guid')
  return guid ? guid.toLowerCase() : null
}

export function portItem(port: IbPort): string {
  return `${port.ca} - Port ${port.number}`
}

function isLinkUp(port: IbPort): boolean {
  return attribute(port, 'state') === 'Active' && attribute(port, 'physical state') === 'LinkUp'
}

function stateDescription(port: IbPort): string {
  return `State: ${attribute(port, 'state')}, Physical state: ${attribute(port, 'physical state')} ` +
    `(expected Active/LinkUp). Rate: ${attribute(port, 'rate')}.`
}

/**
 * Split `ibstat` output into ports, in order of appearance.
 * Adapter-level keys (before the first "Port N:") are ignored.
 */
export function parseIbstat(output: string): IbPort[] {
  const ports: IbPort[] = []
  let ca: string | null = null
  let current: IbPort | null = null

  for (const line of output.split('\n')) {
    const clean = line.trim()
    const caMatch = /^CA '([^']+)'/.exec(clean)
    if (caMatch) {
      ca = caMatch[1]
      current = null
      continue
    }
    const portMatch = /^Port (\d+):$/.exec(clean)
    if (portMatch && ca !== null) {
      current = { ca, number: portMatch[1], attributes: new Map() }
      ports.push(current)
      continue
    }
    const separator = clean.indexOf(':')
    if (current && separator > 0) {
      const key = clean.slice(0, separator).trim().toLowerCase()
      current.attributes.set(key, clean.slice(separator + 1).trim())
    }
  }

  return ports
}

/**
 * Find the remote peer of each local port GUID in `iblinkinfo` output.
 * A line belongs to the first local GUID it contains; the first peer
 * recorded for a GUID is kept.
 */
export function parseTopology(output: string, guids: readonly string[]): Map<string, IbPeer> {
  const peers = new Map<string, IbPeer>()

  for (const line of output.split('\n')) {
    if (!line.includes('==>')) {
      continue
    }
    const lower = line.toLowerCase()
    const guid = guids.find(g => lower.includes(g))
    if (guid === undefined || peers.has(guid)) {
      continue
    }
    const match = PEER_PATTERN.exec(line)
    if (match) {
      peers.set(guid, { lid: match[1], port: match[2], name: match[3].trim() })
    }
  }

  return peers
}

function counterLabel(name: string): string {
  return name
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

/**
 * Checks InfiniBand port state, error counters and fabric connectivity
 */
export class InfinibandCheck extends BaseCheck {
  readonly id: CheckId = 'infiniband'
  readonly category = 'High-Performance Network'
  readonly item = 'InfiniBand Health'

  async check(context: CheckContext): Promise<Finding[]> {
    const findings: Finding[] = []
    const version = await this.runRecorded(context, 'ibstat -V', findings)
    if (version === null || isCommandNotFound(version)) {
      return findings
    }

    const ibstat = await this.runRecorded(context, 'ibstat', findings)
    if (ibstat === null) {
      return findings
    }
    if (ibstat.exitCode !== 0) {
      return [this.finding('Fail', 'P1-Critical', `Failed to run 'ibstat'. Output: ${ibstat.output}`)]
    }

    const healthy: IbPort[] = []

    for (const port of parseIbstat(ibstat.output)) {
      const layer = attribute(port, 'link layer')
      if (layer === 'InfiniBand') {
        if (isLinkUp(port)) {
          healthy.push(port)
          const errors = await this.readErrorCounters(context, port)
          if (errors.length > 0) {
            findings.push(this.finding(
              'Warn',
              'P3-Medium',
              `Link is active but reports errors. Rate: ${attribute(port, 'rate')}. Counters: ${errors.join(', ')}.`,
              portItem(port)
            ))
          }
        } else {
          findings.push(this.finding(
            'Fail',
            'P1-Critical',
            `InfiniBand port is not operational. ${stateDescription(port)}`,
            portItem(port)
          ))
        }
      } else if (layer === 'Ethernet' && !isLinkUp(port)) {
        findings.push(this.finding(
          'Warn',
          'P3-Medium',
          `Ethernet port on the InfiniBand adapter is not operational. ${stateDescription(port)}`,
          portItem(port)
        ))
      }
    }

    const strict = context.config.infiniband.skipTopologyOnPortFailure
    if (healthy.length === 0 || (strict && findings.some(f => f.status === 'Fail'))) {
      return findings
    }

    const linkinfo = await this.runRecorded(context, 'iblinkinfo', findings)
    if (linkinfo === null) {
      return findings
    }
    if (linkinfo.exitCode !== 0) {
      findings.push(this.finding(
        'Warn',
        'P3-Medium',
        `Could not run 'iblinkinfo' to verify connections. Output: ${linkinfo.output}`
      ))
      return findings
    }

    const guids = healthy.map(portGuid).filter((g): g is string => g !== null)
    const peers = parseTopology(linkinfo.output, guids)
    const connections: string[] = []

    for (const port of healthy) {
      const guid = portGuid(port)
      const peer = guid === null ? undefined : peers.get(guid)
      if (peer === undefined) {
        findings.push(this.finding(
          'Fail',
          'P1-Critical',
          'Port is active but no connected peer was found in the fabric topology (iblinkinfo).',
          portItem(port)
        ))
        continue
      }
      connections.push(
        `  • ${port.ca}/${port.number} (LID: ${attribute(port, 'base lid')}, Rate: ${attribute(port, 'rate')} Gbps)` +
        ` -> ${peer.name} (Port: ${peer.port})`
      )
    }

    // Down ports were reported above; the summary covers the healthy ones
    if (connections.length === healthy.length) {
      findings.unshift(this.finding(
        'Normal',
        'P4-Info',
        `All active InfiniBand ports are connected:\n${connections.join('\n')}`,
        SUMMARY_ITEM
      ))
    }

    return findings
  }

  private async readErrorCounters(context: CheckContext, port: IbPort): Promise<string[]> {
    const base = `/sys/class/infiniband/${port.ca}/ports/${port.number}/counters`
    const errors: string[] = []

    for (const name of ERROR_COUNTERS) {
      let value: number | null
      try {
        value = parseInteger(await context.files.read(`${base}/${name}`))
      } catch {
        // counter not exposed by this driver
        continue
      }
      if (value !== null && value > 0) {
        errors.push(`${counterLabel(name)}: ${value}`)
      }
    }

    return errors
  }
}
