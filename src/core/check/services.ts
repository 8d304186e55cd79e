import { BaseCheck, type CheckContext } from './base.js'
import { tailLines } from './utils.js'
import type { CommandResult } from '../runner/command.js'
import type { CheckId, Finding } from '../../types/index.js'

/**
 * Role of the node in a Bright Cluster Manager setup
 */
export type NodeRole = 'common' | 'active-master' | 'passive-master' | 'head-node-unknown'

const ROLE_LABELS: Record<NodeRole, string> = {
  'common': 'Common Node',
  'active-master': 'Active BCM Master',
  'passive-master': 'Passive BCM Master',
  'head-node-unknown': 'BCM Head Node (unknown state)'
}

// An unanswered cmha probe means a common node
const NO_OUTPUT: CommandResult = { output: '', exitCode: 1 }

/**
 * Derive the node role from the first line of `cmha status`
 */
export function detectRole(output: string, exitCode: number): NodeRole {
  if (exitCode !== 0 || output.trim() === '') {
    return 'common'
  }
  const firstLine = output.split('\n')[0]
  if (firstLine.includes('running in active mode')) {
    return 'active-master'
  }
  if (firstLine.includes('running in passive mode')) {
    return 'passive-master'
  }
  return 'head-node-unknown'
}

/**
 * Checks essential systemd services for the node's role
 */
export class ServicesCheck extends BaseCheck {
  readonly id: CheckId = 'services'
  readonly category = 'Essential Services'
  readonly item = 'Service Status'

  async check(context: CheckContext): Promise<Finding[]> {
    const { services } = context.config
    const findings: Finding[] = []

    const cmha = await this.runRecorded(context, 'cmha status', findings, 'BCM Role Detection')
      ?? NO_OUTPUT
    const role = detectRole(cmha.output, cmha.exitCode)
    let toVerify: string[]

    if (role === 'common') {
      toVerify = [...services.common]
      const pacemaker = await this.runRecorded(
        context,
        'systemctl is-active pacemaker',
        findings,
        'Pacemaker Management'
      )
      if (pacemaker?.exitCode === 0) {
        const managed = services.pacemakerManaged
        findings.push(this.finding(
          'Normal',
          'P4-Info',
          `Pacemaker is active. Services (${managed.join(', ')}) are managed by the cluster and skipped here.`,
          'Pacemaker Management'
        ))
        toVerify = toVerify.filter(s => !managed.includes(s))
      }
    } else {
      if (role === 'head-node-unknown') {
        findings.push(this.finding(
          'Warn',
          'P2-High',
          `The cmha service is in an unexpected state. Output: ${cmha.output.split('\n')[0]}`,
          'CMHA State'
        ))
      }
      findings.push(this.finding(
        'Normal',
        'P4-Info',
        `Node detected as ${ROLE_LABELS[role]}. Checking the services for this role.`,
        'BCM Role Detection'
      ))
      toVerify = [...services.common, ...services.headNode]
      if (role === 'active-master') {
        toVerify.push(...services.activeMaster)
      }
    }

    for (const service of [...new Set(toVerify)].sort()) {
      const item = `Service: ${service}`
      const status = await this.runRecorded(context, `systemctl status ${service}`, findings, item)
      if (status === null) {
        continue
      }
      const { output } = status
      if (output.includes('Loaded: not-found') || output.includes('could not be found')) {
        continue
      }
      if (output.includes('Active: active (running)')) {
        findings.push(this.finding('Normal', 'P4-Info', `Service ${service} is active.`, item))
      } else {
        findings.push(this.finding(
          'Fail',
          'P1-Critical',
          `Service ${service} is inactive or failed.\nDetails:\n${tailLines(output, 5)}`,
          item
        ))
      }
    }

    return findings
  }
}
