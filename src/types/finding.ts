/**
 * Coarse health state of a finding
 */
export type Status = 'Normal' | 'Warn' | 'Fail'

/**
 * Operator urgency, independent of status
 */
export type Priority = 'P1-Critical' | 'P2-High' | 'P3-Medium' | 'P4-Info'

export const STATUSES: readonly Status[] = ['Normal', 'Warn', 'Fail']

export const PRIORITIES: readonly Priority[] = [
  'P1-Critical',
  'P2-High',
  'P3-Medium',
  'P4-Info'
]

/**
 * Identifiers of the registered checks
 */
export type CheckId =
  | 'cpu'
  | 'memory'
  | 'load'
  | 'gpu'
  | 'services'
  | 'dmesg'
  | 'network'
  | 'infiniband'
  | 'beegfs'
  | 'uptime'
  | 'disk-health'

/**
 * A single classified diagnostic observation
 */
export interface Finding {
  /** Grouping label, e.g. "System Resources" */
  readonly category: string

  /** Resource that was checked, e.g. "mlx5_0 - Port 1" */
  readonly item: string

  readonly status: Status

  readonly priority: Priority

  /** Free-text diagnostic message, may span several lines */
  readonly details: string
}

/**
 * Per-status counts for a run
 */
export interface FindingSummary {
  normal: number
  warn: number
  fail: number
}

/**
 * Result from a single check
 */
export interface CheckResult {
  check: CheckId
  findings: Finding[]
  duration: number
  error?: string
}

/**
 * Build a frozen finding
 */
export function createFinding(
  category: string,
  item: string,
  status: Status,
  priority: Priority,
  details: string
): Finding {
  return Object.freeze({ category, item, status, priority, details })
}

/**
 * True for findings that need operator attention
 */
export function isIssue(finding: Finding): boolean {
  return finding.status !== 'Normal'
}

/**
 * Count findings by status
 */
export function summarizeFindings(findings: readonly Finding[]): FindingSummary {
  return {
    normal: findings.filter(f => f.status === 'Normal').length,
    warn: findings.filter(f => f.status === 'Warn').length,
    fail: findings.filter(f => f.status === 'Fail').length
  }
}
