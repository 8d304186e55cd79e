import type { Finding, FindingSummary } from './finding.js'

/**
 * Host information shown in the report header
 */
export interface ReportMeta {
  hostname: string
  timestamp: string
  scenario: string
}

/**
 * Outcome of a monitoring run
 */
export interface RunSummary extends ReportMeta {
  /** All findings, in check order */
  findings: Finding[]

  /** Counts of findings by status */
  summary: FindingSummary

  /** CSV log path, or null when the log was not written (demo mode) */
  csvPath: string | null

  /** HTML report path, or null when the report was skipped */
  reportPath: string | null

  /** Whether findings came from the demo fixture */
  demo: boolean

  /** Check faults as "<check>: <message>" */
  errors: string[]

  /** Run duration in milliseconds */
  duration: number
}
