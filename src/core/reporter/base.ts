import type { Finding, ReportMeta } from '../../types/index.js'

/**
 * Append-only record of every run
 */
export interface AuditSink {
  readonly path: string

  /**
   * Append one row per finding, all stamped with the run timestamp
   */
  append(findings: readonly Finding[], timestamp: string): Promise<void>
}

/**
 * Human-readable report, rewritten on each render
 */
export interface ReportSink {
  readonly path: string

  /**
   * Render the findings
   * @returns false when the report could not be produced
   */
  render(findings: readonly Finding[], meta: ReportMeta): Promise<boolean>
}
