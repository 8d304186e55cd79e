export type {
  Status,
  Priority,
  CheckId,
  Finding,
  FindingSummary,
  CheckResult
} from './finding.js'
export {
  STATUSES,
  PRIORITIES,
  createFinding,
  isIssue,
  summarizeFindings
} from './finding.js'
export type { ReportMeta, RunSummary } from './report.js'
export type { Config, Thresholds, Scenario } from '../core/config/schema.js'
