/**
 * hpc-node-monitor public API
 */

export * from './types/index.js'
export {
  ConfigSchema,
  defaultConfig,
  validateConfig,
  validateConfigSafe,
  formatValidationErrors
} from './core/config/schema.js'
export { ConfigLoader, ConfigLoadError, createConfigLoader, freezeConfig } from './core/config/loader.js'
export {
  COMMAND_NOT_FOUND,
  CommandTimeoutError,
  ShellCommandRunner,
  createCommandRunner,
  isCommandNotFound,
  type CommandResult,
  type CommandRunner
} from './core/runner/command.js'
export * from './core/check/index.js'
export { KnowledgeBase } from './core/knowledge/index.js'
export { CsvSink, createCsvSink } from './core/reporter/csv.js'
export { HtmlReportSink, createHtmlReportSink } from './core/reporter/html.js'
export type { AuditSink, ReportSink } from './core/reporter/base.js'
export {
  Monitor,
  createMonitor,
  resolveScenario,
  type MonitorOptions,
  type MonitorState
} from './core/monitor/index.js'
