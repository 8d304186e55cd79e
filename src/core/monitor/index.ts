import { mkdir, readFile } from 'fs/promises'
import { hostname as osHostname } from 'os'
import { join, resolve } from 'path'
import { z } from 'zod'
import {
  createFinding,
  isIssue,
  summarizeFindings,
  type Finding,
  type ReportMeta,
  type RunSummary,
  type Scenario
} from '../../types/index.js'
import type { Config } from '../config/schema.js'
import {
  createDefaultChecks,
  createOrchestrator,
  nodeHostFiles,
  realSleep,
  type BaseCheck,
  type CheckContext,
  type HostFiles
} from '../check/index.js'
import { createCommandRunner, type CommandRunner } from '../runner/command.js'
import { KnowledgeBase } from '../knowledge/index.js'
import { CsvSink } from '../reporter/csv.js'
import { HtmlReportSink } from '../reporter/html.js'
import { formatTimestamp } from '../../utils/format.js'
import { assetPath } from '../../utils/paths.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('monitor')

export const UNDEFINED_SCENARIO = 'Undefined'

export type MonitorState =
  | 'idle'
  | 'initialized'
  | 'running'
  | 'aggregated'
  | 'report-skipped'
  | 'report-rendered'
  | 'done'

const DemoFindingsSchema = z.array(z.object({
  category: z.string(),
  item: z.string(),
  status: z.enum(['Normal', 'Warn', 'Fail']),
  priority: z.enum(['P1-Critical', 'P2-High', 'P3-Medium', 'P4-Info']),
  details: z.string()
}))

export interface MonitorOptions {
  config: Readonly<Config>
  /** Overrides config.output.dir */
  outputDir?: string
  /** Render the HTML report even when every finding is Normal */
  force?: boolean
  /** Report on the demo fixture instead of running checks */
  demo?: boolean
  /** Disks for the S.M.A.R.T. check */
  smartDisks?: readonly string[]
  /** Replaces the standard check list */
  checks?: readonly BaseCheck[]
  runner?: CommandRunner
  files?: HostFiles
  sleep?: (ms: number) => Promise<void>
  hostname?: () => string
  now?: () => Date
  knowledgeBasePath?: string
  templatePath?: string
  demoFindingsPath?: string
}

/**
 * Site label for a host: the first configured prefix the lower-cased
 * hostname starts with
 */
export function resolveScenario(hostname: string, scenarios: readonly Scenario[]): string {
  const host = hostname.toLowerCase()
  const match = scenarios.find(s => host.startsWith(s.prefix.toLowerCase()))
  return match ? match.label : UNDEFINED_SCENARIO
}

/**
 * Read and validate the demo findings fixture
 */
export async function loadDemoFindings(path: string): Promise<Finding[]> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Could not load demo findings from ${path}: ${message}`)
  }
  const result = DemoFindingsSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`)
    throw new Error(`Invalid demo findings in ${path}: ${issues.join('; ')}`)
  }
  return result.data.map(f => createFinding(f.category, f.item, f.status, f.priority, f.details))
}

/**
 * Drives one monitoring run:
 * idle -> initialized -> running -> aggregated -> report-(skipped|rendered) -> done
 */
export class Monitor {
  private currentState: MonitorState = 'idle'
  private knowledge = new KnowledgeBase()
  private readonly outputDir: string

  constructor(private readonly options: MonitorOptions) {
    this.outputDir = resolve(options.outputDir ?? options.config.output.dir)
  }

  get state(): MonitorState {
    return this.currentState
  }

  get csvPath(): string {
    return join(this.outputDir, this.options.config.output.csvFile)
  }

  get reportPath(): string {
    return join(this.outputDir, this.options.config.output.htmlFile)
  }

  /**
   * Load the knowledge base and create the output directory
   */
  async initialize(): Promise<void> {
    this.expectState('idle')
    this.knowledge = await KnowledgeBase.load(
      this.options.knowledgeBasePath ?? assetPath('data', 'knowledge-base.json')
    )
    logger.debug(`Loaded ${this.knowledge.size} knowledge base entries`)
    await mkdir(this.outputDir, { recursive: true })
    this.currentState = 'initialized'
  }

  /**
   * Run all checks, log every finding to CSV and render the HTML report
   * when any finding needs attention (or when forced)
   */
  async run(): Promise<RunSummary> {
    this.expectState('initialized')
    const start = Date.now()
    const { config } = this.options
    const demo = this.options.demo ?? false
    const host = (this.options.hostname ?? osHostname)()
    const meta: ReportMeta = {
      hostname: host,
      timestamp: formatTimestamp((this.options.now ?? (() => new Date()))()),
      scenario: resolveScenario(host, config.scenarios)
    }

    this.currentState = 'running'
    let findings: Finding[]
    const errors: string[] = []

    if (demo) {
      findings = await loadDemoFindings(
        this.options.demoFindingsPath ?? assetPath('data', 'demo-findings.json')
      )
    } else {
      const results = await createOrchestrator(
        this.options.checks ?? createDefaultChecks({ smartDisks: this.options.smartDisks })
      ).run(this.createContext())
      findings = results.flatMap(r => r.findings)
      for (const result of results) {
        if (result.error) {
          errors.push(`${result.check}: ${result.error}`)
        }
      }
    }
    this.currentState = 'aggregated'
    logger.debug(`Collected ${findings.length} findings`)

    let csvPath: string | null = null
    if (!demo) {
      const csv = new CsvSink(this.csvPath)
      await csv.append(findings, meta.timestamp)
      csvPath = csv.path
      logger.info(`Results logged to ${csv.path}`)
    }

    let reportPath: string | null = null
    const hasIssues = findings.some(isIssue)
    if (hasIssues || this.options.force || demo) {
      const report = new HtmlReportSink(
        this.reportPath,
        this.options.templatePath ?? assetPath('templates', 'report.html'),
        this.knowledge
      )
      if (await report.render(findings, meta)) {
        reportPath = report.path
        logger.info(`HTML report written to ${report.path}`)
      }
    } else {
      logger.info('No issues detected; the HTML report is not generated')
    }
    this.currentState = reportPath === null ? 'report-skipped' : 'report-rendered'

    const summary: RunSummary = {
      ...meta,
      findings,
      summary: summarizeFindings(findings),
      csvPath,
      reportPath,
      demo,
      errors,
      duration: Date.now() - start
    }
    this.currentState = 'done'
    return summary
  }

  private createContext(): CheckContext {
    const { config } = this.options
    return {
      config,
      runner: this.options.runner ?? createCommandRunner({ timeoutMs: config.commandTimeoutMs }),
      files: this.options.files ?? nodeHostFiles,
      sleep: this.options.sleep ?? realSleep
    }
  }

  private expectState(expected: MonitorState): void {
    if (this.currentState !== expected) {
      throw new Error(`Monitor is ${this.currentState}, expected ${expected}`)
    }
  }
}

/**
 * Create and initialize a monitor
 */
export async function createMonitor(options: MonitorOptions): Promise<Monitor> {
  const monitor = new Monitor(options)
  await monitor.initialize()
  return monitor
}
