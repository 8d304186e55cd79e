import { readFile, writeFile } from 'fs/promises'
import {
  summarizeFindings,
  type Finding,
  type Priority,
  type ReportMeta,
  type Status
} from '../../types/index.js'
import type { KnowledgeBase } from '../knowledge/index.js'
import { escapeHtml } from '../../utils/format.js'
import { createLogger } from '../../utils/logger.js'
import type { ReportSink } from './base.js'

const logger = createLogger('report')

const STATUS_STYLES: Record<Status, { icon: string; className: string }> = {
  Normal: { icon: '✅', className: 'status-normal' },
  Warn: { icon: '⚠️', className: 'status-warn' },
  Fail: { icon: '❌', className: 'status-fail' }
}

const PRIORITY_CLASSES: Record<Priority, string> = {
  'P1-Critical': 'priority-critical',
  'P2-High': 'priority-high',
  'P3-Medium': 'priority-medium',
  'P4-Info': 'priority-info'
}

const PLACEHOLDER = /\{(hostname|timestamp|scenario|summary|content)\}/g

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Findings grouped by category; categories and items in code-point order
 */
export function groupByCategory(findings: readonly Finding[]): Array<[string, Finding[]]> {
  const groups = new Map<string, Finding[]>()
  for (const finding of findings) {
    const group = groups.get(finding.category)
    if (group) {
      group.push(finding)
    } else {
      groups.set(finding.category, [finding])
    }
  }
  return [...groups.entries()]
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([category, items]) => [category, [...items].sort((a, b) => compareCodePoints(a.item, b.item))])
}

function formatDetails(details: string): string {
  return escapeHtml(details).replace(/\r?\n/g, '<br>')
}

function renderSummary(findings: readonly Finding[]): string {
  const counts = summarizeFindings(findings)
  const entries: Array<[Status, number]> = [['Fail', counts.fail], ['Warn', counts.warn], ['Normal', counts.normal]]
  const spans = entries.map(([status, count]) =>
    `<span class="summary-item ${STATUS_STYLES[status].className}">${STATUS_STYLES[status].icon} ${status}: ${count}</span>`
  )
  return `<div class="summary">${spans.join('')}</div>`
}

/**
 * HTML report built from a template with {hostname}, {timestamp},
 * {scenario}, {summary} and {content} placeholders
 */
export class HtmlReportSink implements ReportSink {
  constructor(
    readonly path: string,
    private readonly templatePath: string,
    private readonly knowledge: KnowledgeBase
  ) {}

  /**
   * Fill the template. Placeholders are substituted in a single pass, so
   * braces inside finding details are left as they are.
   */
  generate(template: string, findings: readonly Finding[], meta: ReportMeta): string {
    const values: Record<string, string> = {
      hostname: escapeHtml(meta.hostname),
      timestamp: escapeHtml(meta.timestamp),
      scenario: escapeHtml(meta.scenario),
      summary: renderSummary(findings),
      content: this.renderContent(findings)
    }
    return template.replace(PLACEHOLDER, (match: string, key: string) => values[key] ?? match)
  }

  async render(findings: readonly Finding[], meta: ReportMeta): Promise<boolean> {
    let template: string
    try {
      template = await readFile(this.templatePath, 'utf-8')
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.warn(`Report template not available, skipping the HTML report: ${message}`)
      return false
    }

    await writeFile(this.path, this.generate(template, findings, meta), 'utf-8')
    return true
  }

  private renderContent(findings: readonly Finding[]): string {
    return groupByCategory(findings)
      .map(([category, items]) =>
        `<div class="category"><h2>${escapeHtml(category)}</h2>\n` +
        items.map(item => this.renderItem(item)).join('\n') +
        '\n</div>'
      )
      .join('\n')
  }

  private renderItem(finding: Finding): string {
    const style = STATUS_STYLES[finding.status]
    const isNormal = finding.status === 'Normal'
    const priorityTag = isNormal
      ? ''
      : `  <span class="priority-tag ${PRIORITY_CLASSES[finding.priority]}">${finding.priority}</span>\n`
    const suggestion = isNormal ? null : this.knowledge.suggest(finding.details)
    const suggestionBlock = suggestion === null
      ? ''
      : `\n    <div class="item-suggestion"><strong>Suggestion:</strong> ${escapeHtml(suggestion)}</div>`

    return `<div class="item ${style.className}">\n` +
      priorityTag +
      `  <div class="item-status">${style.icon}</div>\n` +
      '  <div class="item-content">\n' +
      `    <div class="item-title">${escapeHtml(finding.item)} - <span>${finding.status}</span></div>\n` +
      `    <div class="item-details">${formatDetails(finding.details)}</div>${suggestionBlock}\n` +
      '  </div>\n' +
      '</div>'
  }
}

/**
 * Create a new HTML report sink instance
 */
export function createHtmlReportSink(path: string, templatePath: string, knowledge: KnowledgeBase): HtmlReportSink {
  return new HtmlReportSink(path, templatePath, knowledge)
}
