import { appendFile, stat } from 'fs/promises'
import type { Finding } from '../../types/index.js'
import type { AuditSink } from './base.js'

export const CSV_HEADER = ['timestamp', 'category', 'item', 'status', 'priority', 'details'] as const

const LINE_END = '\r\n'

/**
 * Quote a field when it holds a comma, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',') + LINE_END
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false
    }
    throw error
  }
}

/**
 * CSV audit log. The header is written once, when the file is created;
 * later runs only append.
 */
export class CsvSink implements AuditSink {
  constructor(readonly path: string) {}

  async append(findings: readonly Finding[], timestamp: string): Promise<void> {
    let content = ''
    if (!(await fileExists(this.path))) {
      content += formatCsvRow(CSV_HEADER)
    }
    for (const f of findings) {
      content += formatCsvRow([timestamp, f.category, f.item, f.status, f.priority, f.details])
    }
    await appendFile(this.path, content, 'utf-8')
  }
}

/**
 * Create a new CSV sink instance
 */
export function createCsvSink(path: string): CsvSink {
  return new CsvSink(path)
}
