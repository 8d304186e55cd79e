import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('knowledge')

/**
 * category -> (keyword -> suggestion)
 */
export const KnowledgeBaseSchema = z.record(z.string(), z.record(z.string().min(1), z.string()))

export type KnowledgeBaseData = z.infer<typeof KnowledgeBaseSchema>

interface Entry {
  category: string
  keyword: string
  needle: string
  suggestion: string
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Remediation hints matched against finding details.
 *
 * Keywords match as case-insensitive substrings. When several keywords
 * match, the longest wins; ties fall back to category, then keyword.
 */
export class KnowledgeBase {
  private readonly entries: readonly Entry[]

  constructor(data: KnowledgeBaseData = {}) {
    const entries: Entry[] = []
    for (const [category, keywords] of Object.entries(data)) {
      for (const [keyword, suggestion] of Object.entries(keywords)) {
        entries.push({ category, keyword, needle: keyword.toLowerCase(), suggestion })
      }
    }
    this.entries = entries.sort((a, b) =>
      b.keyword.length - a.keyword.length ||
      compareCodePoints(a.category, b.category) ||
      compareCodePoints(a.keyword, b.keyword)
    )
  }

  /**
   * Load from a JSON file. A missing or malformed file yields an empty base.
   */
  static async load(path: string): Promise<KnowledgeBase> {
    let content: string
    try {
      content = await readFile(path, 'utf-8')
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.debug(`Knowledge base not available (${message}); suggestions disabled`)
      return new KnowledgeBase()
    }

    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.warn(`Ignoring malformed knowledge base ${path}: ${message}`)
      return new KnowledgeBase()
    }

    const result = KnowledgeBaseSchema.safeParse(raw)
    if (!result.success) {
      logger.warn(`Ignoring knowledge base ${path}: ${result.error.errors.map(e => e.message).join('; ')}`)
      return new KnowledgeBase()
    }
    return new KnowledgeBase(result.data)
  }

  get size(): number {
    return this.entries.length
  }

  /**
   * First suggestion whose keyword occurs in the details, or null
   */
  suggest(details: string): string | null {
    const haystack = details.toLowerCase()
    const match = this.entries.find(entry => haystack.includes(entry.needle))
    return match ? match.suggestion : null
  }
}
