/**
 * Parse a whole-string decimal integer, or null
 */
export function parseInteger(value: string | undefined): number | null {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) {
    return null
  }
  return Number.parseInt(value.trim(), 10)
}

/**
 * Parse a finite number, or null
 */
export function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') {
    return null
  }
  const parsed = Number(value.trim())
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Last `count` lines of a text block
 */
export function tailLines(text: string, count: number): string {
  return text.split('\n').slice(-count).join('\n')
}
