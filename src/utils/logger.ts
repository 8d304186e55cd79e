import chalk from 'chalk'
import type { Status } from '../types/finding.js'
import { formatTimestamp } from './format.js'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel
  quiet: boolean
}

interface LevelStyle {
  rank: number
  color: (s: string) => string
  write: (message: string, ...args: unknown[]) => void
}

// console methods are looked up at call time so test spies see the calls
const LEVELS: Record<LogLevel, LevelStyle> = {
  debug: { rank: 0, color: chalk.gray, write: (m, ...a) => console.debug(m, ...a) },
  info: { rank: 1, color: chalk.blue, write: (m, ...a) => console.info(m, ...a) },
  warn: { rank: 2, color: chalk.yellow, write: (m, ...a) => console.warn(m, ...a) },
  error: { rank: 3, color: chalk.red, write: (m, ...a) => console.error(m, ...a) }
}

const STATUS_COLORS: Record<Status, (s: string) => string> = {
  Fail: chalk.bgRed.white,
  Warn: chalk.yellow,
  Normal: chalk.green
}

let config: LoggerConfig = {
  level: 'info',
  quiet: false
}

/**
 * Configure the logger
 */
export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options }
}

/**
 * Quiet mode keeps errors only
 */
function shouldLog(level: LogLevel): boolean {
  if (config.quiet && level !== 'error') {
    return false
  }
  return LEVELS[level].rank >= LEVELS[config.level].rank
}

function log(level: LogLevel, message: string, args: unknown[]): void {
  if (!shouldLog(level)) {
    return
  }
  const style = LEVELS[level]
  const line = `[${formatTimestamp(new Date())}] [${level.toUpperCase()}] ${message}`
  style.write(style.color(line), ...args)
}

export function debug(message: string, ...args: unknown[]): void {
  log('debug', message, args)
}

export function info(message: string, ...args: unknown[]): void {
  log('info', message, args)
}

export function warn(message: string, ...args: unknown[]): void {
  log('warn', message, args)
}

export function error(message: string, ...args: unknown[]): void {
  log('error', message, args)
}

/**
 * Log a success message (always shown unless quiet)
 */
export function success(message: string): void {
  if (!config.quiet) {
    console.log(chalk.green(message))
  }
}

/**
 * Print one finding as "[STATUS] item: first line of details"
 */
export function finding(status: Status, item: string, details: string): void {
  if (config.quiet) {
    return
  }
  const label = STATUS_COLORS[status](`[${status.toUpperCase()}]`)
  console.log(`${label} ${item}: ${details.split('\n')[0]}`)
}

/**
 * Logger interface for named loggers
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

/**
 * Create a named logger; messages are prefixed with "[name]"
 */
export function createLogger(name: string): Logger {
  const named = (level: LogLevel) =>
    (message: string, ...args: unknown[]) => log(level, `[${name}] ${message}`, args)

  return {
    debug: named('debug'),
    info: named('info'),
    warn: named('warn'),
    error: named('error')
  }
}
