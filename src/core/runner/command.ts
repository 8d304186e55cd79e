import { exec } from 'child_process'
import { promisify } from 'util'
import { createLogger } from '../../utils/logger.js'

const execAsync = promisify(exec)

const logger = createLogger('runner')

/**
 * Exit code the shell reports when a program is not installed
 */
export const COMMAND_NOT_FOUND = 127

const DEFAULT_TIMEOUT_MS = 30000

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024

/**
 * Combined output and normalized exit code of one command
 */
export interface CommandResult {
  output: string
  exitCode: number
}

/**
 * Executes shell commands for checks
 */
export interface CommandRunner {
  run(command: string): Promise<CommandResult>
}

export interface ExecOptions {
  timeout: number
  maxBuffer: number
  shell: string
}

/**
 * Signature of the process launcher, injectable for tests
 */
export type ExecFunction = (
  command: string,
  options: ExecOptions
) => Promise<{ stdout: string }>

export interface CommandRunnerOptions {
  timeoutMs?: number
  shell?: string
  exec?: ExecFunction
}

/**
 * Raised when a command outlives its timeout
 */
export class CommandTimeoutError extends Error {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number
  ) {
    super(`Command '${command}' timed out after ${timeoutMs} ms`)
    this.name = 'CommandTimeoutError'
  }
}

function defaultExec(command: string, options: ExecOptions): Promise<{ stdout: string }> {
  return execAsync(command, options)
}

function readProperty(error: Error, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined
}

/**
 * Normalize the exit status of a failed child process.
 * A process killed by a signal has no exit code and maps to 1.
 */
export function exitCodeOf(error: Error): number {
  const code = readProperty(error, 'code')
  return typeof code === 'number' && code > 0 ? code : 1
}

function outputOf(error: Error): string {
  const stdout = readProperty(error, 'stdout')
  return typeof stdout === 'string' ? stdout : error.message
}

function isTimeout(error: Error): boolean {
  return readProperty(error, 'killed') === true && readProperty(error, 'signal') === 'SIGTERM'
}

/**
 * Runs commands through /bin/sh with stderr merged into stdout
 */
export class ShellCommandRunner implements CommandRunner {
  private readonly timeoutMs: number
  private readonly shell: string
  private readonly exec: ExecFunction

  constructor(options: CommandRunnerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.shell = options.shell ?? '/bin/sh'
    this.exec = options.exec ?? defaultExec
  }

  async run(command: string): Promise<CommandResult> {
    const wrapped = `LC_ALL=C ${command} 2>&1`
    logger.debug(`$ ${command}`)

    try {
      const { stdout } = await this.exec(wrapped, {
        timeout: this.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        shell: this.shell
      })
      return { output: stdout.trim(), exitCode: 0 }
    } catch (err) {
      if (!(err instanceof Error)) {
        return { output: String(err), exitCode: 1 }
      }
      if (isTimeout(err)) {
        logger.warn(`'${command}' timed out after ${this.timeoutMs} ms`)
        throw new CommandTimeoutError(command, this.timeoutMs)
      }
      const exitCode = exitCodeOf(err)
      logger.debug(`'${command}' exited with ${exitCode}`)
      return { output: outputOf(err).trim(), exitCode }
    }
  }
}

/**
 * True when the program behind a command is not installed
 */
export function isCommandNotFound(result: CommandResult): boolean {
  return result.exitCode === COMMAND_NOT_FOUND
}

export function createCommandRunner(options?: CommandRunnerOptions): ShellCommandRunner {
  return new ShellCommandRunner(options)
}
