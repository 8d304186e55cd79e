import { readFile } from 'fs/promises'
import { setTimeout as delay } from 'timers/promises'
import {
  createFinding,
  type CheckId,
  type CheckResult,
  type Finding,
  type Priority,
  type Status
} from '../../types/index.js'
import type { Config } from '../config/schema.js'
import { CommandTimeoutError, type CommandResult, type CommandRunner } from '../runner/command.js'

/**
 * Read access to host files such as /proc and /sys
 */
export interface HostFiles {
  read(path: string): Promise<string>
}

/**
 * Context provided to checks during execution
 */
export interface CheckContext {
  /** Run-wide configuration, read-only */
  config: Readonly<Config>
  /** Launcher for external tools */
  runner: CommandRunner
  /** Host file access */
  files: HostFiles
  /** Wall-clock suspension */
  sleep: (ms: number) => Promise<void>
}

export const nodeHostFiles: HostFiles = {
  read: (path: string) => readFile(path, 'utf-8')
}

export async function realSleep(ms: number): Promise<void> {
  await delay(ms)
}

/**
 * Inclusive threshold rule shared by every check: the limit itself warns
 */
export function exceedsThreshold(value: number, threshold: number): boolean {
  return value >= threshold
}

/**
 * Abstract base class for all checks
 * Check implementations must extend this class
 */
export abstract class BaseCheck {
  /** Unique identifier for this check */
  abstract readonly id: CheckId
  /** Report category of the findings */
  abstract readonly category: string
  /** Default item label, also used for synthetic failure findings */
  abstract readonly item: string

  /**
   * Perform the actual check logic
   * @returns Findings produced by this check, possibly none
   */
  abstract check(context: CheckContext): Promise<Finding[]>

  /**
   * Execute the check with failure isolation and timing.
   * A fault becomes a single Fail finding instead of an exception.
   */
  async execute(context: CheckContext): Promise<CheckResult> {
    const start = Date.now()
    try {
      const findings = await this.check(context)
      return {
        check: this.id,
        findings,
        duration: Date.now() - start
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return {
        check: this.id,
        findings: [this.failureFinding(error, message)],
        duration: Date.now() - start,
        error: message
      }
    }
  }

  protected finding(
    status: Status,
    priority: Priority,
    details: string,
    item: string = this.item
  ): Finding {
    return createFinding(this.category, item, status, priority, details)
  }

  /**
   * Run a command inside a multi-step check. A timeout is recorded in
   * `findings` under `item` and yields null, leaving earlier findings intact.
   */
  protected async runRecorded(
    context: CheckContext,
    command: string,
    findings: Finding[],
    item: string = this.item
  ): Promise<CommandResult | null> {
    try {
      return await context.runner.run(command)
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        findings.push(this.timeoutFinding(error, item))
        return null
      }
      throw error
    }
  }

  private timeoutFinding(error: CommandTimeoutError, item: string): Finding {
    return this.finding('Fail', 'P2-High', `Command timed out: ${error.message}`, item)
  }

  private failureFinding(error: unknown, message: string): Finding {
    if (error instanceof CommandTimeoutError) {
      return this.timeoutFinding(error, this.item)
    }
    return this.finding('Fail', 'P1-Critical', `Unexpected error: ${message}`)
  }
}
