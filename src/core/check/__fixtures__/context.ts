import { readFileSync } from 'fs'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import type { CheckContext } from '../base.js'
import type { CommandResult, CommandRunner } from '../../runner/command.js'
import { defaultConfig, validateConfig, type Config } from '../../config/schema.js'

const fixturesPath = dirname(fileURLToPath(import.meta.url))

export function readFixture(name: string): string {
  return readFileSync(join(fixturesPath, name), 'utf-8')
}

/**
 * Scripted runner: known commands return their result, an Error entry is
 * thrown, anything else behaves like a missing program.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: string[] = []

  constructor(private readonly commands: Record<string, CommandResult | Error> = {}) {}

  async run(command: string): Promise<CommandResult> {
    this.calls.push(command)
    const result = this.commands[command]
    if (result instanceof Error) {
      throw result
    }
    return result ?? { output: `sh: 1: ${command.split(' ')[0]}: not found`, exitCode: 127 }
  }
}

export function ok(output: string): CommandResult {
  return { output, exitCode: 0 }
}

export function failed(output: string, exitCode = 1): CommandResult {
  return { output, exitCode }
}

export interface TestContextOptions {
  commands?: Record<string, CommandResult | Error>
  files?: Record<string, string | string[]>
  config?: unknown
}

/**
 * Build a check context over in-memory files and scripted commands.
 * A file given as an array returns its entries on successive reads.
 */
export function createTestContext(options: TestContextOptions = {}): CheckContext & {
  runner: FakeRunner
  sleeps: number[]
} {
  const files = options.files ?? {}
  const reads = new Map<string, number>()
  const sleeps: number[] = []
  const config: Config = options.config === undefined ? defaultConfig() : validateConfig(options.config)

  return {
    config,
    runner: new FakeRunner(options.commands),
    files: {
      read: async (path: string) => {
        const content = files[path]
        if (content === undefined) {
          throw new Error(`ENOENT: no such file or directory, open '${path}'`)
        }
        if (typeof content === 'string') {
          return content
        }
        const index = reads.get(path) ?? 0
        reads.set(path, index + 1)
        const entry = content[Math.min(index, content.length - 1)]
        if (entry === undefined) {
          throw new Error(`ENOENT: no such file or directory, open '${path}'`)
        }
        return entry
      }
    },
    sleep: async (ms: number) => {
      sleeps.push(ms)
    },
    sleeps
  }
}
