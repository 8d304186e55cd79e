import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, existsSync, readFileSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { executeRun } from './run.js'
import { ExitCode } from '../index.js'
import { configureLogger } from '../../utils/logger.js'
import { BaseCheck, type CheckContext } from '../../core/check/index.js'
import { FakeRunner } from '../../core/check/__fixtures__/context.js'
import { createFinding, type CheckId, type Finding, type Status } from '../../types/index.js'
import type { MonitorOptions } from '../../core/monitor/index.js'

class FixedCheck extends BaseCheck {
  readonly id: CheckId = 'uptime'
  readonly category = 'OS Health'
  readonly item = 'Uptime'

  constructor(private readonly status: Status) {
    super()
  }

  async check(_context: CheckContext): Promise<Finding[]> {
    return [createFinding(this.category, this.item, this.status, this.status === 'Normal' ? 'P4-Info' : 'P3-Medium', 'Uptime: 1:00:00.')]
  }
}

describe('run command', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'hpcmon-run-'))
    configureLogger({ level: 'info', quiet: false })
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  function overrides(status: Status): Partial<MonitorOptions> {
    return {
      checks: [new FixedCheck(status)],
      runner: new FakeRunner(),
      hostname: () => 'cn001',
      now: () => new Date(2026, 0, 10, 12, 0, 0)
    }
  }

  describe('executeRun', () => {
    it('should return OK when every finding is normal', async () => {
      const exitCode = await executeRun({ outputDir: tempDir }, {}, overrides('Normal'))

      expect(exitCode).toBe(ExitCode.OK)
      expect(existsSync(join(tempDir, 'hpc_monitoring_log.csv'))).toBe(true)
      expect(existsSync(join(tempDir, 'hpc_status_report.html'))).toBe(false)
    })

    it('should still return OK when the node has failures', async () => {
      const exitCode = await executeRun({ outputDir: tempDir }, {}, overrides('Fail'))

      expect(exitCode).toBe(ExitCode.OK)
      expect(existsSync(join(tempDir, 'hpc_status_report.html'))).toBe(true)
    })

    it('should render the report for a healthy node with --force-html', async () => {
      await executeRun({ outputDir: tempDir, forceHtml: true }, {}, overrides('Normal'))

      expect(existsSync(join(tempDir, 'hpc_status_report.html'))).toBe(true)
    })

    it('should print the summary line', async () => {
      await executeRun({ outputDir: tempDir }, {}, overrides('Warn'))

      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('cn001 (Undefined): 0 fail, 1 warn, 0 normal'))
    })

    it('should print each finding in verbose mode', async () => {
      await executeRun({ outputDir: tempDir }, { verbose: true }, overrides('Warn'))

      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('OS Health / Uptime: Uptime: 1:00:00.'))
    })

    it('should print nothing in quiet mode', async () => {
      await executeRun({ outputDir: tempDir }, { quiet: true }, overrides('Warn'))

      expect(console.log).not.toHaveBeenCalled()
    })

    it('should apply thresholds and labels from the config file', async () => {
      const configPath = join(tempDir, 'node.yaml')
      writeFileSync(configPath, 'scenarios:\n  - prefix: cn\n    label: Compute\noutput:\n  csvFile: custom.csv\n')

      await executeRun({ outputDir: tempDir }, { config: configPath }, overrides('Warn'))

      expect(readFileSync(join(tempDir, 'custom.csv'), 'utf-8')).toContain('OS Health,Uptime,Warn,P3-Medium')
      expect(readFileSync(join(tempDir, 'hpc_status_report.html'), 'utf-8')).toContain('Compute')
    })

    it('should return ERROR for an invalid config file', async () => {
      const configPath = join(tempDir, 'bad.yaml')
      writeFileSync(configPath, 'thresholds:\n  cpuWarn: 150\n')

      const exitCode = await executeRun({ outputDir: tempDir }, { config: configPath }, overrides('Normal'))

      expect(exitCode).toBe(ExitCode.ERROR)
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('thresholds.cpuWarn: cpuWarn must be <= 100'))
    })
  })
})
