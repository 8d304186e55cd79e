import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { dirname, join } from 'path'
import { fileURLToPath } from 'url'
import { mkdtempSync, rmSync, existsSync, readFileSync } from 'fs'
import { tmpdir } from 'os'
import { createProgram, ExitCode } from './index.js'

const fixturesPath = join(dirname(fileURLToPath(import.meta.url)), '../core/config/__fixtures__')

describe('CLI Framework', () => {
  beforeEach(() => {
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called')
    })
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'debug').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  async function parse(args: string[]): Promise<void> {
    try {
      await createProgram().parseAsync(['node', 'hpcmon', ...args])
    } catch {
      // process.exit is mocked to throw
    }
  }

  describe('ExitCode', () => {
    it('should have correct exit codes', () => {
      expect(ExitCode.OK).toBe(0)
      expect(ExitCode.ERROR).toBe(1)
    })
  })

  describe('createProgram', () => {
    it('should create a program with correct name', () => {
      expect(createProgram().name()).toBe('hpcmon')
    })

    it('should have version set', () => {
      expect(createProgram().version()).toBe('1.0.0')
    })

    it('should have global options', () => {
      const optionNames = createProgram().options.map((opt) => opt.long)

      expect(optionNames).toContain('--verbose')
      expect(optionNames).toContain('--quiet')
      expect(optionNames).toContain('--config')
    })

    it('should have run, init and validate commands', () => {
      const names = createProgram().commands.map((cmd) => cmd.name())

      expect(names).toEqual(['run', 'init', 'validate'])
    })

    it('run command should have its options', () => {
      const runCmd = createProgram().commands.find((cmd) => cmd.name() === 'run')
      const options = runCmd?.options.map((opt) => opt.long)

      expect(options).toEqual(['--force-html', '--smart-disks', '--demo', '--output-dir'])
    })

    it('init command should have output option', () => {
      const initCmd = createProgram().commands.find((cmd) => cmd.name() === 'init')
      const options = initCmd?.options.map((opt) => opt.long)

      expect(options).toContain('--output')
      expect(options).toContain('--force')
    })
  })

  describe('validate command', () => {
    it('should exit with OK (0) for a valid config file', async () => {
      await parse(['validate', join(fixturesPath, 'valid-config.yaml')])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.OK)
      expect(console.info).toHaveBeenCalledWith(expect.stringContaining('Config file is valid'))
    })

    it('should exit with ERROR (1) and list the problems for an invalid config file', async () => {
      await parse(['validate', join(fixturesPath, 'invalid-config.yaml')])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Config file is invalid'))
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('cpuWarn must be <= 100'))
    })

    it('should exit with ERROR (1) for a missing config file', async () => {
      await parse(['validate', '/non-existent/config.yaml'])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
    })

    it('should suppress info output in quiet mode', async () => {
      await parse(['-q', 'validate', join(fixturesPath, 'valid-config.yaml')])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.OK)
      expect(console.info).not.toHaveBeenCalled()
    })
  })

  describe('init command', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'hpcmon-init-test-'))
    })

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true })
    })

    it('should write the default config', async () => {
      const outputPath = join(tempDir, 'node.yaml')

      await parse(['init', '-o', outputPath])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.OK)
      const content = readFileSync(outputPath, 'utf-8')
      expect(content).toContain('thresholds:')
      expect(content).toContain('cpuWarn: 85')
      expect(content).toContain('commandTimeoutMs: 30000')
    })

    it('should exit with ERROR (1) when the file exists without force', async () => {
      const outputPath = join(tempDir, 'node.yaml')
      await parse(['init', '-o', outputPath])
      vi.mocked(process.exit).mockClear()

      await parse(['init', '-o', outputPath])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
    })

    it('should overwrite with the force flag', async () => {
      const outputPath = join(tempDir, 'node.yaml')
      await parse(['init', '-o', outputPath])
      vi.mocked(process.exit).mockClear()

      await parse(['init', '-o', outputPath, '--force'])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.OK)
    })

    it('should create a config the validate command accepts', async () => {
      const outputPath = join(tempDir, 'node.yaml')
      await parse(['init', '-o', outputPath])
      vi.mocked(process.exit).mockClear()

      await parse(['validate', outputPath])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.OK)
    })

    it('should suppress info output in quiet mode', async () => {
      const outputPath = join(tempDir, 'quiet.yaml')

      await parse(['-q', 'init', '-o', outputPath])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.OK)
      expect(existsSync(outputPath)).toBe(true)
      expect(console.info).not.toHaveBeenCalled()
    })
  })

  describe('run command', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'hpcmon-run-test-'))
    })

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true })
    })

    it('should render the demo report and exit with OK (0)', async () => {
      await parse(['run', '--demo', '--output-dir', tempDir])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.OK)
      const html = readFileSync(join(tempDir, 'hpc_status_report.html'), 'utf-8')
      expect(html).toContain('<div class="item-title">mlx5_1 - Port 1 - <span>Fail</span></div>')
      expect(existsSync(join(tempDir, 'hpc_monitoring_log.csv'))).toBe(false)
    })

    it('should exit with ERROR (1) when the config file cannot be read', async () => {
      await parse(['-c', '/non-existent/config.yaml', 'run', '--demo', '--output-dir', tempDir])

      expect(process.exit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Failed to read config file'))
    })
  })
})
