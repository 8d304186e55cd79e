import { describe, it, expect, beforeEach } from 'vitest'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import { ConfigLoader, ConfigLoadError, createConfigLoader, freezeConfig } from './loader.js'

const fixturesPath = join(dirname(fileURLToPath(import.meta.url)), '__fixtures__')

describe('ConfigLoader', () => {
  let loader: ConfigLoader

  beforeEach(() => {
    loader = new ConfigLoader({ basePath: fixturesPath })
  })

  describe('load', () => {
    it('overlays a valid config file on the defaults', async () => {
      const config = await loader.load('valid-config.yaml')

      expect(config.thresholds.cpuWarn).toBe(70)
      expect(config.thresholds.loadRatioWarn).toBe(2)
      expect(config.thresholds.memoryWarn).toBe(85)
      expect(config.services.common).toEqual(['chronyd', 'slurmd'])
      expect(config.services.headNode).toContain('pcsd')
      expect(config.network.ignoreInterfaces).toEqual(['lo', 'docker*'])
      expect(config.scenarios).toEqual([{ prefix: 'gpu', label: 'GPU Partition' }])
      expect(config.commandTimeoutMs).toBe(5000)
      expect(config.output.dir).toBe('report')
    })

    it('returns a deeply frozen config', async () => {
      const config = await loader.load('valid-config.yaml')

      expect(Object.isFrozen(config)).toBe(true)
      expect(Object.isFrozen(config.thresholds)).toBe(true)
      expect(Object.isFrozen(config.services.common)).toBe(true)
    })

    it('throws ConfigLoadError for non-existent file', async () => {
      await expect(loader.load('non-existent.yaml')).rejects.toThrow(ConfigLoadError)
    })

    it('reports every validation error for an invalid config', async () => {
      try {
        await loader.load('invalid-config.yaml')
        expect.fail('Should have thrown')
      } catch (error) {
        if (!(error instanceof ConfigLoadError)) {
          throw error
        }
        const configError = error
        expect(configError.validationErrors).toEqual([
          'thresholds.cpuWarn: cpuWarn must be <= 100',
          'commandTimeoutMs: commandTimeoutMs must be > 0'
        ])
        expect(configError.configPath).toBe(join(fixturesPath, 'invalid-config.yaml'))
      }
    })

    it('wraps YAML syntax errors', async () => {
      await expect(loader.load('malformed.yaml')).rejects.toThrow(
        'Invalid YAML in config file: malformed.yaml'
      )
    })
  })

  describe('loadDefault', () => {
    it('returns the built-in thresholds', () => {
      const config = loader.loadDefault()

      expect(config.thresholds.cpuWarn).toBe(85)
      expect(config.thresholds.memoryWarn).toBe(85)
      expect(config.thresholds.loadRatioWarn).toBe(1.5)
      expect(config.infiniband.skipTopologyOnPortFailure).toBe(false)
      expect(config.network.ignoreInterfaces).toEqual(['lo', 'virbr*'])
    })
  })

  describe('validate', () => {
    it('returns valid for a correct file', async () => {
      const result = await loader.validate('valid-config.yaml')

      expect(result).toEqual({ valid: true, errors: [] })
    })

    it('returns errors for an invalid file', async () => {
      const result = await loader.validate('invalid-config.yaml')

      expect(result.valid).toBe(false)
      expect(result.errors).toHaveLength(2)
    })

    it('returns the error code for a missing file', async () => {
      const result = await loader.validate('missing.yaml')

      expect(result).toEqual({ valid: false, errors: ['ENOENT'] })
    })
  })

  describe('freezeConfig', () => {
    it('leaves primitives untouched', () => {
      expect(freezeConfig(5)).toBe(5)
      expect(freezeConfig(null)).toBeNull()
    })
  })

  describe('createConfigLoader', () => {
    it('creates a loader instance', () => {
      expect(createConfigLoader()).toBeInstanceOf(ConfigLoader)
    })
  })
})
