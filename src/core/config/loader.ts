import { readFile } from 'fs/promises'
import { resolve } from 'path'
import yaml from 'js-yaml'
import {
  type Config,
  defaultConfig,
  validateConfigSafe,
  formatValidationErrors
} from './schema.js'

export interface LoaderOptions {
  basePath?: string
}

/**
 * Recursively freeze a config value so checks cannot mutate it mid-run
 */
export function freezeConfig<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      freezeConfig(nested)
    }
    Object.freeze(value)
  }
  return value
}

export class ConfigLoader {
  private basePath: string

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
  }

  /**
   * Load a YAML config file over the built-in defaults
   */
  async load(configPath: string): Promise<Readonly<Config>> {
    const absolutePath = resolve(this.basePath, configPath)
    const content = await this.readConfigFile(absolutePath)

    let raw: unknown
    try {
      raw = yaml.load(content)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ConfigLoadError(
        `Invalid YAML in config file: ${configPath}`,
        absolutePath,
        [message]
      )
    }

    const validation = validateConfigSafe(raw)
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new ConfigLoadError(
        `Invalid config file: ${configPath}\n${errors.join('\n')}`,
        absolutePath,
        errors
      )
    }

    return freezeConfig(validation.data)
  }

  /**
   * Built-in configuration, used when no file is given
   */
  loadDefault(): Readonly<Config> {
    return freezeConfig(defaultConfig())
  }

  /**
   * Validate config file without loading
   */
  async validate(configPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      await this.load(configPath)
      return { valid: true, errors: [] }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)]
      }
    }
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'UNKNOWN'
      throw new ConfigLoadError(
        `Failed to read config file: ${absolutePath}`,
        absolutePath,
        [code]
      )
    }
  }
}

/**
 * Custom error for config loading failures
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Create a default loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}
