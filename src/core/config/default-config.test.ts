import { describe, it, expect } from 'vitest'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import { ConfigLoader } from './loader.js'
import { defaultConfig } from './schema.js'

const projectRoot = join(dirname(fileURLToPath(import.meta.url)), '../../..')

describe('config/default.yaml', () => {
  it('matches the built-in defaults', async () => {
    const loader = new ConfigLoader({ basePath: projectRoot })
    const config = await loader.load('config/default.yaml')

    expect(config).toEqual(defaultConfig())
  })
})
