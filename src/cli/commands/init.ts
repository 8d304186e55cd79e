/**
 * init command - write the default monitor configuration
 */

import * as fs from 'fs'
import * as path from 'path'
import { assetPath } from '../../utils/paths.js'

export const DEFAULT_OUTPUT_FILENAME = 'hpcmon.config.yaml'

export interface InitOptions {
  output?: string
  force?: boolean
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

/**
 * Copy config/default.yaml from the package to the requested location
 */
export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = path.resolve(process.cwd(), options.output ?? DEFAULT_OUTPUT_FILENAME)

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const content = fs.readFileSync(assetPath('config', 'default.yaml'), 'utf-8')

    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, content, 'utf-8')

    return { success: true, outputPath }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    return { success: false, outputPath, error: message }
  }
}
