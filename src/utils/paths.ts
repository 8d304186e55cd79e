import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'

// src/utils or dist/utils, two levels below the package root
const packageRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

/**
 * Absolute path of a file shipped with the package (data/, templates/, config/)
 */
export function assetPath(...segments: string[]): string {
  return resolve(packageRoot, ...segments)
}
