import { BaseCheck, exceedsThreshold, type CheckContext } from './base.js'
import { parseNumber } from './utils.js'
import type { CheckId, Finding } from '../../types/index.js'

const QUERY_FIELDS = 'index,name,temperature.gpu,utilization.gpu,memory.used,memory.total'

/**
 * One row of `nvidia-smi --query-gpu` output
 */
export interface GpuSample {
  index: string
  name: string
  temperature: number
  utilization: number
  memoryUsed: number
  memoryTotal: number
}

/**
 * Parse a CSV row in QUERY_FIELDS order, or null when malformed
 */
export function parseGpuLine(line: string): GpuSample | null {
  const parts = line.split(',').map(p => p.trim())
  if (parts.length !== 6) {
    return null
  }
  const [index, name, ...numeric] = parts
  const [temperature, utilization, memoryUsed, memoryTotal] = numeric.map(parseNumber)
  if (temperature === null || utilization === null || memoryUsed === null || memoryTotal === null) {
    return null
  }
  return { index, name, temperature, utilization, memoryUsed, memoryTotal }
}

/**
 * Checks NVIDIA GPU temperature and utilization
 */
export class GpuCheck extends BaseCheck {
  readonly id: CheckId = 'gpu'
  readonly category = 'GPU Resources'
  readonly item = 'GPU Status'

  async check(context: CheckContext): Promise<Finding[]> {
    const probe = await context.runner.run('nvidia-smi -L')
    if (probe.exitCode !== 0) {
      // no driver or no GPU on this node
      return []
    }

    const { output, exitCode } = await context.runner.run(
      `nvidia-smi --query-gpu=${QUERY_FIELDS} --format=csv,noheader,nounits`
    )
    if (exitCode !== 0) {
      return [this.finding('Fail', 'P2-High', `Failed to run nvidia-smi. Output: ${output}`)]
    }

    const { gpuTemperatureWarn, gpuUtilizationWarn } = context.config.thresholds
    const findings: Finding[] = []

    for (const line of output.split('\n').filter(l => l.trim() !== '')) {
      const gpu = parseGpuLine(line)
      if (gpu === null) {
        findings.push(this.finding('Fail', 'P2-High', `Could not parse nvidia-smi line: "${line}"`))
        continue
      }

      const item = `GPU ${gpu.index}: ${gpu.name}`
      const warnings: string[] = []
      if (exceedsThreshold(gpu.temperature, gpuTemperatureWarn)) {
        warnings.push(`Temperature: ${gpu.temperature}°C (limit: ${gpuTemperatureWarn}°C)`)
      }
      if (exceedsThreshold(gpu.utilization, gpuUtilizationWarn)) {
        warnings.push(`Utilization: ${gpu.utilization}% (limit: ${gpuUtilizationWarn}%)`)
      }

      if (warnings.length > 0) {
        findings.push(this.finding('Warn', 'P2-High', warnings.join(', '), item))
        continue
      }
      const memoryPercent = gpu.memoryTotal > 0 ? (gpu.memoryUsed / gpu.memoryTotal) * 100 : 0
      findings.push(this.finding(
        'Normal',
        'P4-Info',
        `Temperature: ${gpu.temperature}°C, Utilization: ${gpu.utilization}%, ` +
        `Memory: ${gpu.memoryUsed.toFixed(0)}/${gpu.memoryTotal.toFixed(0)} MB (${memoryPercent.toFixed(1)}%)`,
        item
      ))
    }

    return findings
  }
}
