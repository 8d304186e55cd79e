export {
  BaseCheck,
  exceedsThreshold,
  nodeHostFiles,
  realSleep,
  type CheckContext,
  type HostFiles
} from './base.js'
export { CpuCheck, computeCpuUsage, parseCpuTimes, type CpuTimes } from './cpu.js'
export { MemoryCheck, computeMemoryUsage, parseMeminfo } from './memory.js'
export { LoadAverageCheck } from './load.js'
export { GpuCheck } from './gpu.js'
export { ServicesCheck } from './services.js'
export { DmesgCheck } from './dmesg.js'
export { NetworkErrorCheck } from './network.js'
export { InfinibandCheck, parseIbstat, parseTopology } from './infiniband.js'
export { BeegfsUsageCheck } from './beegfs.js'
export { UptimeCheck } from './uptime.js'
export { DiskHealthCheck, parseDiskList } from './disk-health.js'

import { createFinding, type CheckResult } from '../../types/index.js'
import type { BaseCheck, CheckContext } from './base.js'
import { CpuCheck } from './cpu.js'
import { MemoryCheck } from './memory.js'
import { LoadAverageCheck } from './load.js'
import { GpuCheck } from './gpu.js'
import { ServicesCheck } from './services.js'
import { DmesgCheck } from './dmesg.js'
import { NetworkErrorCheck } from './network.js'
import { InfinibandCheck } from './infiniband.js'
import { BeegfsUsageCheck } from './beegfs.js'
import { UptimeCheck } from './uptime.js'
import { DiskHealthCheck } from './disk-health.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('checks')

/**
 * Runs registered checks one after another, in registration order
 */
export class CheckOrchestrator {
  private checks: BaseCheck[] = []

  /**
   * Register a check to be executed during a run
   */
  register(check: BaseCheck): void {
    this.checks = [...this.checks, check]
  }

  /**
   * Execute all registered checks sequentially.
   * A check that rejects despite its own isolation still yields one
   * Fail finding, and the remaining checks run.
   */
  async run(context: CheckContext): Promise<CheckResult[]> {
    const results: CheckResult[] = []
    for (const check of this.checks) {
      logger.debug(`Running ${check.id}`)
      const start = Date.now()
      try {
        results.push(await check.execute(context))
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        logger.warn(`Check '${check.id}' crashed: ${message}`)
        results.push({
          check: check.id,
          findings: [createFinding(check.category, check.item, 'Fail', 'P1-Critical', `Unexpected error: ${message}`)],
          duration: Date.now() - start,
          error: message
        })
      }
    }
    return results
  }

  /**
   * Get the number of registered checks
   */
  get checkCount(): number {
    return this.checks.length
  }

  get checkIds(): string[] {
    return this.checks.map(c => c.id)
  }
}

export interface DefaultCheckOptions {
  /** Disks for the S.M.A.R.T. check; the check is skipped when empty */
  smartDisks?: readonly string[]
}

/**
 * Standard check list, in execution order
 */
export function createDefaultChecks(options: DefaultCheckOptions = {}): BaseCheck[] {
  const checks: BaseCheck[] = [
    new CpuCheck(),
    new MemoryCheck(),
    new LoadAverageCheck(),
    new GpuCheck(),
    new ServicesCheck(),
    new DmesgCheck(),
    new NetworkErrorCheck(),
    new InfinibandCheck(),
    new BeegfsUsageCheck(),
    new UptimeCheck()
  ]
  if (options.smartDisks && options.smartDisks.length > 0) {
    checks.push(new DiskHealthCheck(options.smartDisks))
  }
  return checks
}

/**
 * Orchestrator with the given checks registered, the standard ones by default
 */
export function createOrchestrator(checks: readonly BaseCheck[] = createDefaultChecks()): CheckOrchestrator {
  const orchestrator = new CheckOrchestrator()
  for (const check of checks) {
    orchestrator.register(check)
  }
  return orchestrator
}
