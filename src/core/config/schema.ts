import { z } from 'zod'

/**
 * Warn thresholds. Every comparison is `value >= threshold`.
 */
export const ThresholdsSchema = z.object({
  cpuWarn: z.number()
    .min(0, 'cpuWarn must be >= 0')
    .max(100, 'cpuWarn must be <= 100')
    .default(85)
    .describe('CPU usage percentage at which to warn'),
  memoryWarn: z.number()
    .min(0, 'memoryWarn must be >= 0')
    .max(100, 'memoryWarn must be <= 100')
    .default(85)
    .describe('Memory usage percentage at which to warn'),
  loadRatioWarn: z.number()
    .positive('loadRatioWarn must be > 0')
    .default(1.5)
    .describe('1-minute load per core at which to warn'),
  gpuTemperatureWarn: z.number()
    .default(85)
    .describe('GPU temperature in Celsius at which to warn'),
  gpuUtilizationWarn: z.number()
    .min(0)
    .max(100)
    .default(90)
    .describe('GPU utilization percentage at which to warn'),
  ssdWearWarn: z.number()
    .min(0)
    .max(100)
    .default(85)
    .describe('SSD "Percentage Used" at which to warn'),
  ssdTemperatureWarn: z.number()
    .default(70)
    .describe('SSD temperature in Celsius at which to warn'),
  beegfsUsageWarn: z.number()
    .min(0)
    .max(100)
    .default(90)
    .describe('BeeGFS partition usage percentage at which to warn'),
  minUptimeHours: z.number()
    .nonnegative()
    .default(24)
    .describe('Uptime below which a recent reboot is reported')
})

export type Thresholds = z.infer<typeof ThresholdsSchema>

/**
 * Service lists, selected by node role
 */
export const ServicesSchema = z.object({
  common: z.array(z.string().min(1))
    .default(['chronyd', 'nfs-server', 'cmdaemon', 'mysql', 'mariadb']),
  headNode: z.array(z.string().min(1))
    .default(['dhcpd', 'named', 'cmd', 'corosync', 'pacemaker', 'pcsd']),
  activeMaster: z.array(z.string().min(1))
    .default(['grafana-server', 'influxdb', 'beegfs-mon']),
  pacemakerManaged: z.array(z.string().min(1))
    .default(['beegfs-storage', 'beegfs-meta'])
    .describe('Services owned by Pacemaker, skipped when it is active')
})

export const NetworkSchema = z.object({
  ignoreInterfaces: z.array(z.string().min(1))
    .default(['lo', 'virbr*'])
    .describe('Glob patterns of interface names to skip')
})

export const InfinibandSchema = z.object({
  skipTopologyOnPortFailure: z.boolean()
    .default(false)
    .describe('Skip topology correlation when any InfiniBand port is down')
})

/**
 * Hostname prefix to site label
 */
export const ScenarioSchema = z.object({
  prefix: z.string().min(1, 'Scenario prefix is required'),
  label: z.string().min(1, 'Scenario label is required')
})

export type Scenario = z.infer<typeof ScenarioSchema>

export const OutputSchema = z.object({
  dir: z.string().min(1).default('report'),
  csvFile: z.string().min(1).default('hpc_monitoring_log.csv'),
  htmlFile: z.string().min(1).default('hpc_status_report.html')
})

/**
 * Complete configuration schema. Every field has a default, so an empty
 * document yields the built-in configuration.
 */
export const ConfigSchema = z.object({
  thresholds: ThresholdsSchema.default({}),

  services: ServicesSchema.default({}),

  network: NetworkSchema.default({}),

  infiniband: InfinibandSchema.default({}),

  hardwareErrorKeywords: z.array(z.string().min(1))
    .default(['error', 'fail', 'critical', 'fatal', 'segfault'])
    .describe('Kernel log keywords that suggest hardware trouble'),

  commandTimeoutMs: z.number()
    .int()
    .positive('commandTimeoutMs must be > 0')
    .default(30000)
    .describe('Timeout for each external command'),

  scenarios: z.array(ScenarioSchema)
    .default([]),

  output: OutputSchema.default({})
})

export type Config = z.infer<typeof ConfigSchema>

/**
 * Validate config content
 */
export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data ?? {})
}

/**
 * Validate config with detailed errors
 */
export function validateConfigSafe(
  data: unknown
): { success: true; data: Config } | { success: false; errors: z.ZodError } {
  const result = ConfigSchema.safeParse(data ?? {})
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })
}

/**
 * Built-in configuration
 */
export function defaultConfig(): Config {
  return validateConfig({})
}
