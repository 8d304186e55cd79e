import { describe, it, expect } from 'vitest'
import { MemoryCheck, computeMemoryUsage, parseMeminfo } from './memory.js'
import { createTestContext } from './__fixtures__/context.js'

const MEMINFO = [
  'MemTotal:       1000000 kB',
  'MemFree:         100000 kB',
  'MemAvailable:    400000 kB',
  'Buffers:          50000 kB',
  'Cached:          200000 kB',
  'SReclaimable:     50000 kB',
  'HugePages_Total:      0'
].join('\n')

describe('parseMeminfo', () => {
  it('reads values in kB keyed without the colon', () => {
    const values = parseMeminfo(MEMINFO)

    expect(values.get('MemTotal')).toBe(1000000)
    expect(values.get('HugePages_Total')).toBe(0)
  })
})

describe('computeMemoryUsage', () => {
  it('uses MemAvailable when present', () => {
    expect(computeMemoryUsage(parseMeminfo(MEMINFO))).toBe(60)
  })

  it('falls back to free plus reclaimable caches', () => {
    const values = parseMeminfo(MEMINFO)
    values.delete('MemAvailable')

    expect(computeMemoryUsage(values)).toBe(60)
  })

  it('throws without MemTotal', () => {
    expect(() => computeMemoryUsage(new Map([['MemFree', 1]]))).toThrow('MemTotal missing')
  })
})

describe('MemoryCheck', () => {
  const check = new MemoryCheck()

  it('reports normal usage', async () => {
    const findings = await check.check(createTestContext({ files: { '/proc/meminfo': MEMINFO } }))

    expect(findings).toEqual([{
      category: 'System Resources',
      item: 'Memory Usage',
      status: 'Normal',
      priority: 'P4-Info',
      details: 'Usage of 60.0%.'
    }])
  })

  it('warns at the configured limit', async () => {
    const context = createTestContext({
      files: { '/proc/meminfo': MEMINFO },
      config: { thresholds: { memoryWarn: 60 } }
    })

    const [finding] = await check.check(context)

    expect(finding).toMatchObject({
      status: 'Warn',
      priority: 'P2-High',
      details: 'Usage of 60.0% exceeds the limit of 60%.'
    })
  })

  it('fails when meminfo lacks the totals', async () => {
    const [finding] = await check.check(createTestContext({ files: { '/proc/meminfo': 'Foo: 1 kB' } }))

    expect(finding).toMatchObject({
      status: 'Fail',
      priority: 'P1-Critical',
      details: 'Could not read /proc/meminfo: MemTotal missing'
    })
  })
})
