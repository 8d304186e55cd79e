import { describe, it, expect } from 'vitest'
import { NetworkErrorCheck, isIgnoredInterface, parseNetDev } from './network.js'
import { createTestContext } from './__fixtures__/context.js'

const NET_DEV = [
  'Inter-|   Receive                                                |  Transmit',
  ' face |bytes    packets errs drop fifo frame compressed multicast|bytes    packets errs drop fifo colls carrier compressed',
  '    lo: 1000 10 7 7 0 0 0 0 1000 10 0 0 0 0 0 0',
  '  eth0: 5000 50 3 2 0 0 0 0 4000 40 1 0 0 0 0 0',
  '  eth1: 5000 50 0 0 0 0 0 0 4000 40 0 0 0 0 0 0',
  'virbr0: 100 1 9 9 0 0 0 0 100 1 9 9 0 0 0 0'
].join('\n')

describe('parseNetDev', () => {
  it('reads error and drop counters per interface', () => {
    const counters = parseNetDev(NET_DEV)

    expect(counters.map(c => c.name)).toEqual(['lo', 'eth0', 'eth1', 'virbr0'])
    expect(counters[1]).toEqual({ name: 'eth0', rxErrors: 3, rxDropped: 2, txErrors: 1, txDropped: 0 })
  })

  it('skips rows with too few fields', () => {
    expect(parseNetDev('h1\nh2\n  eth0: 1 2 3')).toEqual([])
  })
})

describe('isIgnoredInterface', () => {
  it('matches exact names and globs', () => {
    expect(isIgnoredInterface('lo', ['lo', 'virbr*'])).toBe(true)
    expect(isIgnoredInterface('virbr0', ['lo', 'virbr*'])).toBe(true)
    expect(isIgnoredInterface('eth0', ['lo', 'virbr*'])).toBe(false)
  })
})

describe('NetworkErrorCheck', () => {
  const check = new NetworkErrorCheck()

  it('warns per interface with errors, skipping ignored ones', async () => {
    const findings = await check.check(createTestContext({ files: { '/proc/net/dev': NET_DEV } }))

    expect(findings).toEqual([{
      category: 'Network Health',
      item: 'Interface eth0',
      status: 'Warn',
      priority: 'P3-Medium',
      details: 'Errors: 4 (RX: 3, TX: 1), Dropped: 2 (RX: 2, TX: 0)'
    }])
  })

  it('is normal when every interface is clean', async () => {
    const context = createTestContext({
      files: { '/proc/net/dev': NET_DEV },
      config: { network: { ignoreInterfaces: ['lo', 'virbr*', 'eth0'] } }
    })

    const findings = await check.check(context)

    expect(findings).toEqual([{
      category: 'Network Health',
      item: 'Network Interface Errors',
      status: 'Normal',
      priority: 'P4-Info',
      details: 'No errors or dropped packets found.'
    }])
  })

  it('fails with P3 when the counters are unreadable', async () => {
    const [finding] = await check.check(createTestContext())

    expect(finding).toMatchObject({
      status: 'Fail',
      priority: 'P3-Medium',
      details: "Could not read /proc/net/dev: ENOENT: no such file or directory, open '/proc/net/dev'"
    })
  })
})
