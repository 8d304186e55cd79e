import { describe, it, expect } from 'vitest'
import { BeegfsUsageCheck, findBeegfsMounts, parseDf } from './beegfs.js'
import { CommandTimeoutError } from '../runner/command.js'
import { createTestContext, ok } from './__fixtures__/context.js'

const MOUNT = [
  'sysfs on /sys type sysfs (rw,nosuid,nodev,noexec,relatime)',
  'beegfs_nodev on /BeeGFS/scratch type beegfs (rw,relatime,cfgFile=/etc/beegfs/scratch.conf)',
  'beegfs_nodev on /BeeGFS/home type beegfs (rw,relatime,cfgFile=/etc/beegfs/home.conf)',
  'beegfs_nodev on /BeeGFS/home type beegfs (rw,relatime,cfgFile=/etc/beegfs/home.conf)'
].join('\n')

const HEADER = 'Filesystem     1K-blocks    Used Available Use% Mounted on'

describe('findBeegfsMounts', () => {
  it('returns unique sorted mount points', () => {
    expect(findBeegfsMounts(MOUNT)).toEqual(['/BeeGFS/home', '/BeeGFS/scratch'])
  })
})

describe('parseDf', () => {
  it('reads the data row', () => {
    expect(parseDf(`${HEADER}\nbeegfs_nodev 1048576 131072 917504 12% /BeeGFS/home`)).toEqual({
      size: 1048576,
      used: 131072,
      available: 917504,
      percent: 12
    })
  })

  it('returns null without a data row', () => {
    expect(parseDf(HEADER)).toBeNull()
  })
})

describe('BeegfsUsageCheck', () => {
  const check = new BeegfsUsageCheck()

  it('produces nothing without BeeGFS mounts', async () => {
    const context = createTestContext({ commands: { mount: ok('proc on /proc type proc (rw)') } })

    await expect(check.check(context)).resolves.toEqual([])
  })

  it('reports each partition and the aggregate', async () => {
    const context = createTestContext({
      commands: {
        'mount': ok(MOUNT),
        'df -k /BeeGFS/home': ok(`${HEADER}\nbeegfs_nodev 1048576 131072 917504 12% /BeeGFS/home`),
        'df -k /BeeGFS/scratch': ok(`${HEADER}\nbeegfs_nodev 1048576 983040 65536 94% /BeeGFS/scratch`)
      }
    })

    const findings = await check.check(context)

    expect(findings).toEqual([
      {
        category: 'BeeGFS Disk Usage',
        item: 'Partition Usage /BeeGFS/home',
        status: 'Normal',
        priority: 'P4-Info',
        details: 'Usage: 12.0%. Total: 1.0 GB, Used: 128.0 MB, Available: 896.0 MB.'
      },
      {
        category: 'BeeGFS Disk Usage',
        item: 'Partition Usage /BeeGFS/scratch',
        status: 'Warn',
        priority: 'P2-High',
        details: 'Usage: 94.0%. Total: 1.0 GB, Used: 960.0 MB, Available: 64.0 MB.'
      },
      {
        category: 'BeeGFS Disk Usage',
        item: 'Aggregate Partition Usage',
        status: 'Normal',
        priority: 'P4-Info',
        details: 'Total usage: 53.1%. Total: 2.0 GB, Used: 1.1 GB, Available: 960.0 MB.'
      }
    ])
  })

  it('skips partitions whose df output cannot be read', async () => {
    const context = createTestContext({
      commands: {
        'mount': ok(MOUNT),
        'df -k /BeeGFS/home': ok(`${HEADER}\nbeegfs_nodev 1048576 131072 917504 12% /BeeGFS/home`)
      }
    })

    const findings = await check.check(context)

    expect(findings.map(f => f.item)).toEqual(['Partition Usage /BeeGFS/home', 'Aggregate Partition Usage'])
  })

  it('continues with the next partition when df times out', async () => {
    const context = createTestContext({
      commands: {
        'mount': ok(MOUNT),
        'df -k /BeeGFS/home': ok(`${HEADER}\nbeegfs_nodev 1048576 131072 917504 12% /BeeGFS/home`),
        'df -k /BeeGFS/scratch': new CommandTimeoutError('df -k /BeeGFS/scratch', 30000)
      }
    })

    const findings = await check.check(context)

    expect(findings.map(f => [f.item, f.status])).toEqual([
      ['Partition Usage /BeeGFS/home', 'Normal'],
      ['Partition Usage /BeeGFS/scratch', 'Fail'],
      ['Aggregate Partition Usage', 'Normal']
    ])
  })
})
