import { Effect } from 'effect'
import { describe, expect, it } from 'vitest'

import { type LogEntry, logFormatters, makeLogger, writeLog } from '../../src/observability/logger'

const fixedClock = () => new Date('2026-03-04T05:06:07.000Z')

const collect = () => {
  const entries: LogEntry[] = []
  return {
    entries,
    sink: {
      write(entry: LogEntry) {
        entries.push(entry)
      },
    },
  }
}

describe('makeLogger', () => {
  it('honors level filters and carries fields', async () => {
    const { entries, sink } = collect()
    const logger = makeLogger({ level: 'warn', format: 'json', sink })

    await Effect.runPromise(logger.log('info', 'no-op'))
    await Effect.runPromise(logger.log('warn', 'warned', { detail: true }))

    expect(entries.length).toBe(1)
    expect(entries[0]).toMatchObject({ level: 'warn', message: 'warned', fields: { detail: true } })
  })

  it('merges bound child fields under per-call fields', () => {
    const { entries, sink } = collect()
    const child = makeLogger({ level: 'debug', sink, clock: fixedClock }).child({
      controller: 'TemporalNamespace',
      serviceId: 'svc-1',
    })

    writeLog(child, 'info', 'observed', { serviceId: 'svc-2', resource: 'orders' })

    expect(entries).toEqual([
      {
        timestamp: '2026-03-04T05:06:07.000Z',
        level: 'info',
        message: 'observed',
        fields: { controller: 'TemporalNamespace', serviceId: 'svc-2', resource: 'orders' },
      },
    ])
  })

  it('keeps the parent level for child loggers', () => {
    const { entries, sink } = collect()
    const child = makeLogger({ level: 'error', sink }).child({ cache: 'SearchAttribute' })

    writeLog(child, 'warn', 'dropped')

    expect(entries).toEqual([])
  })
})

describe('logFormatters', () => {
  const entry: LogEntry = { timestamp: 't0', level: 'warn', message: 'retention truncated', fields: { days: 1 } }

  it('renders json lines', () => {
    expect(logFormatters.json(entry)).toBe(
      '{"timestamp":"t0","level":"warn","message":"retention truncated","fields":{"days":1}}',
    )
  })

  it('renders pretty lines', () => {
    expect(logFormatters.pretty(entry)).toBe('[t0] WARN retention truncated {"days":1}')
    expect(logFormatters.pretty({ timestamp: 't0', level: 'debug', message: 'plain' })).toBe('[t0] DEBUG plain')
  })
})
