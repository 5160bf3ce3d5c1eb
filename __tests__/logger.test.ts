/**
 * Tests for the structured logger.
 *
 * Source: src/lib/logger.ts
 */
import { createLogger, formatPretty, isLogLevel, type LogLevel } from '@/lib/logger'

function capture(level: LogLevel, format: 'pretty' | 'json') {
  const lines: Array<[LogLevel, string]> = []
  const log = createLogger('drive-sync', { level, format, sink: (lvl, line) => lines.push([lvl, line]) })
  return { log, lines }
}

describe('Logger', () => {
  it('drops entries below the minimum level', () => {
    const { log, lines } = capture('warn', 'json')
    log.debug('hidden')
    log.info('hidden')
    log.warn('shown')
    log.error('shown too')

    expect(lines.map(([level]) => level)).toEqual(['warn', 'error'])
  })

  it('writes one JSON object per entry', () => {
    const { log, lines } = capture('info', 'json')
    log.info('Found 2 CSV file(s)', { count: 2 })

    expect(JSON.parse(lines[0]?.[1] ?? '')).toEqual({
      level: 'info',
      message: 'Found 2 CSV file(s)',
      name: 'drive-sync',
      timestamp: expect.any(String),
      data: { count: 2 },
    })
  })

  it('serializes errors by message', () => {
    const { log, lines } = capture('info', 'json')
    log.error('Unexpected failure', new Error('boom'))

    expect(JSON.parse(lines[0]?.[1] ?? '')).toMatchObject({ data: { error: 'boom' } })
  })

  it('extends the name and context in child loggers', () => {
    const { log, lines } = capture('info', 'json')
    log.child('run', { rootId: 'root' }).child('audit').info('Log saved')

    expect(JSON.parse(lines[0]?.[1] ?? '')).toMatchObject({
      name: 'drive-sync:run:audit',
      context: { rootId: 'root' },
    })
  })
})

describe('formatPretty()', () => {
  it('renders time, level, name, message and context', () => {
    const line = formatPretty({
      level: 'warn',
      message: 'FAIL: b.csv',
      name: 'drive-sync:run',
      timestamp: '2026-10-19T16:00:00.000Z',
      context: { rootId: 'root' },
    })

    expect(line).toBe(
      '\x1b[2m16:00:00.000\x1b[0m \x1b[33mWARN \x1b[0m \x1b[1m[drive-sync:run]\x1b[0m FAIL: b.csv \x1b[2mrootId=root\x1b[0m'
    )
  })
})

describe('isLogLevel()', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel('toString')).toBe(false)
    expect(isLogLevel(undefined)).toBe(false)
  })
})
