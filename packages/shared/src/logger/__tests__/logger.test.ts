import { describe, it, expect } from 'vitest'
import { createLogger, toLogError } from '../index'
import type { LogLevel } from '../../config'

const capture = () => {
  const lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> = []
  const write = (level: LogLevel, line: string) => {
    lines.push({ level, entry: JSON.parse(line) })
  }
  return { lines, write }
}

describe('createLogger', () => {
  it('writes one JSON line per entry with service and context', () => {
    const { lines, write } = capture()
    const logger = createLogger({ service: 'api', level: 'debug', write })

    logger.info('Project created', { userId: 3, metadata: { projectId: 7 } })

    expect(lines).toHaveLength(1)
    expect(lines[0].level).toBe('info')
    expect(lines[0].entry).toMatchObject({
      level: 'info',
      service: 'api',
      message: 'Project created',
      userId: 3,
      metadata: { projectId: 7 },
    })
  })

  it('drops entries below the configured level', () => {
    const { lines, write } = capture()
    const logger = createLogger({ service: 'api', level: 'warn', write })

    logger.debug('noise')
    logger.info('noise')
    logger.warn('kept')

    expect(lines.map(line => line.entry.message)).toEqual(['kept'])
  })

  it('carries child bindings into every entry', () => {
    const { lines, write } = capture()
    const logger = createLogger({ service: 'api', level: 'info', write }).child({
      requestId: 'req-1',
    })

    logger.error('failed', { path: '/projects' })

    expect(lines[0].entry).toMatchObject({ requestId: 'req-1', path: '/projects' })
  })
})

describe('toLogError', () => {
  it('keeps message and stack of errors', () => {
    const error = new Error('boom')
    expect(toLogError(error)).toEqual({ message: 'boom', stack: error.stack })
  })

  it('stringifies anything else', () => {
    expect(toLogError(42)).toEqual({ message: '42' })
  })
})
