/**
 * Logger tests
 */

import { describe, it, expect } from 'vitest'
import { FileNotFoundError } from '../../src/errors'
import { createLogger, elapsed, isLogLevel, noopLogger, type LoggerOptions } from '../../src/utils/logger'

const EPOCH = '1970-01-01T00:00:00.000Z'

function capture(options: LoggerOptions = {}): { lines: string[]; options: LoggerOptions } {
  const lines: string[] = []
  return { lines, options: { ...options, sink: line => lines.push(line), clock: () => new Date(0) } }
}

describe('createLogger', () => {
  it('should write tab-separated lines', () => {
    const { lines, options } = capture({ level: 'info' })
    createLogger(options).info('Processing repodata')
    expect(lines).toEqual([`${EPOCH}\tINFO\tProcessing repodata`])
  })

  it('should drop records below the level', () => {
    const { lines, options } = capture()
    const logger = createLogger(options)
    logger.debug('d')
    logger.info('i')
    logger.warn('w')
    expect(lines).toEqual([`${EPOCH}\tWARN\tw`])
  })

  it('should merge child and call fields', () => {
    const { lines, options } = capture({ level: 'debug', fields: { run: 1 } })
    createLogger(options).child({ repodata: 'x86_64-repodata' }).debug('Found manpage', { file: 'ls.1' })
    expect(lines).toEqual([`${EPOCH}\tDEBUG\tFound manpage\t{"run":1,"repodata":"x86_64-repodata","file":"ls.1"}`])
  })

  it('should serialize mandump errors', () => {
    const { lines, options } = capture()
    createLogger(options).error('Cannot open file', new FileNotFoundError('/repo/a.xbps'))
    expect(lines).toEqual([
      `${EPOCH}\tERROR\tCannot open file\t` +
        '{"error":{"name":"FileNotFoundError","code":"FILE_NOT_FOUND","message":"File not found: /repo/a.xbps","context":{"path":"/repo/a.xbps"}}}',
    ])
  })

  it('should serialize other errors by name and message', () => {
    const { lines, options } = capture()
    const logger = createLogger(options)
    logger.error('failed', new TypeError('bad'), { file: 'f' })
    logger.error('failed', 'plain')
    logger.error('failed')
    expect(lines).toEqual([
      `${EPOCH}\tERROR\tfailed\t{"file":"f","error":{"name":"TypeError","message":"bad"}}`,
      `${EPOCH}\tERROR\tfailed\t{"error":"plain"}`,
      `${EPOCH}\tERROR\tfailed`,
    ])
  })
})

describe('isLogLevel', () => {
  it('should accept the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true)
    expect(isLogLevel('trace')).toBe(false)
  })
})

describe('elapsed', () => {
  it('should report whole milliseconds', () => {
    expect(elapsed()().elapsed).toMatch(/^\d+ms$/)
    expect(Object.keys(elapsed('took')())).toEqual(['took'])
  })
})

describe('noopLogger', () => {
  it('should return itself as child', () => {
    expect(noopLogger.child({ a: 1 })).toBe(noopLogger)
  })
})
