import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { closeLogger, debug, error, getLogPath, initLogger, log, warn, LOG_FILE } from './logger'

describe('logger', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mesh-recover-log-'))
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    await closeLogger()
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  it('mirrors every level into the log file', async () => {
    initLogger(join(dir, 'logs'))
    expect(getLogPath()).toBe(join(dir, 'logs', LOG_FILE))

    log('converted')
    warn('skipped 2 faces')
    error('failed', new Error('boom'))
    debug('trying 1: structured-header')
    await closeLogger()

    const lines = readFileSync(join(dir, 'logs', LOG_FILE), 'utf-8').trimEnd().split('\n')
    expect(lines[0]).toMatch(/^=== mesh-recover /)
    expect(lines[1]).toMatch(/^\d\d:\d\d:\d\d\.\d{3} \[INFO\] converted$/)
    expect(lines[2]).toMatch(/ \[WARN\] skipped 2 faces$/)
    expect(lines[3]).toMatch(/ \[ERROR\] failed Error: boom$/)
    expect(lines.at(-1)).toMatch(/ \[DEBUG\] trying 1: structured-header$/)
    expect(getLogPath()).toBe('')
  })

  it('routes levels to the matching console method', () => {
    log('a')
    warn('b')
    error('c')
    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^\d\d:\d\d:\d\d\.\d{3} a$/))
    expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/ \[WARN\] b$/))
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/ \[ERROR\] c$/))
  })
})
