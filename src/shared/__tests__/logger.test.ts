import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { configureLogger, isLogLevel, log } from '../logger'

describe('logger', () => {
  let dir: string
  let filePath: string

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'treeline-log-'))
    filePath = path.join(dir, 'treeline.log')
  })

  afterEach(async () => {
    configureLogger({ filePath: null, level: 'info', silent: false })
    await fs.promises.rm(dir, { recursive: true, force: true })
  })

  it('appends formatted lines to the log file', async () => {
    configureLogger({ filePath, level: 'info' })

    log.info('hello %s', 'world')

    const content = await fs.promises.readFile(filePath, 'utf8')
    expect(content).toMatch(/^\S+ \[INFO\] hello world\n$/)
  })

  it('drops messages below the configured level', async () => {
    configureLogger({ filePath, level: 'warn' })

    log.debug('hidden')
    log.info('hidden')
    log.warn('shown')

    const content = await fs.promises.readFile(filePath, 'utf8')
    expect(content).toMatch(/^\S+ \[WARN\] shown\n$/)
  })

  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})
