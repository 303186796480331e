import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger } from '../logger.js'

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
    delete process.env.LOG_LEVEL
  })

  it('prefixes info lines with the component tag', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
    createLogger('Timer').info('started', { id: 't1' })
    expect(info).toHaveBeenCalledWith('[Pika][Timer]', 'started', { id: 't1' })
  })

  it('routes warnings and errors to the matching console methods', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const logger = createLogger('Gateway')
    logger.warn('slow')
    logger.error('failed')
    expect(warn).toHaveBeenCalledWith('[Pika][Gateway]', 'slow')
    expect(error).toHaveBeenCalledWith('[Pika][Gateway]', 'failed')
  })

  it('only prints debug lines when LOG_LEVEL is debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)
    const logger = createLogger('Assistant')
    logger.debug('hidden')
    expect(debug).not.toHaveBeenCalled()

    process.env.LOG_LEVEL = 'debug'
    logger.debug('shown')
    expect(debug).toHaveBeenCalledWith('[Pika][Assistant]', 'shown')
  })
})
