import { createLogger, logger, LogLevels, setLogLevel } from '@dagstore/utils'
import { afterEach, describe, expect, it } from 'vitest'

describe('logger', () => {
  afterEach(() => {
    setLogLevel(LogLevels.info)
  })

  it('root logger starts at info level', () => {
    expect(logger.level).toBe(LogLevels.info)
  })

  it('createLogger returns the same instance for a tag', () => {
    expect(createLogger('alpha')).toBe(createLogger('alpha'))
    expect(createLogger('alpha')).not.toBe(createLogger('beta'))
  })

  it('setLogLevel reaches loggers created before the change', () => {
    const child = createLogger('gamma')
    expect(child.level).toBe(LogLevels.info)

    setLogLevel(LogLevels.debug)

    expect(logger.level).toBe(LogLevels.debug)
    expect(child.level).toBe(LogLevels.debug)
  })

  it('loggers created after setLogLevel start at the new level', () => {
    setLogLevel(LogLevels.warn)
    expect(createLogger('delta').level).toBe(LogLevels.warn)
  })
})
