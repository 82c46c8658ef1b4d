export { createLogger, logger, LogLevels, setLogLevel } from './logger'
export type { Logger } from './logger'
