import info from '../../package.json' with { type: 'json' }

const { name, version } = info

export type LogLevel = 'info' | 'warn' | 'error'

type LogFields = { message: string; [key: string]: string | number | object }

const writers: Record<LogLevel, (entry: object) => void> = {
  info: (entry) => console.log(entry),
  warn: (entry) => console.warn(entry),
  error: (entry) => console.error(entry),
}

export const log = (message: string | LogFields, level: LogLevel = 'info') => {
  let logMessage: {
    message: string
    level: LogLevel
    app: string
    version: string
    [key: string]: string | number | object
  }
  if (typeof message === 'string') {
    logMessage = {
      message,
      level,
      app: name,
      version,
    }
  } else {
    logMessage = {
      ...message,
      level,
      app: name,
      version,
    }
  }
  writers[level](logMessage)
}
