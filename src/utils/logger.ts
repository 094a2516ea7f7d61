type LogMeta = Record<string, unknown>

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'

const RANK: Record<Level, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 }

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase()
  switch (raw) {
    case 'debug':
      return RANK.DEBUG
    case 'warn':
      return RANK.WARN
    case 'error':
      return RANK.ERROR
    case 'silent':
      return Infinity
    default:
      return RANK.INFO
  }
}

function write(level: Level, message: string, meta?: LogMeta) {
  if (RANK[level] < threshold()) {
    return
  }

  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    message,
    ...(meta ?? {}),
  })

  if (level === 'ERROR') {
    console.error(line)
    return
  }

  if (level === 'WARN') {
    console.warn(line)
    return
  }

  console.log(line)
}

const logger = {
  debug: (message: string, meta?: LogMeta) => write('DEBUG', message, meta),
  info: (message: string, meta?: LogMeta) => write('INFO', message, meta),
  warn: (message: string, meta?: LogMeta) => write('WARN', message, meta),
  error: (message: string, meta?: LogMeta) => write('ERROR', message, meta),
}

export default logger
