type LogLevel = 'debug' | 'info' | 'warn' | 'error'
type Fields = Record<string, unknown>

const SENSITIVE_KEYS = new Set([
  'apikey',
  'api_key',
  'authorization',
  'x-dashscope-api-key',
  'token',
  'secret',
  'password',
])

function isFields(value: unknown): value is Fields {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

export function redactSensitive(obj: Fields): Fields {
  const result: Fields = {}
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]'
    } else if (isFields(value)) {
      result[key] = redactSensitive(value)
    } else {
      result[key] = value
    }
  }
  return result
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
}
const RESET = '\x1b[0m'

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS
}

const isProduction = process.env.NODE_ENV === 'production'
const envLevel = process.env.LOG_LEVEL
const minLevel = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS[isProduction ? 'info' : 'warn']

function formatDev(level: LogLevel, ctx: string, message: string, fields: Fields) {
  const time = new Date().toISOString().slice(11, 23) // HH:mm:ss.SSS
  const tag = level.toUpperCase().padEnd(5)
  const rid = typeof fields.requestId === 'string' ? ` (${fields.requestId})` : ''
  const { requestId: _rid, ...rest } = fields
  const extraStr = Object.keys(rest).length ? ' ' + JSON.stringify(redactSensitive(rest)) : ''
  return `${COLORS[level]}${time} ${tag}${RESET} [${ctx}]${rid} ${message}${extraStr}`
}

function formatJson(level: LogLevel, ctx: string, message: string, fields: Fields) {
  return JSON.stringify({
    ts: new Date().toISOString(),
    level,
    ctx,
    msg: message,
    ...redactSensitive(fields),
  })
}

const format = isProduction ? formatJson : formatDev

function write(level: LogLevel, ctx: string, message: string, fields: Fields) {
  if (LEVELS[level] < minLevel) return
  // stdout belongs to the MCP stdio transport, so every level goes to stderr.
  process.stderr.write(format(level, ctx, message, fields) + '\n')
}

export interface Logger {
  debug(msg: string, extra?: Fields): void
  info(msg: string, extra?: Fields): void
  warn(msg: string, extra?: Fields): void
  error(msg: string, extra?: Fields): void
  /** Derive a logger that stamps every line with the given fields (e.g. requestId). */
  with(bindings: Fields): Logger
}

export function createLogger(ctx: string, bindings: Fields = {}): Logger {
  const emit = (level: LogLevel) => (msg: string, extra?: Fields) =>
    write(level, ctx, msg, extra ? { ...bindings, ...extra } : bindings)
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    with: (more) => createLogger(ctx, { ...bindings, ...more }),
  }
}
