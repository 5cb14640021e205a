import type { Logger } from './types.js'

type Level = 'INFO' | 'WARN' | 'ERROR'

const SECRET_FIELDS = new Set(['apiKey', 'credential', 'authorization'])

let muted = false

export function setLoggerMuted(value: boolean): void {
  muted = value
}

function redact(data: Record<string, unknown>): Record<string, unknown> {
  const entries = Object.entries(data).map(([key, value]) =>
    SECRET_FIELDS.has(key) ? [key, '[redacted]'] : [key, value]
  )
  return Object.fromEntries(entries)
}

function emit(level: Level, event: string, data?: Record<string, unknown>): void {
  if (muted) return
  const payload = {
    ts: new Date().toISOString(),
    level,
    event,
    ...redact(data ?? {})
  }
  // stdout carries the chat transcript
  process.stderr.write(`${JSON.stringify(payload)}\n`)
}

/** JSON-lines logger shared by the session, the chat client and the model probe. */
export const logger: Logger = {
  info(event, data) {
    emit('INFO', event, data)
  },
  warn(event, data) {
    emit('WARN', event, data)
  },
  error(event, data) {
    emit('ERROR', event, data)
  }
}
