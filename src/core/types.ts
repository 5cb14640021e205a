export type MessageRole = 'user' | 'assistant'

/** One turn's text tagged with who produced it. */
export interface Message {
  readonly role: MessageRole
  readonly content: string
}

/** Metadata for one remote model reachable with the configured credential. */
export interface ModelDescriptor {
  name: string
  displayName?: string
  description?: string
  inputTokenLimit?: number
  outputTokenLimit?: number
  supportedActions: string[]
}

export interface Logger {
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}
