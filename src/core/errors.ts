import { ApiError } from '@google/genai'

export type ChatServiceErrorKind =
  | 'authentication'
  | 'transport'
  | 'service'
  | 'malformed_response'
  | 'unsupported_operation'

/** Base class for every failure surfaced by the remote model service. */
export class ChatServiceError extends Error {
  constructor(
    readonly kind: ChatServiceErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Credential missing, malformed, or rejected by the service. */
export class AuthenticationError extends ChatServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication', message, options)
  }
}

/** The service could not be reached. */
export class TransportError extends ChatServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', message, options)
  }
}

/** The service answered with an error status other than an auth rejection. */
export class ServiceError extends ChatServiceError {
  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown }
  ) {
    super('service', message, options)
  }
}

export class MalformedResponseError extends ChatServiceError {
  constructor(message: string) {
    super('malformed_response', message)
  }
}

/** Tool/function calling is not available through this binding. */
export class UnsupportedOperationError extends ChatServiceError {
  constructor(message: string) {
    super('unsupported_operation', message)
  }
}

const INVALID_KEY_PATTERN = /api[ _-]?key/i

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Classifies anything thrown by the SDK into the service error taxonomy.
 */
export function toChatServiceError(error: unknown): ChatServiceError {
  if (error instanceof ChatServiceError) return error

  if (error instanceof ApiError) {
    const rejectedKey = error.status === 400 && INVALID_KEY_PATTERN.test(error.message)
    if (error.status === 401 || error.status === 403 || rejectedKey) {
      return new AuthenticationError(error.message, { cause: error })
    }
    return new ServiceError(error.message, error.status, { cause: error })
  }

  return new TransportError(describe(error), { cause: error })
}
