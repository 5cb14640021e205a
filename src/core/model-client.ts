import type { ChatServiceError } from './errors.js'
import type { Message } from './types.js'

export type ChatResult =
  | { ok: true; reply: Message }
  | { ok: false; error: ChatServiceError }

/**
 * Remote chat-completion contract used by the conversation session.
 * Implementations resolve every failure into a result instead of throwing.
 */
export interface ChatModelClient {
  complete(history: readonly Message[]): Promise<ChatResult>
}
