import type { Message, MessageRole } from './types.js'

export function createMessage(role: MessageRole, content: string): Message {
  return Object.freeze({ role, content })
}

/**
 * Ordered, append-only message log owned by one conversation session.
 */
export class ConversationHistory {
  private readonly messages: Message[] = []

  append(message: Message): void {
    this.messages.push(message)
  }

  /** Copy of the current messages; later appends do not show up in it. */
  snapshot(): readonly Message[] {
    return [...this.messages]
  }

  get length(): number {
    return this.messages.length
  }
}
