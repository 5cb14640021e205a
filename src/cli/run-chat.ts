import type { ChatConfig } from '../config/schema.js'
import type { ChatModelClient } from '../core/model-client.js'
import { ConversationSession } from '../core/session.js'
import type { Logger } from '../core/types.js'
import type { ConsoleIO } from './console-io.js'

export interface RunChatOptions {
  config: ChatConfig
  client: ChatModelClient
  io: ConsoleIO
  logger: Logger
}

/**
 * Runs one conversation to its end and returns the process exit code:
 * 0 when the user leaves, 1 when a service error ended the loop.
 */
export async function runChat({ config, client, io, logger }: RunChatOptions): Promise<number> {
  const session = new ConversationSession({ client, io, logger, exitCommand: config.exitCommand })

  io.write(`Welcome! Chatting with ${config.model} 🤖`)
  io.write(`Ask me anything, or type '${config.exitCommand}' to exit.\n`)

  try {
    await session.start()
  } finally {
    io.close()
  }
  return session.failure ? 1 : 0
}
