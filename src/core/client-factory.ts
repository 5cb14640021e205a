import type { ChatConfig } from '../config/schema.js'
import { GeminiChatClient } from './gemini-client.js'
import { connectGemini, type ConnectGenAi } from './genai.js'
import type { ChatModelClient } from './model-client.js'
import type { Logger } from './types.js'

/**
 * Builds the chat client for the configured model. The SDK connection is
 * opened lazily on the first request.
 */
export function createChatClient(
  config: ChatConfig,
  logger: Logger,
  connect: ConnectGenAi = connectGemini
): ChatModelClient {
  return new GeminiChatClient(config, logger, connect)
}
