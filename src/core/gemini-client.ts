import type { Content } from '@google/genai'

import type { ChatConfig } from '../config/schema.js'
import {
  AuthenticationError,
  MalformedResponseError,
  UnsupportedOperationError,
  toChatServiceError
} from './errors.js'
import { connectGemini, type ConnectGenAi, type GenAiModels } from './genai.js'
import { createMessage } from './history.js'
import type { ChatModelClient, ChatResult } from './model-client.js'
import type { Logger, Message } from './types.js'

function toContents(history: readonly Message[]): Content[] {
  return history.map((message) => ({
    role: message.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: message.content }]
  }))
}

/**
 * Chat-completion client backed by the Gemini API. Every call carries the
 * whole history; no state is kept on the server between turns.
 */
export class GeminiChatClient implements ChatModelClient {
  private models: GenAiModels | null = null

  constructor(
    private readonly config: ChatConfig,
    private readonly logger: Logger,
    private readonly connect: ConnectGenAi = connectGemini
  ) {}

  async complete(history: readonly Message[]): Promise<ChatResult> {
    if (!this.config.apiKey) {
      return {
        ok: false,
        error: new AuthenticationError('No API key configured. Set GOOGLE_API_KEY in the environment or .env file.')
      }
    }

    this.logger.info('chat.request', { model: this.config.model, messages: history.length })

    try {
      const response = await this.client().generateContent({
        model: this.config.model,
        contents: toContents(history),
        config: {
          temperature: this.config.temperature,
          ...(this.config.requestTimeoutMs
            ? { httpOptions: { timeout: this.config.requestTimeoutMs } }
            : {})
        }
      })

      const text = response.text
      if (!text) {
        return { ok: false, error: new MalformedResponseError('The model returned no text in its reply.') }
      }
      return { ok: true, reply: createMessage('assistant', text) }
    } catch (error) {
      return { ok: false, error: toChatServiceError(error) }
    }
  }

  /** Function calling is not supported through this binding. */
  bindTools(): never {
    throw new UnsupportedOperationError(
      `Tool calling is not supported for model ${this.config.model} through this client.`
    )
  }

  private client(): GenAiModels {
    this.models ??= this.connect(this.config.apiKey)
    return this.models
  }
}
