import { config as loadEnv } from 'dotenv'

import { configSchema, type ChatConfig } from './schema.js'

/** Parses optional numeric env values, leaving blanks unset. */
function parseNumber(input: string | undefined): number | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return Number(input)
}

/**
 * Loads runtime configuration from environment and validates shape/types.
 * Values from the `.env` file fill in keys `env` does not already set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, envPath?: string): ChatConfig {
  loadEnv({ processEnv: env, ...(envPath ? { path: envPath } : {}) })

  return configSchema.parse({
    apiKey: (env.GOOGLE_API_KEY || env.GEMINI_API_KEY || '').trim(),
    model: env.CHAT_MODEL ?? 'gemini-2.5-flash',
    temperature: parseNumber(env.CHAT_TEMPERATURE) ?? 0.7,
    exitCommand: env.CHAT_EXIT_COMMAND ?? 'quit',
    requestTimeoutMs: parseNumber(env.CHAT_REQUEST_TIMEOUT_MS),
    logEnabled: env.CHAT_LOG_ENABLED === 'true'
  })
}
