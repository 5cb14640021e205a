#!/usr/bin/env node
import { ZodError } from 'zod'

import { createTerminalIO } from './cli/console-io.js'
import { runChat } from './cli/run-chat.js'
import { loadConfig } from './config/load.js'
import { createChatClient } from './core/client-factory.js'
import { logger, setLoggerMuted } from './core/logger.js'

async function main(): Promise<number> {
  const config = loadConfig()
  setLoggerMuted(!config.logEnabled)

  return runChat({
    config,
    client: createChatClient(config, logger),
    io: createTerminalIO(),
    logger
  })
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    const message = error instanceof ZodError ? `Invalid configuration: ${error.message}` : String(error)
    console.error(message)
    process.exitCode = 1
  }
)
