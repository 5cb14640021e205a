#!/usr/bin/env node
import { ZodError } from 'zod'

import { loadConfig } from './config/load.js'
import { ChatServiceError } from './core/errors.js'
import { logger, setLoggerMuted } from './core/logger.js'
import { listModels } from './core/model-directory.js'

/** Prints every model the configured key can reach, one name per line. */
async function main(): Promise<void> {
  const config = loadConfig()
  setLoggerMuted(!config.logEnabled)

  for await (const model of listModels(config.apiKey, { logger })) {
    console.log(model.name)
  }
}

main().catch((error: unknown) => {
  if (error instanceof ChatServiceError) {
    console.error(`⚠️ ${error.name}: ${error.message}`)
  } else if (error instanceof ZodError) {
    console.error(`Invalid configuration: ${error.message}`)
  } else {
    console.error(String(error))
  }
  process.exitCode = 1
})
