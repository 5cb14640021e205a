import type { Model } from '@google/genai'

import { AuthenticationError, toChatServiceError } from './errors.js'
import { connectGemini, type ConnectGenAi } from './genai.js'
import type { Logger, ModelDescriptor } from './types.js'

export interface ListModelsOptions {
  connect?: ConnectGenAi
  logger?: Logger
}

function toDescriptor(model: Model & { name: string }): ModelDescriptor {
  return {
    name: model.name,
    displayName: model.displayName,
    description: model.description,
    inputTokenLimit: model.inputTokenLimit,
    outputTokenLimit: model.outputTokenLimit,
    supportedActions: model.supportedActions ?? []
  }
}

/**
 * Lists the models the credential can reach. Nothing is requested until
 * the first item is pulled, and the sequence cannot be restarted once
 * consumed. Failures propagate to the caller as service errors.
 */
export async function* listModels(
  credential: string,
  options: ListModelsOptions = {}
): AsyncGenerator<ModelDescriptor, void, undefined> {
  if (!credential) {
    throw new AuthenticationError('No API key configured. Set GOOGLE_API_KEY in the environment or .env file.')
  }

  const connect = options.connect ?? connectGemini
  options.logger?.info('models.list.started')

  try {
    const pager = await connect(credential).list()
    for await (const model of pager) {
      if (model.name) yield toDescriptor({ ...model, name: model.name })
    }
  } catch (error) {
    throw toChatServiceError(error)
  }
}
