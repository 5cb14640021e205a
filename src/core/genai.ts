import {
  GoogleGenAI,
  type GenerateContentParameters,
  type ListModelsParameters,
  type Model
} from '@google/genai'

/**
 * The part of the SDK's `models` module this project calls. Tests pass
 * in-process fakes of it.
 */
export interface GenAiModels {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>
  list(params?: ListModelsParameters): Promise<AsyncIterable<Model>>
}

export type ConnectGenAi = (apiKey: string) => GenAiModels

export const connectGemini: ConnectGenAi = (apiKey) => new GoogleGenAI({ apiKey }).models
