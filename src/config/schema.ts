import { z } from 'zod'

export const configSchema = z.object({
  apiKey: z.string(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  exitCommand: z.string().trim().min(1),
  requestTimeoutMs: z.number().int().positive().optional(),
  logEnabled: z.boolean()
})

export type ChatConfig = z.infer<typeof configSchema>
