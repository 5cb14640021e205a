import type { ConsoleIO } from '../cli/console-io.js'
import type { ChatServiceError } from './errors.js'
import { ConversationHistory, createMessage } from './history.js'
import type { ChatModelClient } from './model-client.js'
import type { Logger, Message } from './types.js'

export type SessionState = 'awaiting_input' | 'awaiting_service' | 'terminated'

export interface ConversationSessionOptions {
  client: ChatModelClient
  io: ConsoleIO
  logger: Logger
  exitCommand: string
  prompt?: string
}

/**
 * Interactive chat loop. Each turn appends the user's line, sends the whole
 * history to the model and appends the reply. Any service error ends the loop.
 */
export class ConversationSession {
  private readonly messages = new ConversationHistory()
  private current: SessionState = 'awaiting_input'
  private lastError: ChatServiceError | null = null
  private readonly exitCommand: string

  constructor(private readonly options: ConversationSessionOptions) {
    this.exitCommand = options.exitCommand.trim().toLowerCase()
  }

  get state(): SessionState {
    return this.current
  }

  get history(): readonly Message[] {
    return this.messages.snapshot()
  }

  /** Error that terminated the loop, if it did not end on user request. */
  get failure(): ChatServiceError | null {
    return this.lastError
  }

  async start(): Promise<void> {
    const { io, logger } = this.options
    if (this.current === 'terminated') return

    logger.info('session.started')

    while (this.current === 'awaiting_input') {
      const line = await io.readLine(this.options.prompt ?? 'You: ')
      if (line === null || this.isExitCommand(line)) {
        io.write('Goodbye! 👋')
        this.terminate(line === null ? 'end_of_input' : 'exit_command')
        return
      }
      await this.runTurn(line)
    }
  }

  private isExitCommand(line: string): boolean {
    return line.trim().toLowerCase() === this.exitCommand
  }

  private async runTurn(line: string): Promise<void> {
    const { client, io, logger } = this.options

    this.messages.append(createMessage('user', line))
    this.current = 'awaiting_service'

    const result = await client.complete(this.messages.snapshot())
    if (!result.ok) {
      this.lastError = result.error
      logger.error('session.turn.failed', { kind: result.error.kind, error: result.error.message })
      io.write(`⚠️ Error: ${result.error.message}`)
      this.terminate('service_error')
      return
    }

    this.messages.append(result.reply)
    io.write(`Assistant: ${result.reply.content}\n`)
    logger.info('session.turn.completed', { historyLength: this.messages.length })
    this.current = 'awaiting_input'
  }

  private terminate(reason: 'exit_command' | 'end_of_input' | 'service_error'): void {
    this.current = 'terminated'
    this.options.logger.info('session.terminated', { reason, historyLength: this.messages.length })
  }
}
