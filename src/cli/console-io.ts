import { createInterface } from 'node:readline'

/** Line-oriented console used by the chat loop. */
export interface ConsoleIO {
  /** Resolves to `null` once input is exhausted or interrupted. */
  readLine(prompt: string): Promise<string | null>
  write(line: string): void
  close(): void
}

export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsoleIO {
  const rl = createInterface({ input, output })
  const lines = rl[Symbol.asyncIterator]()
  let closed = false
  rl.on('close', () => {
    closed = true
  })

  // Ctrl-C ends the conversation like end of input
  rl.on('SIGINT', () => rl.close())

  return {
    async readLine(prompt) {
      if (closed) return null
      rl.setPrompt(prompt)
      rl.prompt()
      const next = await lines.next()
      return next.done ? null : next.value
    },
    write(line) {
      output.write(`${line}\n`)
    },
    close() {
      rl.close()
    }
  }
}
