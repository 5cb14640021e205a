import { PassThrough } from 'node:stream'
import { afterEach, describe, expect, it, vi } from 'vitest'

import { createTerminalIO } from '../src/cli/console-io.js'

describe('createTerminalIO', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('prompts, reads lines and reports end of input as null', async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    const written: string[] = []
    output.on('data', (chunk) => written.push(String(chunk)))

    const io = createTerminalIO(input, output)
    input.write('hello\nquit\n')

    expect(await io.readLine('You: ')).toBe('hello')
    expect(await io.readLine('You: ')).toBe('quit')
    const last = io.readLine('You: ')
    input.end()
    expect(await last).toBeNull()
    expect(await io.readLine('You: ')).toBeNull()

    io.write('bye')
    io.close()
    await new Promise((resolve) => setImmediate(resolve))

    expect(written.join('')).toBe('You: You: You: bye\n')
  })

  it('keeps its prompt when the terminal redraws the line', async () => {
    vi.stubEnv('TERM', 'xterm')
    const input = new PassThrough()
    const output = Object.assign(new PassThrough(), { isTTY: true })
    const written: string[] = []
    output.on('data', (chunk) => written.push(String(chunk)))

    const io = createTerminalIO(input, output)
    const line = io.readLine('You: ')
    input.write('hix\x7f\r')

    expect(await line).toBe('hi')
    io.close()
    await new Promise((resolve) => setImmediate(resolve))

    const screen = written.join('')
    expect(screen).toContain('\u001b[0JYou: hi\u001b[8G')
    expect(screen).not.toContain('> ')
  })

  it('reports Ctrl-C as the end of input', async () => {
    vi.stubEnv('TERM', 'xterm')
    const input = new PassThrough()
    const output = Object.assign(new PassThrough(), { isTTY: true })

    const io = createTerminalIO(input, output)
    const line = io.readLine('You: ')
    input.write('\x03')

    expect(await line).toBeNull()
    io.close()
  })
})
