/**
 * Interactive input for first-run configuration.
 *
 * The orchestrator receives a Prompter instead of reading stdin itself, so
 * setup can be driven by a scripted source.
 */

import readline from 'readline'

export interface Prompter {
  /** Ask one question and resolve with the raw answer line */
  ask(question: string): Promise<string>
  /** Print an informational line (setup instructions) */
  say(message: string): void
  /** Release the input once setup is done */
  close(): void
}

/**
 * Prompter backed by process stdin/stdout.
 *
 * One readline interface serves every question, so answers that arrive in a
 * single chunk (piped input) are queued and handed out in order. Once input
 * has ended, remaining questions resolve with an empty answer.
 */
export function createStdinPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  let rl: readline.Interface | undefined
  let ended = false
  const lines: string[] = []
  const waiting: Array<(answer: string) => void> = []

  function open(): void {
    if (rl || ended) return
    rl = readline.createInterface({ input, output })
    rl.on('line', (line) => {
      const next = waiting.shift()
      if (next) {
        next(line)
      } else {
        lines.push(line)
      }
    })
    rl.on('close', () => {
      ended = true
      for (const resolve of waiting.splice(0)) resolve('')
    })
  }

  return {
    ask(question: string): Promise<string> {
      output.write(`${question} `)
      open()

      const line = lines.shift()
      if (line !== undefined) return Promise.resolve(line)
      if (ended) return Promise.resolve('')
      return new Promise((resolve) => waiting.push(resolve))
    },
    say(message: string): void {
      output.write(`${message}\n`)
    },
    close(): void {
      ended = true
      rl?.close()
    },
  }
}
