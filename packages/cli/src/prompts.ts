import * as path from 'node:path'
import * as readline from 'node:readline'

/** Whether prompts can be shown (stdin is a terminal). */
export function isInteractive(): boolean {
  return process.stdin.isTTY === true
}

/**
 * Write `question` to stderr and read one line from stdin.
 *
 * @throws If stdin is not a TTY.
 *
 * @internal
 */
export async function ask(question: string): Promise<string> {
  if (!isInteractive()) {
    throw new Error('This decision needs an answer. Run this command in a terminal.')
  }
  process.stderr.write(question)
  return readLine()
}

/**
 * Confirm the share directory. An empty answer accepts `proposed`; anything
 * else is taken as a directory, relative to the current one.
 *
 * @internal
 */
export async function confirmShareDirectory(proposed: string): Promise<string> {
  const answer = await ask(
    `Share directory: ${proposed}\nPress Enter to use it, or type another directory: `,
  )
  const trimmed = answer.trim()
  return trimmed === '' ? proposed : path.resolve(trimmed)
}

function readLine(): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stderr,
    })
    rl.question('', (answer) => {
      rl.close()
      resolve(answer)
    })
  })
}
