/**
 * Prompter: asks an attended operator to pick among policy options.
 *
 * Unattended runs never construct a prompter; policy code checks the mode
 * before asking.
 */

import * as readline from 'node:readline'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('prompter')

export interface PromptChoice<T extends string> {
  /** Single key the operator types */
  key: string
  label: string
  value: T
  recommended?: boolean
}

export interface Prompter {
  /**
   * Ask until a valid key is entered. `fallback` is returned without asking
   * when no terminal is attached, and when the input closes.
   */
  choose<T extends string>(question: string, choices: PromptChoice<T>[], fallback: T): Promise<T>
}

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean }
  output?: NodeJS.WritableStream
}

export function renderChoices<T extends string>(question: string, choices: PromptChoice<T>[]): string {
  const lines = [question]
  for (const choice of choices) {
    lines.push(`  [${choice.key}] ${choice.label}${choice.recommended === true ? ' (recommended)' : ''}`)
  }
  lines.push(`Choice [${choices.map((c) => c.key).join('/')}]: `)
  return `\n${lines.join('\n')}`
}

export class ReadlinePrompter implements Prompter {
  private readonly _input: NodeJS.ReadableStream & { isTTY?: boolean }
  private readonly _output: NodeJS.WritableStream

  constructor(options: ReadlinePrompterOptions = {}) {
    this._input = options.input ?? process.stdin
    this._output = options.output ?? process.stdout
  }

  async choose<T extends string>(question: string, choices: PromptChoice<T>[], fallback: T): Promise<T> {
    if (this._input.isTTY !== true) {
      logger.warn({ question, fallback }, 'stdin is not a TTY; using fallback choice')
      return fallback
    }

    const answer = await this._ask(renderChoices(question, choices))
    if (answer === null) {
      logger.warn({ question, fallback }, 'Input closed before an answer; using fallback choice')
      return fallback
    }
    const picked = choices.find((c) => c.key.toLowerCase() === answer.trim().toLowerCase())
    if (picked !== undefined) return picked.value

    this._output.write('Invalid choice.\n')
    return this.choose(question, choices, fallback)
  }

  /** Null when the input ends before a line is read */
  private _ask(text: string): Promise<string | null> {
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input: this._input, output: this._output })
      let answered = false
      rl.on('close', () => {
        if (!answered) resolve(null)
      })
      rl.question(text, (answer) => {
        answered = true
        rl.close()
        resolve(answer)
      })
    })
  }
}

export function createPrompter(options: ReadlinePrompterOptions = {}): Prompter {
  return new ReadlinePrompter(options)
}
