/**
 * ScriptedPrompter: answers prompts from a queue of values.
 *
 * An empty queue answers with the fallback. Every question is recorded
 * together with the values that were offered.
 */

import type { PromptChoice, Prompter } from '../../src/modules/prompter/prompter.js'

export class ScriptedPrompter implements Prompter {
  answers: string[]
  asked: { question: string; offered: string[] }[] = []

  constructor(answers: string[] = []) {
    this.answers = answers
  }

  async choose<T extends string>(question: string, choices: PromptChoice<T>[], fallback: T): Promise<T> {
    this.asked.push({ question, offered: choices.map((c) => c.value) })
    const next = this.answers.shift()
    if (next === undefined) return fallback
    const picked = choices.find((c) => c.value === next)
    if (picked === undefined) {
      throw new Error(`Scripted answer "${next}" not among ${choices.map((c) => c.value).join(', ')}`)
    }
    return picked.value
  }
}
