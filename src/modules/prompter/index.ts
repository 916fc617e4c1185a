export { ReadlinePrompter, createPrompter, renderChoices } from './prompter.js'
export type { Prompter, PromptChoice, ReadlinePrompterOptions } from './prompter.js'
