/**
 * Barrel exports for the agent module.
 */

export { AgentRunnerImpl, createAgentRunner } from './agent-runner-impl.js'
export type { AgentRunner, AgentRunRequest, AgentRunResult } from './agent-runner.js'
export {
  developmentPrompt,
  fixPrompt,
  reviewPrompt,
  assessmentPrompt,
  classificationPrompt,
} from './prompts.js'
export type { ClassificationContext } from './prompts.js'
