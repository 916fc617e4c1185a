/**
 * CommitClassifier: the slow path for divergence classification.
 *
 * The agent-backed implementation asks for a single word and accepts the
 * first classification word in the answer.
 */

import { errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { AgentRunner } from '../agent/agent-runner.js'
import { classificationPrompt, type ClassificationContext } from '../agent/prompts.js'
import type { Classification } from './types.js'

const logger = createLogger('commit-classifier')

const CLASSIFY_TIMEOUT_MS = 120_000

export interface CommitClassifierInput extends ClassificationContext {
  cwd: string
}

export interface CommitClassifier {
  /** Null when no usable answer was produced */
  classify(input: CommitClassifierInput): Promise<Classification | null>
}

export function parseClassification(text: string): Classification | null {
  const match = /\b(TRIVIAL|UNRELATED|RELATED)\b/i.exec(text)
  switch (match?.[1]?.toUpperCase()) {
    case 'TRIVIAL':
      return 'TRIVIAL'
    case 'RELATED':
      return 'RELATED'
    case 'UNRELATED':
      return 'UNRELATED'
    default:
      return null
  }
}

export class AgentCommitClassifier implements CommitClassifier {
  private readonly _runner: AgentRunner

  constructor(runner: AgentRunner) {
    this._runner = runner
  }

  async classify(input: CommitClassifierInput): Promise<Classification | null> {
    try {
      const result = await this._runner.run({
        prompt: classificationPrompt(input),
        cwd: input.cwd,
        timeoutMs: CLASSIFY_TIMEOUT_MS,
        label: 'classify',
      })
      if (result.timedOut || result.exitCode !== 0) {
        logger.warn({ exitCode: result.exitCode, timedOut: result.timedOut }, 'Classifier agent failed')
        return null
      }
      const classification = parseClassification(result.stdout)
      if (classification === null) {
        logger.warn({ output: result.stdout.slice(0, 200) }, 'Classifier answer not understood')
      }
      return classification
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, 'Classifier agent could not run')
      return null
    }
  }
}
