/**
 * Heuristic classification of foreign commits.
 *
 * An ordered chain; the first rule that matches decides. When none match
 * the injected CommitClassifier is consulted.
 */

import type { Commit } from '../../core/types.js'
import { isMainlineSyncCommit } from '../state-resolver/review-parser.js'
import type { Classification, ClassificationSource } from './types.js'

/** Subjects of commits the pipeline itself produces */
export const AUTOMATION_COMMIT_PATTERN =
  /^(fix|chore): (address|fix|resolve) review (findings|issues|feedback)|shipline.*fix-review|wip:.*auto-commit/i

export interface HeuristicInput {
  /** All foreign commits */
  foreign: Commit[]
  /** Foreign commits not reachable from mainline */
  offMainline: Commit[]
}

interface HeuristicRule {
  source: ClassificationSource
  classification: Classification
  matches(input: HeuristicInput): boolean
}

export const HEURISTIC_RULES: readonly HeuristicRule[] = [
  {
    // Everything foreign is already on mainline: a pure branch sync
    source: 'on-mainline',
    classification: 'TRIVIAL',
    matches: ({ foreign, offMainline }) => foreign.length > 0 && offMainline.length === 0,
  },
  {
    // Only "Update branch" style merges live on the branch itself
    source: 'mainline-sync',
    classification: 'TRIVIAL',
    matches: ({ offMainline }) =>
      offMainline.length > 0 && offMainline.every((c) => isMainlineSyncCommit(c.message)),
  },
  {
    source: 'automation',
    classification: 'RELATED',
    matches: ({ foreign }) =>
      foreign.length > 0 && foreign.every((c) => AUTOMATION_COMMIT_PATTERN.test(c.message)),
  },
]

export function classifyHeuristically(
  input: HeuristicInput
): { classification: Classification; source: ClassificationSource } | null {
  for (const rule of HEURISTIC_RULES) {
    if (rule.matches(input)) return { classification: rule.classification, source: rule.source }
  }
  return null
}
