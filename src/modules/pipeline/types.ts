/**
 * Types for the pipeline module.
 */

import type { BlockerEvent } from '../../core/types.js'
import type { DegradedInput } from '../state-resolver/state-resolver.js'

// ---------------------------------------------------------------------------
// Per-issue outcome
// ---------------------------------------------------------------------------

export type IssueOutcome =
  | { kind: 'merged'; pr: number }
  /** `resume` is the markdown procedure rendered from the snapshot */
  | { kind: 'blocked'; blocker: BlockerEvent; resume: string }
  | { kind: 'failed'; reason: string; degraded?: DegradedInput[] }
  /** The branch went stale again after a restart in the same run; PR closed, next run starts fresh */
  | { kind: 'restarted'; behind: number }
  /** A session limit was reached; state is saved for the next session */
  | { kind: 'suspended'; reason: string }

export type IssueOutcomeKind = IssueOutcome['kind']

export interface IssueResult {
  issue: number
  outcome: IssueOutcome
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

export interface BatchResult {
  results: IssueResult[]
  /** True when a batch-blocking blocker or a limit stopped the run */
  halted: boolean
  /** Issues never started because the batch halted */
  skipped: number[]
}
