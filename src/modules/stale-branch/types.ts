/**
 * Types for the stale-branch module.
 */

import type { BlockerEvent } from '../../core/types.js'

/** How a check let the workflow continue */
export type ContinueReason =
  /** Not on a feature branch, or mainline could not be fetched */
  | 'skipped'
  | 'up-to-date'
  | 'merged'
  /** Operator chose to keep working on the stale base */
  | 'continued-unmerged'
  /** Foreign commits came in while pushing the mainline merge */
  | 'needs-re-review'

export type StaleOutcome =
  | { kind: 'continue'; behind: number; reason: ContinueReason }
  | { kind: 'blocked'; behind: number; blocker: BlockerEvent }
  /** PR closed and branch removed; per-issue state must be rebuilt from scratch */
  | { kind: 'restarted'; behind: number }

export type StaleOption = 'restart' | 'merge' | 'continue' | 'abort'

export interface WorktreeRecord {
  path: string
  branch: string | null
  /** Entries in `git status --short` */
  uncommitted: number
  /** Local commits missing from the remote branch */
  unpushed: number
  /** Seconds since the last commit; null when the branch has none */
  ageSeconds: number | null
  behind: number
}
