/**
 * Types for the state-resolver module.
 */

import type { Commit } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Phase
// ---------------------------------------------------------------------------

export type Phase =
  | { kind: 'not-started' }
  | { kind: 'dev-pr'; pr: number }
  | { kind: 'needs-review'; pr: number }
  | { kind: 'review-stale'; pr: number; round: number }
  | { kind: 'needs-assessment'; pr: number; round: number }
  | { kind: 'needs-fixes'; pr: number; round: number; count: number }
  | { kind: 'ready-to-merge'; pr: number; round: number }
  | { kind: 'merged'; pr: number }

export type PhaseKind = Phase['kind']

/** Pipeline order of the phases an open issue moves through */
export const PHASE_ORDER: readonly PhaseKind[] = [
  'not-started',
  'dev-pr',
  'needs-review',
  'review-stale',
  'needs-assessment',
  'needs-fixes',
  'ready-to-merge',
  'merged',
]

// ---------------------------------------------------------------------------
// Commit history input
// ---------------------------------------------------------------------------

/**
 * Where the commit history for review currency came from.
 *
 * `local`: the worktree's own log, with HEAD and its remote tracking ref.
 * `remote`: the PR's commit list from the code host (no worktree available).
 * `unavailable`: neither could be read; currency is treated as false.
 */
export type CommitHistory =
  | { source: 'local'; commits: Commit[]; localHead: string | null; remoteHead: string | null }
  | { source: 'remote'; commits: Commit[] }
  | { source: 'unavailable' }

export interface ReviewCurrency {
  current: boolean
  /** Latest commit that is not a mainline sync merge, if any */
  latestQualifying: Commit | null
  reason: 'newer-than-commits' | 'no-commits' | 'older-than-commits' | 'unpushed-work' | 'history-unavailable'
}
