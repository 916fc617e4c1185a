/**
 * StateResolver interface: derives one pipeline phase per issue from
 * remote PR/comment state and local commit history.
 */

import type { AssessmentRecord, Comment, PullRequest, ReviewRecord } from '../../core/types.js'
import type { CommitHistory, Phase } from './types.js'

/** Remote reads that failed while gathering inputs */
export type DegradedInput = 'pull-request' | 'comments' | 'history'

export interface ResolvedState {
  phase: Phase
  pr: PullRequest | null
  comments: Comment[]
  review: ReviewRecord | null
  assessment: AssessmentRecord | null
  history: CommitHistory
  /** Non-empty when the phase was derived from partial data */
  degraded: DegradedInput[]
}

export interface ResolveOptions {
  /** Worktree checked out on the PR branch; enables local history */
  worktreePath?: string
}

export interface StateResolver {
  /** Pure derivation from already-gathered inputs */
  phase(issue: number, pr: PullRequest | null, comments: Comment[], history?: CommitHistory): Phase

  /**
   * Gather inputs and derive the phase. Never throws: read failures are
   * logged and reported in `degraded`, and the most conservative phase the
   * remaining data supports is returned.
   */
  resolve(issue: number, options?: ResolveOptions): Promise<ResolvedState>

  /** Local history for `branch` in `worktreePath`, falling back to the PR's commits */
  history(pr: PullRequest, worktreePath?: string): Promise<CommitHistory>
}
