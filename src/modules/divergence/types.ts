/**
 * Divergence types: remote branch commits the local branch lacks, how
 * they are classified, and what resolving them produced.
 */

import type { BlockerEvent, Commit, Issue, Mode } from '../../core/types.js'

export type Classification = 'TRIVIAL' | 'RELATED' | 'UNRELATED'

export const CLASSIFICATIONS: readonly Classification[] = ['TRIVIAL', 'RELATED', 'UNRELATED']

export interface DivergenceReport {
  branch: string
  /** Worktree the report was taken in */
  cwd: string
  localHead: string
  /** Remote head seen at detection; the lease for any force push */
  remoteHead: string
  /** Commits on the remote branch missing locally, newest first */
  foreignCommits: Commit[]
  diffStat: string
  /** Local commits the remote lacks */
  localAhead: number
  /** Both sides have commits the other lacks */
  threeWay: boolean
}

export interface DivergenceContext {
  issue: number
  pr: number | null
  mode: Mode
  /** Issue details for the classifier; fetched when omitted */
  issueDetails?: Issue | null
}

/** Why a classification was reached */
export type ClassificationSource =
  | 'on-mainline'
  | 'mainline-sync'
  | 'automation'
  | 'classifier'
  | 'fallback'

export interface ClassificationResult {
  classification: Classification
  source: ClassificationSource
}

export type ResolvedAction = 'rebased' | 'force-pushed'

export type DivergenceResolution =
  | { kind: 'resolved'; action: ResolvedAction }
  | { kind: 'blocked'; blocker: BlockerEvent }
  /** Foreign commits were pulled in; the branch must be reviewed again */
  | { kind: 'needs-re-review' }

export type HeadVerification =
  | { status: 'ok' }
  | { status: 'changed'; expected: string; current: string }
  /** The head could not be read; callers do not block on this */
  | { status: 'unknown' }
