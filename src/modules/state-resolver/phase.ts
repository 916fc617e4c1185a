/**
 * Phase derivation: pure functions over issue, PR, comments and history.
 *
 * No I/O happens here; StateResolverImpl gathers the inputs and handles
 * remote-read failures before calling in.
 */

import type { Comment, PullRequest, ReviewRecord } from '../../core/types.js'
import { latestAssessment, latestQualifyingCommit, latestReview, markedComments } from './review-parser.js'
import type { CommitHistory, Phase, ReviewCurrency } from './types.js'

export interface MarkerTags {
  review: string
  assessment: string
}

/**
 * A review is current when its timestamp is strictly later than the latest
 * qualifying commit, and the worktree has nothing unpushed.
 */
export function reviewCurrency(review: ReviewRecord, history: CommitHistory): ReviewCurrency {
  if (history.source === 'unavailable') {
    return { current: false, latestQualifying: null, reason: 'history-unavailable' }
  }

  const latestQualifying = latestQualifyingCommit(history.commits)

  if (
    history.source === 'local' &&
    history.localHead !== null &&
    history.localHead !== history.remoteHead
  ) {
    return { current: false, latestQualifying, reason: 'unpushed-work' }
  }

  if (latestQualifying === null) {
    return { current: true, latestQualifying: null, reason: 'no-commits' }
  }

  return review.timestamp > latestQualifying.committedAt
    ? { current: true, latestQualifying, reason: 'newer-than-commits' }
    : { current: false, latestQualifying, reason: 'older-than-commits' }
}

/**
 * Derive the pipeline phase for an issue.
 *
 * A closed (unmerged) PR counts as no PR: the branch was abandoned and the
 * issue starts over. Without history the review is never considered
 * current.
 */
export function resolvePhase(
  _issue: number,
  pr: PullRequest | null,
  comments: Comment[],
  markers: MarkerTags,
  history: CommitHistory = { source: 'unavailable' }
): Phase {
  if (pr === null || pr.state === 'closed') return { kind: 'not-started' }
  if (pr.state === 'merged') return { kind: 'merged', pr: pr.number }

  const review = latestReview(comments, markers.review)
  if (review === null) {
    const pushed =
      history.source === 'local' &&
      history.localHead !== null &&
      history.localHead === history.remoteHead
    return !pr.draft && pushed
      ? { kind: 'needs-review', pr: pr.number }
      : { kind: 'dev-pr', pr: pr.number }
  }

  const round = markedComments(comments, markers.review).length

  if (!reviewCurrency(review, history).current) {
    return { kind: 'review-stale', pr: pr.number, round }
  }

  const assessment = latestAssessment(comments, markers.assessment)
  if (assessment === null || assessment.timestamp < review.timestamp) {
    return { kind: 'needs-assessment', pr: pr.number, round }
  }

  const count = assessment.dispositions.ACTIONABLE_NOW
  return count > 0
    ? { kind: 'needs-fixes', pr: pr.number, round, count }
    : { kind: 'ready-to-merge', pr: pr.number, round }
}

/** Short human label, e.g. "Needs fixes (3) r2" */
export function formatPhase(phase: Phase): string {
  switch (phase.kind) {
    case 'not-started':
      return 'Not started'
    case 'dev-pr':
      return `Dev/PR #${String(phase.pr)}`
    case 'needs-review':
      return `Needs review #${String(phase.pr)}`
    case 'review-stale':
      return `Review stale #${String(phase.pr)} r${String(phase.round)}`
    case 'needs-assessment':
      return `Needs assessment #${String(phase.pr)} r${String(phase.round)}`
    case 'needs-fixes':
      return `Needs fixes (${String(phase.count)}) #${String(phase.pr)} r${String(phase.round)}`
    case 'ready-to-merge':
      return `Ready to merge #${String(phase.pr)}`
    case 'merged':
      return `Merged #${String(phase.pr)}`
  }
}
