/**
 * PipelineEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "phase:resolved", "stale:restarted")
 */

import type { BlockerEvent } from './types.js'

export interface PipelineEvents {
  /** StateResolver produced a phase for an issue */
  'phase:resolved': {
    issue: number
    phase: string
  }

  /** A hard gate or a policy decision blocked progress */
  'blocker:raised': {
    issue: number
    blocker: BlockerEvent
  }

  /** Remote branch contains commits the local branch lacks */
  'divergence:detected': {
    branch: string
    foreignCommits: number
    threeWay: boolean
  }

  /** Divergence was classified and handled */
  'divergence:resolved': {
    branch: string
    classification: string
    outcome: 'resolved' | 'blocked' | 'needs-re-review'
  }

  /** Branch drifted past the threshold; PR closed and branch removed */
  'stale:restarted': {
    issue: number
    behind: number
  }

  /** Branch was brought up to date with mainline by merging */
  'stale:synced': {
    issue: number
    behind: number
  }

  /** A session limit was reached */
  'session:limit': {
    reason: 'token_limit' | 'time_limit'
  }

  /** An issue finished processing */
  'issue:complete': {
    issue: number
    outcome: string
  }
}
