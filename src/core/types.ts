/**
 * Core domain types shared across Shipline modules.
 *
 * All timestamps are UTC epoch seconds, converted once at ingestion
 * (see modules/state-resolver/timestamps.ts).
 */

// ---------------------------------------------------------------------------
// Run mode
// ---------------------------------------------------------------------------

/**
 * `attended`: a human may be prompted to choose among options.
 * `unattended`: never prompts; every ambiguous case fails closed.
 */
export type Mode = 'attended' | 'unattended'

export type Urgency = 'normal' | 'high' | 'urgent'

// ---------------------------------------------------------------------------
// Remote entities
// ---------------------------------------------------------------------------

export interface Issue {
  number: number
  title: string
  body: string
}

export type PullRequestState = 'open' | 'merged' | 'closed'

export interface PullRequest {
  number: number
  title: string
  body: string
  /** Head ref name */
  branch: string
  headSha: string
  draft: boolean
  state: PullRequestState
  url?: string
}

export interface Commit {
  sha: string
  /** Subject line */
  message: string
  /** Author time, epoch seconds */
  timestamp: number
  /** Committer time, epoch seconds; moves when a commit is rebased */
  committedAt: number
}

/** A PR comment as read from the code host, timestamp already normalised */
export interface Comment {
  id: string
  body: string
  timestamp: number
  author?: string
}

export interface SeverityCounts {
  critical: number
  high: number
  medium: number
  low: number
}

export interface ReviewRecord {
  body: string
  timestamp: number
  severity: SeverityCounts
}

export type FindingDisposition = 'ACTIONABLE_NOW' | 'ACTIONABLE_LATER' | 'DISMISSED'

export interface AssessmentRecord {
  body: string
  timestamp: number
  dispositions: Record<FindingDisposition, number>
  /** PR head the assessment was made against, when recorded in the marker */
  headSha: string | null
}

// ---------------------------------------------------------------------------
// Blockers
// ---------------------------------------------------------------------------

/** Built-in blocker types; custom hard gates may add more */
export type BuiltinBlockerType =
  | 'critical_issues'
  | 'session_limit'
  | 'credentials_expired'
  | 'rebase_conflict'
  | 'merge_conflict'
  | 'unreviewed_divergence'
  | 'unrelated_divergence'
  | 'head_changed'
  | 'agent_failed'
  | 'fix_cycles_exhausted'
  | 'push_failed'
  | 'stale_branch'
  | 'operator_abort'
  | 'merge_failed'

export type BlockerType = BuiltinBlockerType | (string & {})

export interface BlockerEvent {
  type: BlockerType
  urgency: Urgency
  details: string
  /** When true, a batch run stops at this blocker instead of moving on */
  batchBlocking: boolean
}
