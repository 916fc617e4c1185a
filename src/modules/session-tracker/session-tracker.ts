/**
 * SessionTracker interface: the durable per-clone session record.
 *
 * The record lives under the main repository root so every worktree of a
 * clone sees the same counters, approvals and notification history.
 */

import type { BlockerEvent, BlockerType, Mode } from '../../core/types.js'
import type { LimitReason, SessionState, Snapshot } from './schemas.js'

export type ContinueDecision = 'continue' | LimitReason

export interface SessionSummary {
  mode: Mode
  duration: string
  completed: number
  failed: number
  total: number
}

export interface SessionTracker {
  /** Path of the session record */
  readonly statePath: string

  /**
   * Start a new session: counters reset, start time is now, any latched
   * limit is cleared. Approvals and sent notifications carry forward.
   */
  init(mode: Mode): SessionState

  /** Current record; fresh defaults when missing or corrupt */
  read(): SessionState

  /** Atomic read-modify-write of one field */
  update<K extends keyof SessionState>(key: K, value: SessionState[K]): SessionState

  incrementCompleted(): number
  incrementFailed(): number
  setCurrentIssue(issue: number | null): void
  setCurrentWorktree(worktreePath: string | null): void

  elapsedSeconds(): number
  /** Whole hours elapsed (floor) */
  elapsedHours(): number
  formatElapsed(): string

  /** First limit reached stays reported until the next init */
  shouldContinue(): ContinueDecision

  addApprovedBlocker(issue: number, type: BlockerType): void
  hasApprovedBlocker(issue: number, type: BlockerType): boolean
  markNotificationSent(issue: number, type: string): void
  wasNotificationSent(issue: number, type: string): boolean

  /** Persist a resume snapshot for `issue` */
  snapshot(issue: number, reason: string, worktreePath: string | null): Promise<Snapshot>
  loadSnapshot(issue: number): Snapshot | null
  clearSnapshot(issue: number): void

  /** Markdown steps for picking the issue up again */
  resumeProcedure(snapshot: Snapshot, blocker?: BlockerEvent): string

  summary(): SessionSummary

  /** Delete the session record */
  cleanup(): void
}
