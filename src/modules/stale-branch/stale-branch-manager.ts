/**
 * StaleBranchManager interface: measures how far a PR branch has drifted
 * from mainline and brings it back, or closes it for a fresh start.
 */

import type { Mode } from '../../core/types.js'
import type { StaleOutcome, WorktreeRecord } from './types.js'

export interface StaleBranchManager {
  /**
   * Fetch mainline and count the commits the branch is missing.
   *
   * - 0 ⇒ continue
   * - below the threshold ⇒ merge mainline and push; a rejected push goes
   *   through divergence handling
   * - at or above ⇒ close and restart (unattended) or ask (attended)
   */
  check(worktree: string, pr: number | null, issue: number, mode: Mode): Promise<StaleOutcome>

  /** Commits `origin/<mainline>` has past the merge base; 0 when there is none */
  commitsBehind(worktree: string): Promise<number>

  describe(worktree: string): Promise<WorktreeRecord>
}
