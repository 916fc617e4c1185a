/**
 * Pipeline interface: drives one issue at a time from its resolved phase
 * to a merged PR, stopping at the first blocker.
 */

import type { BatchResult, IssueOutcome } from './types.js'

export interface Pipeline {
  /** Resolve-and-act loop for one issue; never throws for remote failures */
  processIssue(issue: number): Promise<IssueOutcome>

  /**
   * Issues in order. Stops at a batch-blocking blocker or a session limit;
   * any other blocker moves on to the next issue.
   */
  processBatch(issues: number[]): Promise<BatchResult>
}
