/**
 * Barrel exports for the stale-branch module.
 */

export { createStaleBranchManager, StaleBranchManagerImpl } from './stale-branch-manager-impl.js'
export type { StaleBranchManagerDeps } from './stale-branch-manager-impl.js'
export type { StaleBranchManager } from './stale-branch-manager.js'
export { formatStaleCloseComment } from './close-summary.js'
export type { ContinueReason, StaleOption, StaleOutcome, WorktreeRecord } from './types.js'
