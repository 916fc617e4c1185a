/**
 * Barrel exports for the session-tracker module.
 */

export { createSessionTracker, SessionTrackerImpl } from './session-tracker-impl.js'
export type { SessionTrackerDeps } from './session-tracker-impl.js'
export type { SessionTracker, SessionSummary, ContinueDecision } from './session-tracker.js'
export { SessionStateSchema, SnapshotSchema } from './schemas.js'
export type { SessionState, Snapshot, LimitReason } from './schemas.js'
export { renderResumeProcedure } from './resume-procedure.js'
