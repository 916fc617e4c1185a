/**
 * Barrel exports for the state-resolver module.
 */

export { createStateResolver, StateResolverImpl } from './state-resolver-impl.js'
export type { StateResolverDeps } from './state-resolver-impl.js'
export type { StateResolver, ResolvedState, ResolveOptions, DegradedInput } from './state-resolver.js'
export { resolvePhase, reviewCurrency, formatPhase } from './phase.js'
export type { MarkerTags } from './phase.js'
export {
  isMainlineSyncCommit,
  latestQualifyingCommit,
  latestReview,
  latestAssessment,
  parseSeverity,
  severityCount,
  countDispositions,
  reviewMarker,
  assessmentMarker,
  hasMarker,
} from './review-parser.js'
export { toEpochSeconds, nowEpochSeconds, formatEpoch } from './timestamps.js'
export type { Phase, PhaseKind, CommitHistory, ReviewCurrency } from './types.js'
export { PHASE_ORDER } from './types.js'
