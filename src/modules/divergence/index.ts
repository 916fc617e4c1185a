/**
 * Barrel exports for the divergence module.
 */

export { createDivergenceClassifier, DivergenceClassifierImpl } from './divergence-classifier-impl.js'
export type { DivergenceClassifierDeps } from './divergence-classifier-impl.js'
export type { DivergenceClassifier } from './divergence-classifier.js'
export { AgentCommitClassifier, parseClassification } from './commit-classifier.js'
export type { CommitClassifier, CommitClassifierInput } from './commit-classifier.js'
export { decideDivergence } from './decision-matrix.js'
export type { DivergenceAction, DivergenceDecision, OperatorOption } from './decision-matrix.js'
export { classifyHeuristically, AUTOMATION_COMMIT_PATTERN } from './heuristics.js'
export { safeIntegrate } from './safe-integrate.js'
export type { IntegrateKind, SafeIntegrateResult } from './safe-integrate.js'
export { CLASSIFICATIONS } from './types.js'
export type {
  Classification,
  ClassificationResult,
  ClassificationSource,
  DivergenceContext,
  DivergenceReport,
  DivergenceResolution,
  HeadVerification,
  ResolvedAction,
} from './types.js'
