/**
 * Types for the blocker-gate module.
 */

import type { BlockerEvent, BlockerType, ReviewRecord } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Sensitivity hints
// ---------------------------------------------------------------------------

export type SensitivityArea =
  | 'infrastructure'
  | 'migrations'
  | 'auth'
  | 'architecture_docs'
  | 'expensive_services'
  | 'protected_scripts'

/** A risk area the next review should look at; never blocks */
export interface SensitivityHint {
  area: SensitivityArea
  /** Matching paths, or service names found in the diff */
  matches: string[]
}

// ---------------------------------------------------------------------------
// Hard gates
// ---------------------------------------------------------------------------

export type GateStage = 'pre-start' | 'pre-commit' | 'pre-merge' | 'session-check'

export const GATE_STAGES: readonly GateStage[] = ['pre-start', 'pre-commit', 'pre-merge', 'session-check']

export interface GateParams {
  issue: number
  pr?: number | null
  /** Latest automation review; required by the critical-findings gate */
  review?: ReviewRecord | null
}

/**
 * A blocking check run at one stage. `check` resolves to the blocker
 * details when the gate fails, or null when it passes.
 */
export interface HardGate {
  type: BlockerType
  stage: GateStage
  check(params: GateParams): Promise<string | null>
}

export type GateResult = { kind: 'pass' } | { kind: 'blocked'; blocker: BlockerEvent }

export type ApprovalDecision = 'approved' | 'previously-approved' | 'declined'
