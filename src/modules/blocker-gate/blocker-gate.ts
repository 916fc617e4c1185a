/**
 * BlockerGate interface: sensitivity hints and stage-scoped hard gates,
 * with per-(issue, type) approval memoised in the session record.
 */

import type { BlockerEvent, Mode } from '../../core/types.js'
import type { ApprovalDecision, GateParams, GateResult, GateStage, HardGate, SensitivityHint } from './types.js'

export interface SensitivityReport {
  hints: SensitivityHint[]
  /** `### Sensitivity: <area>` blocks for the next review pass */
  guidance: string
}

export interface BlockerGate {
  /** Informational only; never blocks */
  sensitivity(files: string[], diff: string): SensitivityReport

  /** Run the stage's hard gates in order; the first failure blocks */
  evaluate(stage: GateStage, params: GateParams): Promise<GateResult>

  /** Add a gate to a stage, after the built-in ones */
  registerHardGate(gate: HardGate): void

  /**
   * Ask to proceed past `blocker` for `issue`. An earlier approval of the
   * same (issue, type) pair is reused without prompting. Unattended runs
   * never approve.
   */
  requestApproval(issue: number, blocker: BlockerEvent, mode: Mode): Promise<ApprovalDecision>
}
