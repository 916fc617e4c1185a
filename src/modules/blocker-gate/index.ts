/**
 * Barrel exports for the blocker-gate module.
 */

export { createBlockerGate, BlockerGateImpl } from './blocker-gate-impl.js'
export type { BlockerGateDeps } from './blocker-gate-impl.js'
export type { BlockerGate, SensitivityReport } from './blocker-gate.js'
export { CommandCredentialProbe } from './credential-probe.js'
export type { CredentialProbe, CommandProbeOptions } from './credential-probe.js'
export {
  HardGateRegistry,
  createBuiltinRegistry,
  credentialsGate,
  criticalFindingsGate,
  sessionLimitGate,
  gateBlocker,
  gateUrgency,
  isBatchBlocking,
  BATCH_BLOCKING_TYPES,
} from './gate-registry.js'
export { detectSensitivity, renderSensitivityGuidance, findExpensiveServices } from './sensitivity.js'
export type {
  ApprovalDecision,
  GateParams,
  GateResult,
  GateStage,
  HardGate,
  SensitivityArea,
  SensitivityHint,
} from './types.js'
export { GATE_STAGES } from './types.js'
