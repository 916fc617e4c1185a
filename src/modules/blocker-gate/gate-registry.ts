/**
 * Gate Registry: built-in hard gates and custom gate registration.
 *
 * Built-in gates:
 * - credentials_expired: credential probe (pre-start, session-check)
 * - critical_issues: CRITICAL findings in the latest automation review (pre-merge)
 * - session_limit: issue-count or elapsed-hours limit reached (session-check)
 *
 * pre-commit has no built-in gates; custom gates are added with
 * `register(gate)`.
 */

import type { BlockerEvent, BlockerType, Urgency } from '../../core/types.js'
import type { CredentialSettings } from '../config/config-schema.js'
import type { SessionTracker } from '../session-tracker/session-tracker.js'
import type { CredentialProbe } from './credential-probe.js'
import type { GateStage, HardGate } from './types.js'

// ---------------------------------------------------------------------------
// Urgency and batch semantics
// ---------------------------------------------------------------------------

const URGENCY: Partial<Record<BlockerType, Urgency>> = {
  critical_issues: 'high',
  session_limit: 'normal',
  credentials_expired: 'normal',
}

/** Blocker types that halt a whole batch rather than just the current issue */
export const BATCH_BLOCKING_TYPES: readonly BlockerType[] = ['credentials_expired', 'session_limit']

export function gateUrgency(type: BlockerType): Urgency {
  return URGENCY[type] ?? 'normal'
}

export function isBatchBlocking(type: BlockerType): boolean {
  return BATCH_BLOCKING_TYPES.includes(type)
}

export function gateBlocker(type: BlockerType, details: string): BlockerEvent {
  return { type, urgency: gateUrgency(type), details, batchBlocking: isBatchBlocking(type) }
}

// ---------------------------------------------------------------------------
// Built-in gates
// ---------------------------------------------------------------------------

export function credentialsGate(stage: GateStage, probe: CredentialProbe): HardGate {
  return {
    type: 'credentials_expired',
    stage,
    check: async () => {
      if (await probe.valid()) return null
      return stage === 'pre-start'
        ? 'Cloud credentials are expired'
        : 'Cloud credentials expired during processing'
    },
  }
}

export function criticalFindingsGate(): HardGate {
  return {
    type: 'critical_issues',
    stage: 'pre-merge',
    check: async ({ review }) => {
      const critical = review?.severity.critical ?? 0
      if (critical === 0) return null
      return `CRITICAL issues found in review (${String(critical)})\n\nCRITICAL issues must be fixed before merge`
    },
  }
}

export function sessionLimitGate(session: SessionTracker): HardGate {
  return {
    type: 'session_limit',
    stage: 'session-check',
    check: async () => {
      const decision = session.shouldContinue()
      if (decision === 'token_limit') {
        const completed = session.read().issuesCompleted
        return `Approaching token limit (${String(completed)} issues completed)\n\nStarting fresh session to prevent quality degradation`
      }
      if (decision === 'time_limit') {
        return `Approaching session time limit (${String(session.elapsedHours())} hours elapsed)\n\nSaving state for next session`
      }
      return null
    },
  }
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class HardGateRegistry {
  private readonly _gates: HardGate[] = []

  /** Gates run in registration order within a stage */
  register(gate: HardGate): void {
    this._gates.push(gate)
  }

  gatesFor(stage: GateStage): HardGate[] {
    return this._gates.filter((gate) => gate.stage === stage)
  }
}

export interface BuiltinGateDeps {
  credentials: CredentialSettings
  probe: CredentialProbe
  session: SessionTracker
}

/** A registry holding the built-in gates; credential gates are left out when the check is skipped */
export function createBuiltinRegistry(deps: BuiltinGateDeps): HardGateRegistry {
  const registry = new HardGateRegistry()
  const checkCredentials = !deps.credentials.skip_check

  if (checkCredentials) registry.register(credentialsGate('pre-start', deps.probe))
  registry.register(criticalFindingsGate())
  registry.register(sessionLimitGate(deps.session))
  if (checkCredentials) registry.register(credentialsGate('session-check', deps.probe))
  return registry
}
