/**
 * BlockerGateImpl: runs registered hard gates per stage and memoises
 * operator approvals through the session tracker.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { errorMessage } from '../../core/errors.js'
import type { BlockerEvent, Mode } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { BlockerPatterns, CredentialSettings } from '../config/config-schema.js'
import type { Prompter } from '../prompter/prompter.js'
import type { SessionTracker } from '../session-tracker/session-tracker.js'
import type { BlockerGate, SensitivityReport } from './blocker-gate.js'
import type { CredentialProbe } from './credential-probe.js'
import { createBuiltinRegistry, gateBlocker, type HardGateRegistry } from './gate-registry.js'
import { detectSensitivity, renderSensitivityGuidance } from './sensitivity.js'
import type { ApprovalDecision, GateParams, GateResult, GateStage, HardGate } from './types.js'

const logger = createLogger('blocker-gate')

type ApprovalChoice = 'approve' | 'abort'

export interface BlockerGateDeps {
  patterns: BlockerPatterns
  credentials: CredentialSettings
  probe: CredentialProbe
  session: SessionTracker
  prompter?: Prompter
  eventBus?: TypedEventBus
}

export class BlockerGateImpl implements BlockerGate {
  private readonly _deps: BlockerGateDeps
  private readonly _registry: HardGateRegistry

  constructor(deps: BlockerGateDeps) {
    this._deps = deps
    this._registry = createBuiltinRegistry({
      credentials: deps.credentials,
      probe: deps.probe,
      session: deps.session,
    })
  }

  sensitivity(files: string[], diff: string): SensitivityReport {
    const hints = detectSensitivity(files, diff, this._deps.patterns)
    if (hints.length > 0) {
      logger.info({ areas: hints.map((h) => h.area) }, 'Sensitivity hints for review')
    }
    return { hints, guidance: renderSensitivityGuidance(hints) }
  }

  registerHardGate(gate: HardGate): void {
    this._registry.register(gate)
  }

  async evaluate(stage: GateStage, params: GateParams): Promise<GateResult> {
    for (const gate of this._registry.gatesFor(stage)) {
      let details: string | null
      try {
        details = await gate.check(params)
      } catch (err) {
        // A gate that cannot decide blocks
        details = `Gate check failed: ${errorMessage(err)}`
      }
      if (details === null) continue

      const blocker = gateBlocker(gate.type, details)
      logger.warn({ stage, issue: params.issue, type: blocker.type, urgency: blocker.urgency }, 'Hard gate blocked')
      this._deps.eventBus?.emit('blocker:raised', { issue: params.issue, blocker })
      return { kind: 'blocked', blocker }
    }
    return { kind: 'pass' }
  }

  async requestApproval(issue: number, blocker: BlockerEvent, mode: Mode): Promise<ApprovalDecision> {
    const { session, prompter } = this._deps
    if (session.hasApprovedBlocker(issue, blocker.type)) {
      logger.info({ issue, type: blocker.type }, 'Blocker previously approved')
      return 'previously-approved'
    }
    if (mode === 'unattended' || prompter === undefined) return 'declined'

    const choice = await prompter.choose<ApprovalChoice>(
      `Blocker on #${String(issue)}: ${blocker.type}\n${blocker.details}\nProceed anyway?`,
      [
        { key: 'y', label: 'Approve and continue', value: 'approve' },
        { key: 'n', label: 'Abort workflow', value: 'abort', recommended: true },
      ],
      'abort'
    )
    if (choice === 'abort') return 'declined'

    session.addApprovedBlocker(issue, blocker.type)
    logger.info({ issue, type: blocker.type }, 'Blocker approved')
    return 'approved'
  }
}

export function createBlockerGate(deps: BlockerGateDeps): BlockerGate {
  return new BlockerGateImpl(deps)
}
