/**
 * PipelineImpl: the per-issue resolve-and-act loop.
 *
 * Each step re-resolves the phase from remote state and local history and
 * performs exactly one action for it. Progress therefore survives crashes
 * and interrupts: a rerun picks up from whatever the PR and its comments
 * say, not from in-memory state.
 *
 * Any blocker ends the issue: a snapshot is saved, the operator is
 * notified (once per issue and blocker type) and a resume procedure is
 * attached to the outcome. A branch restarted for staleness is developed
 * again from mainline within the same run.
 */

import { resolve as resolvePath } from 'node:path'
import { existsSync } from 'node:fs'
import type { TypedEventBus } from '../../core/event-bus.js'
import { AgentError, ShiplineError, errorMessage } from '../../core/errors.js'
import type {
  BlockerEvent,
  BlockerType,
  Issue,
  Mode,
  PullRequest,
  ReviewRecord,
  Urgency,
} from '../../core/types.js'
import { formatElapsed } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { assessmentPrompt, developmentPrompt, fixPrompt, reviewPrompt } from '../agent/prompts.js'
import type { AgentRunResult, AgentRunner } from '../agent/agent-runner.js'
import type { BlockerGate } from '../blocker-gate/blocker-gate.js'
import type { GateParams } from '../blocker-gate/types.js'
import type { CodeHost } from '../code-host/code-host.js'
import type { ShiplineConfig } from '../config/config-schema.js'
import type { DivergenceClassifier } from '../divergence/divergence-classifier.js'
import type { NotesStore } from '../notes/notes-store.js'
import { completionNotification, type Notifier } from '../notifications/notifier.js'
import type { SessionTracker } from '../session-tracker/session-tracker.js'
import type { StaleBranchManager } from '../stale-branch/stale-branch-manager.js'
import { formatPhase } from '../state-resolver/phase.js'
import { assessmentMarker, reviewMarker } from '../state-resolver/review-parser.js'
import type { ResolvedState, StateResolver } from '../state-resolver/state-resolver.js'
import { nowEpochSeconds } from '../state-resolver/timestamps.js'
import type { Phase } from '../state-resolver/types.js'
import type { GitClient } from '../vcs/git-client.js'
import type { Pipeline } from './pipeline.js'
import type { BatchResult, IssueOutcome, IssueResult } from './types.js'

const logger = createLogger('pipeline')

/** Worktree an issue is developed in: `<worktree_dir>/issue-<n>` under the repository root */
export function issueWorktreePath(repoRoot: string, worktreeDir: string, issue: number): string {
  return resolvePath(repoRoot, worktreeDir, `issue-${String(issue)}`)
}

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface PipelineDeps {
  config: ShiplineConfig
  /** Main repository root */
  repoRoot: string
  mode: Mode
  /** Client bound to the main clone; worktree clients are derived with `at()` */
  git: GitClient
  codeHost: CodeHost
  resolver: StateResolver
  divergence: DivergenceClassifier
  gate: BlockerGate
  stale: StaleBranchManager
  session: SessionTracker
  notes: NotesStore
  notifier: Notifier
  agent: AgentRunner
  eventBus?: TypedEventBus
  /** Epoch-seconds clock; injectable for tests */
  now?: () => number
}

/** Working state for one issue while it is being processed */
interface IssueRun {
  issue: number
  details: Issue
  branch: string
  worktree: string
  /** True once the worktree exists on disk */
  ready: boolean
  /** The worktree or PR branch predates this run */
  resumed: boolean
  /** Mainline staleness was checked for the resumed branch */
  staleChecked: boolean
  pr: number | null
  developRuns: number
  restarts: number
  startedAt: number
}

/** Phases whose action builds on the existing branch */
const BRANCH_WORK_PHASES: ReadonlySet<Phase['kind']> = new Set<Phase['kind']>(['not-started', 'dev-pr', 'needs-fixes'])

interface BlockOptions {
  /** Skip the operator notification (pre-start blockers) */
  silent?: boolean
  /** blocker:raised was already emitted by the gate */
  raised?: boolean
}

function policyBlocker(type: BlockerType, urgency: Urgency, details: string): BlockerEvent {
  return { type, urgency, details, batchBlocking: false }
}

// ---------------------------------------------------------------------------
// PipelineImpl
// ---------------------------------------------------------------------------

export class PipelineImpl implements Pipeline {
  private readonly _deps: PipelineDeps
  private readonly _now: () => number

  constructor(deps: PipelineDeps) {
    this._deps = deps
    this._now = deps.now ?? nowEpochSeconds
  }

  async processIssue(issue: number): Promise<IssueOutcome> {
    const { session, mode } = this._deps
    logger.info({ issue, mode }, 'Processing issue')
    session.setCurrentIssue(issue)

    let outcome: IssueOutcome
    try {
      outcome = await this._process(issue)
    } catch (err) {
      if (!(err instanceof ShiplineError)) throw err
      logger.error({ issue, code: err.code, err: err.message }, 'Issue processing failed')
      session.incrementFailed()
      outcome = { kind: 'failed', reason: err.message }
    } finally {
      session.setCurrentIssue(null)
      session.setCurrentWorktree(null)
    }

    logger.info({ issue, outcome: outcome.kind }, 'Issue finished')
    this._deps.eventBus?.emit('issue:complete', { issue, outcome: outcome.kind })
    return outcome
  }

  async processBatch(issues: number[]): Promise<BatchResult> {
    const results: IssueResult[] = []
    for (const [index, issue] of issues.entries()) {
      const outcome = await this.processIssue(issue)
      results.push({ issue, outcome })

      const halt =
        outcome.kind === 'suspended' || (outcome.kind === 'blocked' && outcome.blocker.batchBlocking)
      if (halt) {
        const skipped = issues.slice(index + 1)
        logger.warn({ issue, outcome: outcome.kind, skipped }, 'Batch halted')
        return { results, halted: true, skipped }
      }
    }
    return { results, halted: false, skipped: [] }
  }

  // -------------------------------------------------------------------------
  // Loop
  // -------------------------------------------------------------------------

  private async _process(issue: number): Promise<IssueOutcome> {
    const { gate, session, config } = this._deps
    const worktree = issueWorktreePath(this._deps.repoRoot, config.worktree_dir, issue)

    const sessionCheck = await gate.evaluate('session-check', { issue })
    if (sessionCheck.kind === 'blocked') {
      if (sessionCheck.blocker.type === 'session_limit') {
        await session.snapshot(issue, 'session_limit', existsSync(worktree) ? worktree : null)
        return { kind: 'suspended', reason: sessionCheck.blocker.details }
      }
      return this._block(issue, null, sessionCheck.blocker, { raised: true })
    }

    const preStart = await gate.evaluate('pre-start', { issue })
    if (preStart.kind === 'blocked') {
      return this._block(issue, null, preStart.blocker, { raised: true, silent: true })
    }

    const details = await this._deps.codeHost.getIssue(issue)
    if (details === null) return this._fail(issue, `Issue #${String(issue)} not found`)

    const ready = existsSync(worktree)
    const run: IssueRun = {
      issue,
      details,
      branch: `issue-${String(issue)}`,
      worktree,
      ready,
      resumed: ready,
      staleChecked: false,
      pr: null,
      developRuns: 0,
      restarts: 0,
      startedAt: this._now(),
    }
    if (run.ready) session.setCurrentWorktree(worktree)

    for (let step = 0; step < config.pipeline.max_steps; step++) {
      const state = await this._deps.resolver.resolve(issue, run.ready ? { worktreePath: run.worktree } : {})
      if (state.degraded.length > 0) {
        logger.warn({ issue, degraded: state.degraded }, 'Phase resolved from partial data; taking no action')
        return this._fail(issue, `Could not read ${state.degraded.join(', ')}`, state.degraded)
      }

      if (state.pr !== null && state.pr.state === 'open') {
        run.pr = state.pr.number
        run.branch = state.pr.branch
        if (!run.ready) {
          // Local history decides whether the branch is pushed and reviewable
          if (!(await this._ensureWorktree(run))) {
            return this._fail(issue, `Could not create worktree ${run.worktree}`)
          }
          run.resumed = true
          continue
        }
      }

      if (run.resumed && run.ready && !run.staleChecked && BRANCH_WORK_PHASES.has(state.phase.kind)) {
        run.staleChecked = true
        const staleness = await this._deps.stale.check(run.worktree, run.pr, issue, this._deps.mode)
        if (staleness.kind === 'blocked') return this._block(issue, run, staleness.blocker)
        if (staleness.kind === 'restarted') {
          const restarted = this._restart(run, staleness.behind)
          if (restarted !== null) return restarted
          continue
        }
        if (staleness.reason === 'needs-re-review') continue
      }

      logger.info({ issue, step, phase: formatPhase(state.phase) }, 'Acting on phase')
      const outcome = await this._act(run, state)
      if (outcome !== null) return outcome
    }

    return this._fail(issue, `No progress after ${String(config.pipeline.max_steps)} steps`)
  }

  /** Null means "re-resolve and continue" */
  private async _act(run: IssueRun, state: ResolvedState): Promise<IssueOutcome | null> {
    const phase: Phase = state.phase
    if (phase.kind === 'not-started') return this._develop(run, null)

    const pr = state.pr
    if (pr === null) return this._fail(run.issue, `PR #${String(phase.pr)} could not be read`)

    switch (phase.kind) {
      case 'merged':
        logger.info({ issue: run.issue, pr: pr.number }, 'PR already merged')
        return { kind: 'merged', pr: pr.number }
      case 'dev-pr':
        return this._develop(run, pr)
      case 'needs-review':
      case 'review-stale':
        return this._review(run, pr, state)
      case 'needs-assessment':
        return this._assess(run, pr, state.review)
      case 'needs-fixes':
        return this._fix(run, pr, state, phase.round, phase.count)
      case 'ready-to-merge':
        return this._merge(run, pr, state)
    }
  }

  // -------------------------------------------------------------------------
  // Phase actions
  // -------------------------------------------------------------------------

  private async _develop(run: IssueRun, pr: PullRequest | null): Promise<IssueOutcome | null> {
    run.developRuns += 1
    if (run.developRuns > 1) {
      return this._block(
        run.issue,
        run,
        policyBlocker('agent_failed', 'high', `Development on ${run.branch} did not produce a reviewable pull request`)
      )
    }
    if (!(await this._ensureWorktree(run))) return this._fail(run.issue, `Could not create worktree ${run.worktree}`)

    const { notes, config } = this._deps
    notes.setCurrentWork({ issue: run.issue, title: run.details.title, branch: run.branch, pr: run.pr })

    const result = await this._runAgent(run, 'development', developmentPrompt(run.details, run.branch))
    if (result === null) return this._block(run.issue, run, this._agentBlocker('development'))

    const wt = this._deps.git.at(run.worktree)
    const gated = await this._gate('pre-commit', run)
    if (gated !== null) return gated
    if (await wt.isDirty()) await wt.commitAll(`chore: commit remaining changes for #${String(run.issue)}`)

    if (pr === null && (await wt.countCommits(`${wt.remoteRef(config.mainline)}..HEAD`)) === 0) {
      return this._block(
        run.issue,
        run,
        policyBlocker('agent_failed', 'high', `Development agent produced no commits on ${run.branch}`)
      )
    }

    const pushBlocker = await this._push(run)
    if (pushBlocker !== null) return this._block(run.issue, run, pushBlocker)

    if (pr === null) {
      const created = await this._deps.codeHost.createPullRequest({
        branch: run.branch,
        base: config.mainline,
        title: run.details.title,
        body: `Closes #${String(run.issue)}`,
      })
      run.pr = created.number
      notes.setCurrentWork({ issue: run.issue, title: run.details.title, branch: run.branch, pr: created.number })
      logger.info({ issue: run.issue, pr: created.number }, 'Pull request opened')
    } else if (pr.draft) {
      await this._deps.codeHost.markReady(pr.number)
      logger.info({ issue: run.issue, pr: pr.number }, 'Draft pull request marked ready')
    }
    return null
  }

  private async _review(run: IssueRun, pr: PullRequest, state: ResolvedState): Promise<IssueOutcome | null> {
    const { history } = state
    if (history.source === 'local' && history.localHead !== null && history.localHead !== history.remoteHead) {
      // Unpushed work makes the review stale; push it before reviewing again
      const pushBlocker = await this._push(run)
      return pushBlocker === null ? null : this._block(run.issue, run, pushBlocker)
    }

    const { codeHost, gate, config } = this._deps
    const files = await codeHost.listPullRequestFiles(pr.number)
    const diff = await codeHost.getPullRequestDiff(pr.number)
    const { guidance } = gate.sensitivity(files, diff)

    const result = await this._runAgent(run, 'review', reviewPrompt(pr, diff, guidance))
    const body = result?.stdout.trim() ?? ''
    if (body === '') return this._block(run.issue, run, this._agentBlocker('review'))

    await codeHost.postComment(pr.number, `${reviewMarker(config.markers.review)}\n\n${body}`)
    logger.info({ issue: run.issue, pr: pr.number }, 'Review posted')
    return null
  }

  private async _assess(run: IssueRun, pr: PullRequest, review: ReviewRecord | null): Promise<IssueOutcome | null> {
    if (review === null) return this._fail(run.issue, `No review found on PR #${String(pr.number)}`)

    const result = await this._runAgent(run, 'assessment', assessmentPrompt(pr, review.body))
    const body = result?.stdout.trim() ?? ''
    if (body === '') return this._block(run.issue, run, this._agentBlocker('assessment'))

    const marker = assessmentMarker(this._deps.config.markers.assessment, pr.headSha)
    await this._deps.codeHost.postComment(pr.number, `${marker}\n\n${body}`)
    logger.info({ issue: run.issue, pr: pr.number }, 'Assessment posted')
    return null
  }

  private async _fix(
    run: IssueRun,
    pr: PullRequest,
    state: ResolvedState,
    round: number,
    count: number
  ): Promise<IssueOutcome | null> {
    const maxCycles = this._deps.config.pipeline.max_fix_cycles
    if (round > maxCycles) {
      return this._block(
        run.issue,
        run,
        policyBlocker(
          'fix_cycles_exhausted',
          'high',
          `${String(count)} ACTIONABLE_NOW finding(s) remain after ${String(round)} review round(s)`
        )
      )
    }

    const wt = this._deps.git.at(run.worktree)
    const before = await wt.revParse('HEAD')
    const result = await this._runAgent(run, 'fix', fixPrompt(pr, state.assessment?.body ?? ''))
    if (result === null) return this._block(run.issue, run, this._agentBlocker('fix'))

    const gated = await this._gate('pre-commit', run)
    if (gated !== null) return gated
    if (await wt.isDirty()) await wt.commitAll('fix: address review findings')

    if ((await wt.revParse('HEAD')) === before) {
      return this._block(run.issue, run, policyBlocker('agent_failed', 'high', 'Fix agent made no changes'))
    }

    const pushBlocker = await this._push(run)
    return pushBlocker === null ? null : this._block(run.issue, run, pushBlocker)
  }

  private async _merge(run: IssueRun, pr: PullRequest, state: ResolvedState): Promise<IssueOutcome | null> {
    const { stale, gate, divergence, codeHost, mode } = this._deps

    const staleness = await stale.check(run.worktree, pr.number, run.issue, mode)
    if (staleness.kind === 'restarted') return this._restart(run, staleness.behind)
    if (staleness.kind === 'blocked') return this._block(run.issue, run, staleness.blocker)
    // Pulled-in foreign commits invalidate the review
    if (staleness.reason === 'needs-re-review') return null

    let expected = state.assessment?.headSha ?? pr.headSha
    if (staleness.reason === 'merged') {
      // The mainline sync moved the head; the assessed changes are unchanged
      expected = (await this._deps.git.at(run.worktree).revParse('HEAD')) ?? expected
    }

    const preMerge = await gate.evaluate('pre-merge', { issue: run.issue, pr: pr.number, review: state.review })
    if (preMerge.kind === 'blocked') {
      const decision = await gate.requestApproval(run.issue, preMerge.blocker, mode)
      if (decision === 'declined') return this._block(run.issue, run, preMerge.blocker, { raised: true })
      logger.info({ issue: run.issue, type: preMerge.blocker.type, decision }, 'Blocker approved; merging')
    }

    const verification = await divergence.verifyHead(pr.number, expected)
    if (verification.status === 'changed') {
      return this._block(
        run.issue,
        run,
        policyBlocker(
          'head_changed',
          'high',
          `PR #${String(pr.number)} head moved from ${verification.expected.slice(0, 12)} to ` +
            `${verification.current.slice(0, 12)} after assessment`
        )
      )
    }

    const merged = await codeHost.mergePullRequest(pr.number, expected)
    if (!merged.ok) {
      const type: BlockerType = merged.headChanged ? 'head_changed' : 'merge_failed'
      return this._block(run.issue, run, policyBlocker(type, 'high', `Merge of PR #${String(pr.number)} failed: ${merged.message}`))
    }

    await this._complete(run, pr, state.review)
    return { kind: 'merged', pr: pr.number }
  }

  private async _complete(run: IssueRun, pr: PullRequest, review: ReviewRecord | null): Promise<void> {
    const { notes, session, notifier, git } = this._deps
    const duration = formatElapsed(this._now() - run.startedAt)
    logger.info({ issue: run.issue, pr: pr.number, duration }, 'Pull request merged')

    try {
      if (review !== null) notes.recordSecurityFindings(pr.number, pr.title, review.body)
      notes.archiveCompleted({ issue: run.issue, pr: pr.number, title: pr.title, duration })
      notes.clearCurrentWork()
    } catch (err) {
      logger.warn({ issue: run.issue, err: errorMessage(err) }, 'Failed to update notes')
    }

    session.incrementCompleted()
    session.clearSnapshot(run.issue)
    await notifier.notify(completionNotification(run.issue, pr.number, pr.title, duration))

    if (!(await git.removeWorktree(run.worktree))) logger.warn({ worktree: run.worktree }, 'Failed to remove worktree')
    if ((await git.branchExists(run.branch)) && !(await git.deleteLocalBranch(run.branch))) {
      logger.warn({ branch: run.branch }, 'Failed to delete local branch')
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  /**
   * Reset the run after the stale branch and its PR were removed, so the
   * next step develops the issue from mainline. A second restart in one
   * run ends the issue as `restarted`.
   */
  private _restart(run: IssueRun, behind: number): IssueOutcome | null {
    this._deps.notes.clearCurrentWork()
    this._deps.session.setCurrentWorktree(null)
    run.restarts += 1
    if (run.restarts > 1) {
      logger.warn({ issue: run.issue, behind }, 'Branch went stale again after a restart')
      return { kind: 'restarted', behind }
    }

    logger.info({ issue: run.issue, behind, closedPr: run.pr }, 'Restarting issue from mainline')
    run.branch = `issue-${String(run.issue)}`
    run.pr = null
    run.ready = false
    run.resumed = false
    run.staleChecked = true
    run.developRuns = 0
    return null
  }

  private async _ensureWorktree(run: IssueRun): Promise<boolean> {
    if (run.ready) return true
    const { git, config } = this._deps

    // An existing PR branch is checked out as is; new work starts from mainline
    const baseBranch = run.pr === null ? config.mainline : run.branch
    if (!(await git.fetch(baseBranch))) logger.warn({ branch: baseBranch }, 'Fetch failed; using local refs')
    if (!(await git.addWorktree(run.worktree, run.branch, git.remoteRef(baseBranch)))) return false

    run.ready = true
    this._deps.session.setCurrentWorktree(run.worktree)
    logger.info({ issue: run.issue, worktree: run.worktree, branch: run.branch }, 'Worktree ready')
    return true
  }

  /** Push; a rejection goes through divergence handling. Returns a blocker or null. */
  private async _push(run: IssueRun): Promise<BlockerEvent | null> {
    const wt = this._deps.git.at(run.worktree)
    const pushed = await wt.push(run.branch, { setUpstream: true })
    if (pushed.ok) return null
    if (!pushed.rejected) {
      return policyBlocker('push_failed', 'high', `Push of ${run.branch} failed: ${pushed.message}`)
    }

    logger.warn({ issue: run.issue, branch: run.branch }, 'Push rejected; checking for divergence')
    const resolution = await this._deps.divergence.handlePushRejection(run.branch, run.worktree, {
      issue: run.issue,
      pr: run.pr,
      mode: this._deps.mode,
      issueDetails: run.details,
    })
    return resolution.kind === 'blocked' ? resolution.blocker : null
  }

  private async _gate(stage: 'pre-commit', run: IssueRun): Promise<IssueOutcome | null> {
    const params: GateParams = run.pr === null ? { issue: run.issue } : { issue: run.issue, pr: run.pr }
    const result = await this._deps.gate.evaluate(stage, params)
    if (result.kind === 'pass') return null
    return this._block(run.issue, run, result.blocker, { raised: true })
  }

  /** Null when the agent process could not be started */
  private async _runAgent(run: IssueRun, label: string, prompt: string): Promise<AgentRunResult | null> {
    try {
      const result = await this._deps.agent.run({ prompt, cwd: run.worktree, label })
      if (result.timedOut) {
        logger.warn({ issue: run.issue, label }, 'Agent timed out; inspecting the work it left')
      }
      return result
    } catch (err) {
      if (!(err instanceof AgentError)) throw err
      logger.error({ issue: run.issue, label, err: err.message }, 'Agent could not be started')
      return null
    }
  }

  private _agentBlocker(label: string): BlockerEvent {
    return policyBlocker('agent_failed', 'high', `The ${label} agent failed or produced no output`)
  }

  private async _block(
    issue: number,
    run: IssueRun | null,
    blocker: BlockerEvent,
    options: BlockOptions = {}
  ): Promise<IssueOutcome> {
    const { session, notifier, eventBus } = this._deps
    const worktree = run !== null && run.ready ? run.worktree : null

    logger.warn({ issue, type: blocker.type, urgency: blocker.urgency, batchBlocking: blocker.batchBlocking }, 'Issue blocked')
    const snapshot = await session.snapshot(issue, blocker.type, worktree)
    if (options.silent !== true) {
      await notifier.notifyBlocker(issue, blocker, { pr: run?.pr ?? null, worktreePath: worktree })
    }
    if (options.raised !== true) eventBus?.emit('blocker:raised', { issue, blocker })
    session.incrementFailed()

    return { kind: 'blocked', blocker, resume: session.resumeProcedure(snapshot, blocker) }
  }

  private _fail(issue: number, reason: string, degraded?: ResolvedState['degraded']): IssueOutcome {
    logger.error({ issue, reason }, 'Issue failed')
    this._deps.session.incrementFailed()
    return degraded === undefined ? { kind: 'failed', reason } : { kind: 'failed', reason, degraded }
  }
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  return new PipelineImpl(deps)
}
