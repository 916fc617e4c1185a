/**
 * StaleBranchManagerImpl: merge-or-restart policy for branches that have
 * fallen behind mainline.
 *
 * Cleanup after a restart is best-effort: every step is attempted, and a
 * failed step is logged at warn.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { errorMessage } from '../../core/errors.js'
import type { BlockerEvent, BlockerType, Mode, Urgency } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { CodeHost } from '../code-host/code-host.js'
import type { DivergenceClassifier } from '../divergence/divergence-classifier.js'
import { safeIntegrate } from '../divergence/safe-integrate.js'
import type { PromptChoice, Prompter } from '../prompter/prompter.js'
import type { SessionTracker } from '../session-tracker/session-tracker.js'
import { nowEpochSeconds } from '../state-resolver/timestamps.js'
import type { GitClient } from '../vcs/git-client.js'
import { formatStaleCloseComment } from './close-summary.js'
import type { StaleBranchManager } from './stale-branch-manager.js'
import type { StaleOption, StaleOutcome, WorktreeRecord } from './types.js'

const logger = createLogger('stale-branch')

/** Branch names never treated as feature branches */
const MAINLINE_NAMES = ['main', 'master']

const STALE_CHOICES: PromptChoice<StaleOption>[] = [
  { key: '1', label: 'Close PR and restart fresh', value: 'restart', recommended: true },
  { key: '2', label: 'Merge mainline into branch', value: 'merge' },
  { key: '3', label: 'Continue without merging mainline (not recommended)', value: 'continue' },
  { key: '4', label: 'Abort', value: 'abort' },
]

const CONFLICT_CHOICES: PromptChoice<'continue' | 'abort'>[] = [
  { key: 'c', label: 'Continue without merging mainline (not recommended)', value: 'continue' },
  { key: 'd', label: 'Abort workflow', value: 'abort' },
]

function blocked(behind: number, type: BlockerType, urgency: Urgency, details: string): StaleOutcome {
  const blocker: BlockerEvent = { type, urgency, details, batchBlocking: false }
  return { kind: 'blocked', behind, blocker }
}

export interface StaleBranchManagerDeps {
  /** Client bound to the main clone; worktree clients are derived with `at()` */
  git: GitClient
  codeHost: CodeHost
  session: SessionTracker
  /** Handles a push rejected after mainline was merged in */
  divergence: DivergenceClassifier
  mainline: string
  /** Commits behind at which the branch is restarted instead of merged */
  threshold: number
  prompter?: Prompter
  eventBus?: TypedEventBus
  /** Epoch-seconds clock; injectable for tests */
  now?: () => number
}

export class StaleBranchManagerImpl implements StaleBranchManager {
  private readonly _deps: StaleBranchManagerDeps
  private readonly _now: () => number

  constructor(deps: StaleBranchManagerDeps) {
    this._deps = deps
    this._now = deps.now ?? nowEpochSeconds
  }

  async check(worktree: string, pr: number | null, issue: number, mode: Mode): Promise<StaleOutcome> {
    const git = this._deps.git.at(worktree)
    const branch = await git.currentBranch()
    if (branch === null || branch === this._deps.mainline || MAINLINE_NAMES.includes(branch)) {
      return { kind: 'continue', behind: 0, reason: 'skipped' }
    }

    if (!(await git.fetch(this._deps.mainline))) {
      logger.warn({ issue, branch }, `Could not fetch ${git.remoteRef(this._deps.mainline)}; skipping stale check`)
      return { kind: 'continue', behind: 0, reason: 'skipped' }
    }

    const behind = await this.commitsBehind(worktree)
    const { threshold } = this._deps
    if (behind === 0) {
      logger.debug({ issue, branch }, 'Branch is up to date with mainline')
      return { kind: 'continue', behind, reason: 'up-to-date' }
    }

    if (behind < threshold) {
      logger.info({ issue, branch, behind, threshold }, 'Branch is behind mainline; merging')
      return this._mergeMainline(worktree, branch, pr, issue, behind, mode)
    }

    logger.warn({ issue, branch, behind, threshold }, 'Branch is too far behind mainline')
    if (mode === 'unattended') {
      await this._closeAndCleanup(worktree, branch, pr, issue, behind)
      return { kind: 'restarted', behind }
    }
    return this._offer(worktree, branch, pr, issue, behind)
  }

  async commitsBehind(worktree: string): Promise<number> {
    const git = this._deps.git.at(worktree)
    const mainRef = git.remoteRef(this._deps.mainline)
    const base = await git.mergeBase('HEAD', mainRef)
    if (base === null) return 0
    return git.countCommits(`${base}..${mainRef}`)
  }

  async describe(worktree: string): Promise<WorktreeRecord> {
    const git = this._deps.git.at(worktree)
    const branch = await git.currentBranch()
    const unpushed = branch === null ? 0 : await git.countCommits(`${git.remoteRef(branch)}..HEAD`)
    const [last] = await git.log('HEAD', { limit: 1 })
    return {
      path: worktree,
      branch,
      uncommitted: (await git.statusShort()).length,
      unpushed,
      ageSeconds: last === undefined ? null : Math.max(0, this._now() - last.committedAt),
      behind: await this.commitsBehind(worktree),
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async _offer(
    worktree: string,
    branch: string,
    pr: number | null,
    issue: number,
    behind: number
  ): Promise<StaleOutcome> {
    const choice = await this._choose(
      `Branch ${branch}${pr === null ? '' : ` (PR #${String(pr)})`} is ${String(behind)} commits behind ` +
        `${this._deps.mainline}.\nFinal merges are squashed, so restarting does not pollute history.`,
      STALE_CHOICES
    )

    switch (choice) {
      case 'restart':
        await this._closeAndCleanup(worktree, branch, pr, issue, behind)
        return { kind: 'restarted', behind }
      case 'merge':
        return this._mergeMainline(worktree, branch, pr, issue, behind, 'attended')
      case 'continue':
        logger.warn({ issue, branch, behind }, 'Continuing on a stale base')
        return { kind: 'continue', behind, reason: 'continued-unmerged' }
      case 'abort':
        return blocked(behind, 'stale_branch', 'normal', `Branch ${branch} is ${String(behind)} commits behind ${this._deps.mainline}`)
    }
  }

  private async _mergeMainline(
    worktree: string,
    branch: string,
    pr: number | null,
    issue: number,
    behind: number,
    mode: Mode
  ): Promise<StaleOutcome> {
    const git = this._deps.git.at(worktree)
    const integrated = await safeIntegrate(git, 'merge', git.remoteRef(this._deps.mainline))

    if (!integrated.ok) {
      const details =
        `Merging ${this._deps.mainline} into ${branch} conflicted in:\n${integrated.conflicts.join('\n')}`
      if (mode === 'unattended') return blocked(behind, 'merge_conflict', 'high', details)

      const choice = await this._choose(details, CONFLICT_CHOICES)
      if (choice === 'continue') return { kind: 'continue', behind, reason: 'continued-unmerged' }
      return blocked(behind, 'merge_conflict', 'high', details)
    }

    // History is not rewritten, so a plain push is enough
    const pushed = await git.push(branch)
    if (!pushed.ok) {
      if (!pushed.rejected) {
        return blocked(behind, 'push_failed', 'high', `Push after merging ${this._deps.mainline} failed: ${pushed.message}`)
      }
      logger.warn({ issue, branch }, 'Push after merging mainline was rejected; checking for divergence')
      const resolution = await this._deps.divergence.handlePushRejection(branch, worktree, { issue, pr, mode })
      if (resolution.kind === 'blocked') return { kind: 'blocked', behind, blocker: resolution.blocker }
      if (resolution.kind === 'needs-re-review') return { kind: 'continue', behind, reason: 'needs-re-review' }
    }
    logger.info({ issue, branch, behind }, 'Merged mainline and pushed')
    this._deps.eventBus?.emit('stale:synced', { issue, behind })
    return { kind: 'continue', behind, reason: 'merged' }
  }

  private async _closeAndCleanup(
    worktree: string,
    branch: string,
    pr: number | null,
    issue: number,
    behind: number
  ): Promise<void> {
    const { codeHost, session } = this._deps
    const wt = this._deps.git.at(worktree)
    const root = this._deps.git
    const mainRef = wt.remoteRef(this._deps.mainline)

    if (pr !== null) {
      const body = formatStaleCloseComment(
        behind,
        this._deps.mainline,
        await wt.logOneline(`${mainRef}..HEAD`),
        await wt.changedFiles(`${mainRef}...HEAD`)
      )
      try {
        await codeHost.postComment(pr, body)
      } catch (err) {
        logger.warn({ pr, err: errorMessage(err) }, 'Failed to post close comment')
      }
      try {
        await codeHost.closePullRequest(pr)
        logger.info({ pr }, 'Closed stale PR')
      } catch (err) {
        logger.warn({ pr, err: errorMessage(err) }, 'Failed to close PR')
      }
    }

    if (!(await root.removeWorktree(worktree))) logger.warn({ worktree }, 'Failed to remove worktree')
    if ((await root.branchExists(branch)) && !(await root.deleteLocalBranch(branch))) {
      logger.warn({ branch }, 'Failed to delete local branch')
    }
    if (!(await root.deleteRemoteBranch(branch))) logger.warn({ branch }, 'Failed to delete remote branch')
    session.clearSnapshot(issue)

    logger.info({ issue, branch, behind }, 'Stale branch cleaned up; restarting fresh')
    this._deps.eventBus?.emit('stale:restarted', { issue, behind })
  }

  private async _choose<T extends string>(question: string, choices: PromptChoice<T>[]): Promise<T | 'abort'> {
    const prompter = this._deps.prompter
    if (prompter === undefined) return 'abort'
    return prompter.choose<T | 'abort'>(question, choices, 'abort')
  }
}

export function createStaleBranchManager(deps: StaleBranchManagerDeps): StaleBranchManager {
  return new StaleBranchManagerImpl(deps)
}
