/**
 * DivergenceClassifierImpl: policy for foreign commits on a PR branch.
 *
 * Every force push is leased on the remote head observed at detection, so
 * a commit that lands after detection makes the push fail instead of being
 * discarded.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { errorMessage } from '../../core/errors.js'
import type { AssessmentRecord, BlockerEvent, BlockerType, Issue, Mode, Urgency } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { CodeHost } from '../code-host/code-host.js'
import type { Notifier } from '../notifications/notifier.js'
import type { PromptChoice, Prompter } from '../prompter/prompter.js'
import { latestAssessment } from '../state-resolver/review-parser.js'
import type { GitClient } from '../vcs/git-client.js'
import type { CommitClassifier } from './commit-classifier.js'
import { decideDivergence, type DivergenceAction, type OperatorOption } from './decision-matrix.js'
import type { DivergenceClassifier } from './divergence-classifier.js'
import { classifyHeuristically } from './heuristics.js'
import { safeIntegrate } from './safe-integrate.js'
import type {
  ClassificationResult,
  DivergenceContext,
  DivergenceReport,
  DivergenceResolution,
  HeadVerification,
} from './types.js'

const logger = createLogger('divergence')

const OPTION_CHOICES: Record<OperatorOption, PromptChoice<OperatorOption>> = {
  'pull-and-re-review': {
    key: 'a',
    label: 'Pull and re-enter review cycle (new review for combined changes)',
    value: 'pull-and-re-review',
  },
  'pull-without-review': {
    key: 'b',
    label: 'Pull without review (you take responsibility for these commits)',
    value: 'pull-without-review',
  },
  'force-push-local': {
    key: 'c',
    label: 'Overwrite remote with local work (force-push, discards foreign commits)',
    value: 'force-push-local',
  },
  abort: { key: 'd', label: 'Abort workflow', value: 'abort' },
}

function blocker(type: BlockerType, urgency: Urgency, details: string): DivergenceResolution {
  const event: BlockerEvent = { type, urgency, details, batchBlocking: false }
  return { kind: 'blocked', blocker: event }
}

function describeCommits(report: DivergenceReport): string {
  return report.foreignCommits.map((c) => `${c.sha.slice(0, 7)} ${c.message}`).join('\n')
}

export interface DivergenceClassifierDeps {
  git: GitClient
  codeHost: CodeHost
  classifier: CommitClassifier
  /** Mainline branch name, e.g. "main" */
  mainline: string
  /** Assessment marker tag */
  assessmentTag: string
  prompter?: Prompter
  notifier?: Notifier
  eventBus?: TypedEventBus
}

export class DivergenceClassifierImpl implements DivergenceClassifier {
  private readonly _deps: DivergenceClassifierDeps

  constructor(deps: DivergenceClassifierDeps) {
    this._deps = deps
  }

  // -------------------------------------------------------------------------
  // Detection
  // -------------------------------------------------------------------------

  async detect(branch: string, cwd: string): Promise<DivergenceReport | null> {
    const git = this._deps.git.at(cwd)
    if (!(await git.fetch(branch))) {
      logger.warn({ branch }, `Could not fetch ${git.remoteRef(branch)}`)
      return null
    }

    const localHead = await git.revParse('HEAD')
    const remoteHead = await git.revParse(git.remoteRef(branch))
    if (localHead === null || remoteHead === null || localHead === remoteHead) return null

    const foreignCommits = await git.log(`${localHead}..${remoteHead}`)
    if (foreignCommits.length === 0) return null

    const localAhead = await git.countCommits(`${remoteHead}..${localHead}`)
    const report: DivergenceReport = {
      branch,
      cwd,
      localHead,
      remoteHead,
      foreignCommits,
      diffStat: await git.diffStat(`${localHead}..${remoteHead}`),
      localAhead,
      threeWay: localAhead > 0,
    }

    logger.warn(
      { branch, foreign: foreignCommits.length, localAhead },
      'Remote branch has foreign commits'
    )
    if (report.threeWay) {
      logger.warn(
        { branch, localAhead },
        'Local and remote have both moved; resolving as a plain divergence'
      )
    }
    this._deps.eventBus?.emit('divergence:detected', {
      branch,
      foreignCommits: foreignCommits.length,
      threeWay: report.threeWay,
    })
    return report
  }

  // -------------------------------------------------------------------------
  // Classification
  // -------------------------------------------------------------------------

  async classify(report: DivergenceReport, context: DivergenceContext): Promise<ClassificationResult> {
    const git = this._deps.git.at(report.cwd)
    const offMainline = await git.log(`${report.localHead}..${report.remoteHead}`, {
      not: [git.remoteRef(this._deps.mainline)],
    })

    const fast = classifyHeuristically({ foreign: report.foreignCommits, offMainline })
    if (fast !== null) {
      logger.info({ branch: report.branch, ...fast }, 'Fast classification')
      return fast
    }

    const issue = context.issueDetails !== undefined ? context.issueDetails : await this._issueDetails(context.issue)
    const answer = await this._deps.classifier.classify({
      cwd: report.cwd,
      branch: report.branch,
      issue,
      commits: report.foreignCommits,
      diffStat: report.diffStat,
    })
    if (answer !== null) {
      logger.info({ branch: report.branch, classification: answer }, 'Classifier result')
      return { classification: answer, source: 'classifier' }
    }

    // Attended: the operator decides among options; unattended: fail closed
    const fallback = context.mode === 'unattended' ? 'UNRELATED' : 'RELATED'
    logger.warn({ branch: report.branch, fallback }, 'Classification failed; using mode default')
    return { classification: fallback, source: 'fallback' }
  }

  isReviewed(report: DivergenceReport, assessment: AssessmentRecord | null): boolean {
    if (assessment === null || report.foreignCommits.length === 0) return false
    const newestForeign = Math.max(...report.foreignCommits.map((c) => c.timestamp))
    return assessment.timestamp > newestForeign
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  async resolve(
    report: DivergenceReport,
    classification: ClassificationResult,
    reviewed: boolean,
    mode: Mode,
    context: DivergenceContext
  ): Promise<DivergenceResolution> {
    const decision = decideDivergence(classification.classification, reviewed, mode)
    // Blocked outcomes are notified by whoever handles the blocker
    if (decision.notify && decision.step.action !== 'block') {
      await this._notify(report, classification, context)
    }

    const resolution = await this._act(report, classification, decision.step, reviewed, mode)

    this._deps.eventBus?.emit('divergence:resolved', {
      branch: report.branch,
      classification: classification.classification,
      outcome:
        resolution.kind === 'resolved'
          ? 'resolved'
          : resolution.kind === 'blocked'
            ? 'blocked'
            : 'needs-re-review',
    })
    return resolution
  }

  async handlePushRejection(
    branch: string,
    cwd: string,
    context: DivergenceContext
  ): Promise<DivergenceResolution> {
    const report = await this.detect(branch, cwd)
    if (report === null) {
      return blocker('push_failed', 'high', `Push to ${branch} was rejected but no foreign commits were found`)
    }
    const classification = await this.classify(report, context)
    const reviewed = this.isReviewed(report, await this._assessment(context.pr))
    return this.resolve(report, classification, reviewed, context.mode, context)
  }

  async verifyHead(pr: number, expectedSha: string): Promise<HeadVerification> {
    const current = await this._deps.codeHost.getHeadSha(pr)
    if (current === null) {
      logger.warn({ pr }, 'Could not fetch PR head SHA; skipping verification')
      return { status: 'unknown' }
    }
    if (current !== expectedSha) {
      logger.warn(
        { pr, expected: expectedSha.slice(0, 12), current: current.slice(0, 12) },
        'PR head has changed since assessment'
      )
      return { status: 'changed', expected: expectedSha, current }
    }
    return { status: 'ok' }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async _act(
    report: DivergenceReport,
    classification: ClassificationResult,
    step: DivergenceAction,
    reviewed: boolean,
    mode: Mode
  ): Promise<DivergenceResolution> {
    switch (step.action) {
      case 'rebase-and-push':
        return this._rebaseAndPush(report, mode)
      case 'block':
        return blocker(
          step.blocker,
          step.blocker === 'unrelated_divergence' ? 'urgent' : 'high',
          `${classification.classification} foreign commits on ${report.branch}` +
            `${reviewed ? '' : ' (unreviewed)'}:\n${describeCommits(report)}`
        )
      case 'offer':
        return this._offer(report, classification, step.options, mode)
    }
  }

  private async _offer(
    report: DivergenceReport,
    classification: ClassificationResult,
    options: OperatorOption[],
    mode: Mode
  ): Promise<DivergenceResolution> {
    const choice = await this._choose(
      `${classification.classification} foreign commits on ${report.branch}:\n${describeCommits(report)}`,
      options
    )
    const git = this._deps.git.at(report.cwd)

    switch (choice) {
      case 'pull-and-re-review': {
        const integrated = await safeIntegrate(git, 'rebase', git.remoteRef(report.branch))
        if (!integrated.ok) return this._escalateConflict(report, integrated.conflicts, mode)
        const pushed = await git.push(report.branch)
        if (!pushed.ok) return blocker('push_failed', 'high', `Push after rebase failed: ${pushed.message}`)
        return { kind: 'needs-re-review' }
      }
      case 'pull-without-review':
        return this._rebaseAndPush(report, mode)
      case 'force-push-local':
        return this._forcePush(report)
      case 'abort':
        return blocker('operator_abort', 'normal', `Divergence on ${report.branch} left unresolved by operator`)
    }
  }

  private async _rebaseAndPush(report: DivergenceReport, mode: Mode): Promise<DivergenceResolution> {
    const git = this._deps.git.at(report.cwd)
    const integrated = await safeIntegrate(git, 'rebase', git.remoteRef(report.branch))
    if (!integrated.ok) return this._escalateConflict(report, integrated.conflicts, mode)

    const pushed = await git.push(report.branch)
    if (!pushed.ok) return blocker('push_failed', 'high', `Push after rebase failed: ${pushed.message}`)
    logger.info({ branch: report.branch }, 'Rebased and pushed')
    return { kind: 'resolved', action: 'rebased' }
  }

  private async _escalateConflict(
    report: DivergenceReport,
    conflicts: string[],
    mode: Mode
  ): Promise<DivergenceResolution> {
    const details = `Rebase of ${report.branch} onto its remote conflicted in:\n${conflicts.join('\n')}`
    if (mode === 'unattended') return blocker('rebase_conflict', 'high', details)

    const choice = await this._choose(details, ['force-push-local', 'abort'])
    return choice === 'force-push-local' ? this._forcePush(report) : blocker('rebase_conflict', 'high', details)
  }

  private async _forcePush(report: DivergenceReport): Promise<DivergenceResolution> {
    const git = this._deps.git.at(report.cwd)
    const pushed = await git.push(report.branch, { forceWithLease: { expectedSha: report.remoteHead } })
    if (!pushed.ok) {
      return blocker('push_failed', 'high', `Force-push to ${report.branch} failed: ${pushed.message}`)
    }
    logger.warn({ branch: report.branch, discarded: report.foreignCommits.length }, 'Force-pushed local work')
    return { kind: 'resolved', action: 'force-pushed' }
  }

  private async _choose(question: string, options: OperatorOption[]): Promise<OperatorOption> {
    const prompter = this._deps.prompter
    if (prompter === undefined) return 'abort'
    return prompter.choose(
      question,
      options.map((o) => OPTION_CHOICES[o]),
      'abort'
    )
  }

  private async _notify(
    report: DivergenceReport,
    classification: ClassificationResult,
    context: DivergenceContext
  ): Promise<void> {
    await this._deps.notifier?.notifyOnce(context.issue, `divergence-${report.remoteHead}`, {
      title: `Branch divergence on #${String(context.issue)}: ${classification.classification}`,
      body: [
        `Classification: ${classification.classification}`,
        `Issue: #${String(context.issue)}`,
        ...(context.pr === null ? [] : [`PR: #${String(context.pr)}`]),
        '',
        'Foreign commits on remote:',
        describeCommits(report),
        '',
        'Manual review needed before the workflow can continue.',
      ].join('\n'),
      urgency: 'urgent',
    })
  }

  private async _issueDetails(issue: number): Promise<Issue | null> {
    try {
      return await this._deps.codeHost.getIssue(issue)
    } catch (err) {
      logger.warn({ issue, err: errorMessage(err) }, 'Issue read failed; classifying without context')
      return null
    }
  }

  private async _assessment(pr: number | null): Promise<AssessmentRecord | null> {
    if (pr === null) return null
    try {
      return latestAssessment(await this._deps.codeHost.listComments(pr), this._deps.assessmentTag)
    } catch (err) {
      logger.warn({ pr, err: errorMessage(err) }, 'Comment read failed; treating foreign commits as unreviewed')
      return null
    }
  }
}

export function createDivergenceClassifier(deps: DivergenceClassifierDeps): DivergenceClassifier {
  return new DivergenceClassifierImpl(deps)
}
