/**
 * StateResolverImpl: gathers PR, comment and history inputs and applies
 * resolvePhase, degrading on remote-read failures instead of throwing.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { Comment, PullRequest } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { CodeHost } from '../code-host/code-host.js'
import type { GitClient } from '../vcs/git-client.js'
import { formatPhase, resolvePhase, type MarkerTags } from './phase.js'
import { latestAssessment, latestReview } from './review-parser.js'
import type { DegradedInput, ResolveOptions, ResolvedState, StateResolver } from './state-resolver.js'
import type { CommitHistory, Phase } from './types.js'

const logger = createLogger('state-resolver')

/** Commits read from local history; the latest qualifying one is near the top */
const HISTORY_DEPTH = 50

export interface StateResolverDeps {
  codeHost: CodeHost
  git: GitClient
  markers: MarkerTags
  eventBus?: TypedEventBus
}

export class StateResolverImpl implements StateResolver {
  private readonly _codeHost: CodeHost
  private readonly _git: GitClient
  private readonly _markers: MarkerTags
  private readonly _eventBus: TypedEventBus | undefined

  constructor(deps: StateResolverDeps) {
    this._codeHost = deps.codeHost
    this._git = deps.git
    this._markers = deps.markers
    this._eventBus = deps.eventBus
  }

  phase(issue: number, pr: PullRequest | null, comments: Comment[], history?: CommitHistory): Phase {
    return resolvePhase(issue, pr, comments, this._markers, history)
  }

  async resolve(issue: number, options: ResolveOptions = {}): Promise<ResolvedState> {
    const degraded: DegradedInput[] = []

    let pr: PullRequest | null = null
    try {
      pr = await this._codeHost.findPullRequestForIssue(issue)
    } catch (err) {
      logger.warn({ issue, err }, 'PR lookup failed; treating as no signal')
      degraded.push('pull-request')
    }

    let comments: Comment[] = []
    if (pr !== null) {
      try {
        comments = await this._codeHost.listComments(pr.number)
      } catch (err) {
        logger.warn({ issue, pr: pr.number, err }, 'Comment read failed; treating as no review')
        degraded.push('comments')
      }
    }

    let history: CommitHistory = { source: 'unavailable' }
    if (pr !== null && pr.state === 'open') {
      history = await this.history(pr, options.worktreePath)
      if (history.source === 'unavailable') degraded.push('history')
    }

    const phase = this.phase(issue, pr, comments, history)
    logger.debug({ issue, phase: formatPhase(phase), degraded }, 'Phase resolved')
    this._eventBus?.emit('phase:resolved', { issue, phase: formatPhase(phase) })

    return {
      phase,
      pr,
      comments,
      review: latestReview(comments, this._markers.review),
      assessment: latestAssessment(comments, this._markers.assessment),
      history,
      degraded,
    }
  }

  async history(pr: PullRequest, worktreePath?: string): Promise<CommitHistory> {
    if (worktreePath !== undefined) {
      const git = this._git.at(worktreePath)
      const localHead = await git.revParse('HEAD')
      if (localHead !== null) {
        const commits = await git.log('HEAD', { limit: HISTORY_DEPTH })
        const remoteHead = await git.revParse(git.remoteRef(pr.branch))
        return { source: 'local', commits, localHead, remoteHead }
      }
      logger.debug({ worktreePath }, 'Worktree has no readable HEAD; using PR commits')
    }

    try {
      const commits = await this._codeHost.listPullRequestCommits(pr.number)
      return { source: 'remote', commits }
    } catch (err) {
      logger.warn({ pr: pr.number, err }, 'PR commit read failed')
      return { source: 'unavailable' }
    }
  }
}

export function createStateResolver(deps: StateResolverDeps): StateResolver {
  return new StateResolverImpl(deps)
}
