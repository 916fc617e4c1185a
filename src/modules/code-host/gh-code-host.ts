/**
 * GhCodeHost: CodeHost backed by the GitHub CLI (`gh`).
 *
 * All JSON output is validated with zod before it reaches the pipeline;
 * timestamps are converted to epoch seconds at this boundary.
 */

import type { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { maskTokens } from '../../utils/masking.js'
import { spawnProcess, type ProcessResult } from '../../utils/process.js'
import { CodeHostError } from '../../core/errors.js'
import type { Comment, Commit, Issue, PullRequest, PullRequestState } from '../../core/types.js'
import { toEpochSeconds } from '../state-resolver/timestamps.js'
import type { CodeHost, CreatePullRequestInput, MergeOutcome } from './code-host.js'
import {
  GhCommentsSchema,
  GhCommitsSchema,
  GhFilesSchema,
  GhHeadSchema,
  GhIssueSchema,
  GhPullRequestListSchema,
  GhPullRequestSchema,
  PR_JSON_FIELDS,
  type GhPullRequest,
} from './schemas.js'

const logger = createLogger('gh-code-host')

const NOT_FOUND_PATTERN = /not found|could not resolve|no pull requests found/i
const HEAD_CHANGED_PATTERN = /\b409\b|head branch was modified/i

export interface GhCodeHostOptions {
  /** Directory inside the repository; gh infers the GitHub repo from it */
  cwd: string
  env?: NodeJS.ProcessEnv
  /** Merge method passed to the merge endpoint */
  mergeMethod?: 'merge' | 'squash' | 'rebase'
}

// ---------------------------------------------------------------------------
// PR detection
// ---------------------------------------------------------------------------

/** True when the PR body carries a closing keyword for `issue` */
export function closesIssue(body: string, issue: number): boolean {
  return new RegExp(`\\b(closes|fixes|resolves) #${String(issue)}\\b`, 'i').test(body)
}

/** True when the PR title references `#issue` */
export function titleReferences(title: string, issue: number): boolean {
  return new RegExp(`#${String(issue)}\\b`).test(title)
}

/**
 * Choose the PR for an issue: closing-keyword matches first, then title
 * references. Within a tier, open PRs beat closed/merged, then newest wins.
 */
export function pickPullRequestForIssue<T extends { number: number; title: string; body: string; state: PullRequestState }>(
  candidates: T[],
  issue: number
): T | null {
  const rank = (pr: T): number => (pr.state === 'open' ? 0 : 1)
  const byPreference = (a: T, b: T): number => rank(a) - rank(b) || b.number - a.number
  const byBody = candidates.filter((pr) => closesIssue(pr.body, issue)).sort(byPreference)
  if (byBody[0] !== undefined) return byBody[0]
  const byTitle = candidates.filter((pr) => titleReferences(pr.title, issue)).sort(byPreference)
  return byTitle[0] ?? null
}

function toPullRequest(raw: GhPullRequest): PullRequest {
  const state: PullRequestState =
    raw.state === 'OPEN' ? 'open' : raw.state === 'MERGED' ? 'merged' : 'closed'
  return {
    number: raw.number,
    title: raw.title,
    body: raw.body ?? '',
    branch: raw.headRefName,
    headSha: raw.headRefOid,
    draft: raw.isDraft,
    state,
    url: raw.url,
  }
}

// ---------------------------------------------------------------------------
// GhCodeHost
// ---------------------------------------------------------------------------

export class GhCodeHost implements CodeHost {
  private readonly _cwd: string
  private readonly _env: NodeJS.ProcessEnv | undefined
  private readonly _mergeMethod: 'merge' | 'squash' | 'rebase'

  constructor(options: GhCodeHostOptions) {
    this._cwd = options.cwd
    this._env = options.env
    this._mergeMethod = options.mergeMethod ?? 'squash'
  }

  async getIssue(issue: number): Promise<Issue | null> {
    const data = await this._json(
      ['issue', 'view', String(issue), '--json', 'number,title,body'],
      GhIssueSchema
    )
    if (data === null) return null
    return { number: data.number, title: data.title, body: data.body ?? '' }
  }

  /** Open PRs first; closed and merged ones only through a search for `#issue` */
  async findPullRequestForIssue(issue: number): Promise<PullRequest | null> {
    const open = await this._json(
      ['pr', 'list', '--state', 'open', '--limit', '100', '--json', PR_JSON_FIELDS],
      GhPullRequestListSchema
    )
    const fromOpen = pickPullRequestForIssue((open ?? []).map(toPullRequest), issue)
    if (fromOpen !== null) return fromOpen

    const searched = await this._json(
      ['pr', 'list', '--state', 'all', '--search', `#${String(issue)}`, '--limit', '100', '--json', PR_JSON_FIELDS],
      GhPullRequestListSchema
    )
    if (searched === null) return null
    return pickPullRequestForIssue(searched.map(toPullRequest), issue)
  }

  async getPullRequest(pr: number): Promise<PullRequest | null> {
    return this._viewPullRequest(String(pr))
  }

  async createPullRequest(input: CreatePullRequestInput): Promise<PullRequest> {
    const args = [
      'pr', 'create',
      '--head', input.branch,
      '--base', input.base,
      '--title', input.title,
      '--body', input.body,
    ]
    if (input.draft === true) args.push('--draft')
    await this._run(args)
    const created = await this._viewPullRequest(input.branch)
    if (created === null) {
      throw new CodeHostError(`Pull request for ${input.branch} not found after creation`, {
        branch: input.branch,
      })
    }
    logger.info({ pr: created.number, branch: input.branch }, 'Pull request created')
    return created
  }

  async listComments(pr: number): Promise<Comment[]> {
    const data = await this._json(['pr', 'view', String(pr), '--json', 'comments'], GhCommentsSchema)
    if (data === null) return []
    const comments: Comment[] = []
    for (const raw of data.comments) {
      const timestamp = toEpochSeconds(raw.createdAt)
      if (timestamp === null) {
        logger.warn({ pr, id: raw.id, createdAt: raw.createdAt }, 'Skipping comment with unreadable timestamp')
        continue
      }
      comments.push({ id: raw.id, body: raw.body, timestamp, author: raw.author?.login })
    }
    return comments
  }

  async postComment(pr: number, body: string): Promise<void> {
    await this._run(['pr', 'comment', String(pr), '--body-file', '-'], body)
  }

  async closePullRequest(pr: number): Promise<void> {
    await this._run(['pr', 'close', String(pr)])
  }

  async markReady(pr: number): Promise<void> {
    await this._run(['pr', 'ready', String(pr)])
  }

  async listPullRequestCommits(pr: number): Promise<Commit[]> {
    const data = await this._json(['pr', 'view', String(pr), '--json', 'commits'], GhCommitsSchema)
    if (data === null) return []
    const commits: Commit[] = []
    for (const raw of data.commits) {
      const timestamp = toEpochSeconds(raw.authoredDate)
      const committedAt = toEpochSeconds(raw.committedDate)
      if (timestamp === null || committedAt === null) continue
      commits.push({ sha: raw.oid, message: raw.messageHeadline, timestamp, committedAt })
    }
    // gh lists oldest first; the rest of the pipeline expects newest first
    return commits.reverse()
  }

  async listPullRequestFiles(pr: number): Promise<string[]> {
    const data = await this._json(['pr', 'view', String(pr), '--json', 'files'], GhFilesSchema)
    return data === null ? [] : data.files.map((f) => f.path)
  }

  async getPullRequestDiff(pr: number): Promise<string> {
    const result = await this._run(['pr', 'diff', String(pr)])
    return result.stdout
  }

  async getHeadSha(pr: number): Promise<string | null> {
    try {
      const data = await this._json(['pr', 'view', String(pr), '--json', 'headRefOid'], GhHeadSchema)
      return data?.headRefOid ?? null
    } catch (err) {
      logger.warn({ pr, err }, 'Could not read PR head')
      return null
    }
  }

  async mergePullRequest(pr: number, expectedHeadSha: string): Promise<MergeOutcome> {
    const result = await this._spawn([
      'api', '-X', 'PUT',
      `repos/{owner}/{repo}/pulls/${String(pr)}/merge`,
      '-f', `sha=${expectedHeadSha}`,
      '-f', `merge_method=${this._mergeMethod}`,
    ])
    if (result.code === 0) {
      logger.info({ pr, sha: expectedHeadSha }, 'Pull request merged')
      return { ok: true }
    }
    const message = maskTokens(result.stderr || result.stdout)
    return { ok: false, headChanged: HEAD_CHANGED_PATTERN.test(message), message }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _viewPullRequest(selector: string): Promise<PullRequest | null> {
    const data = await this._json(['pr', 'view', selector, '--json', PR_JSON_FIELDS], GhPullRequestSchema)
    return data === null ? null : toPullRequest(data)
  }

  private _spawn(args: string[], input?: string): Promise<ProcessResult> {
    logger.debug({ args }, 'gh')
    return spawnProcess('gh', args, { cwd: this._cwd, env: this._env, input })
  }

  /** Run gh; reject on any failure */
  private async _run(args: string[], input?: string): Promise<ProcessResult> {
    const result = await this._spawn(args, input)
    if (result.code !== 0) {
      throw new CodeHostError(`gh ${args.slice(0, 2).join(' ')} failed: ${maskTokens(result.stderr)}`, {
        args: args.slice(0, 3),
        code: result.code,
      })
    }
    return result
  }

  /** Run gh expecting JSON; null when the entity does not exist */
  private async _json<S extends z.ZodTypeAny>(args: string[], schema: S): Promise<z.output<S> | null> {
    const result = await this._spawn(args)
    if (result.code !== 0) {
      if (NOT_FOUND_PATTERN.test(result.stderr)) return null
      throw new CodeHostError(`gh ${args.slice(0, 2).join(' ')} failed: ${maskTokens(result.stderr)}`, {
        args: args.slice(0, 3),
        code: result.code,
      })
    }
    let raw: unknown
    try {
      raw = JSON.parse(result.stdout)
    } catch {
      throw new CodeHostError(`gh ${args.slice(0, 2).join(' ')} returned invalid JSON`, { args: args.slice(0, 3) })
    }
    const parsed = schema.safeParse(raw)
    if (!parsed.success) {
      throw new CodeHostError(`gh ${args.slice(0, 2).join(' ')} returned unexpected data`, {
        issues: parsed.error.issues,
      })
    }
    return parsed.data
  }
}

export function createGhCodeHost(options: GhCodeHostOptions): CodeHost {
  return new GhCodeHost(options)
}
