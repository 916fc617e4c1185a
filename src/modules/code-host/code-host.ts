/**
 * CodeHost interface: the remote code-hosting API as the pipeline sees it.
 *
 * Reads resolve to null/empty on "not found"; transient failures reject
 * with CodeHostError so callers can distinguish "no signal" from "absent"
 * and degrade deliberately.
 */

import type { Comment, Commit, Issue, PullRequest } from '../../core/types.js'

export interface CreatePullRequestInput {
  branch: string
  base: string
  title: string
  body: string
  draft?: boolean
}

export type MergeOutcome =
  | { ok: true }
  /** `headChanged`: the host refused because the head moved past `expectedHeadSha` */
  | { ok: false; headChanged: boolean; message: string }

export interface CodeHost {
  getIssue(issue: number): Promise<Issue | null>
  /** PR whose body closes the issue, falling back to a title reference; open PRs win */
  findPullRequestForIssue(issue: number): Promise<PullRequest | null>
  getPullRequest(pr: number): Promise<PullRequest | null>
  createPullRequest(input: CreatePullRequestInput): Promise<PullRequest>
  listComments(pr: number): Promise<Comment[]>
  postComment(pr: number, body: string): Promise<void>
  closePullRequest(pr: number): Promise<void>
  /** Take a draft PR out of draft */
  markReady(pr: number): Promise<void>
  listPullRequestCommits(pr: number): Promise<Commit[]>
  listPullRequestFiles(pr: number): Promise<string[]>
  getPullRequestDiff(pr: number): Promise<string>
  /** Current remote head of the PR; null when it cannot be read */
  getHeadSha(pr: number): Promise<string | null>
  mergePullRequest(pr: number, expectedHeadSha: string): Promise<MergeOutcome>
}
