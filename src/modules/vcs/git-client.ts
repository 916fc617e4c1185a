/**
 * GitClient interface: the version-control operations the pipeline needs.
 *
 * A client is bound to one working directory (the main clone or a linked
 * worktree) and one remote. Use `at(cwd)` to get a client for another
 * worktree of the same repository.
 *
 * Read operations return null/empty on failure; mutating operations return
 * a result the caller inspects. Nothing here throws for an ordinary git
 * failure.
 */

import type { Commit } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/** Outcome of a rebase or merge; on conflict the operation is left in progress */
export interface IntegrateResult {
  ok: boolean
  conflicts: string[]
}

export interface PushOptions {
  /** Guard a force push on the remote head observed earlier */
  forceWithLease?: { expectedSha: string }
  setUpstream?: boolean
}

export type PushResult =
  | { ok: true }
  | { ok: false; rejected: boolean; message: string }

export interface LogOptions {
  /** Exclude commits reachable from these refs (`--not ...`) */
  not?: string[]
  limit?: number
}

// ---------------------------------------------------------------------------
// GitClient
// ---------------------------------------------------------------------------

export interface GitClient {
  readonly cwd: string
  readonly remote: string

  /** Client for another worktree of the same repository */
  at(cwd: string): GitClient

  /** `<remote>/<branch>` */
  remoteRef(branch: string): string

  fetch(ref?: string): Promise<boolean>
  revParse(ref: string): Promise<string | null>
  /** Null when HEAD is detached or the directory is not a repository */
  currentBranch(): Promise<string | null>
  branchExists(branch: string): Promise<boolean>

  /** Commits in `range`, newest first */
  log(range: string, options?: LogOptions): Promise<Commit[]>
  logOneline(range: string): Promise<string[]>
  isAncestor(ancestor: string, descendant: string): Promise<boolean>
  mergeBase(a: string, b: string): Promise<string | null>
  countCommits(range: string): Promise<number>
  changedFiles(range: string): Promise<string[]>
  diffStat(range: string): Promise<string>
  /** Patch text for `range`, truncated to `maxBytes` */
  diff(range: string, maxBytes?: number): Promise<string>

  isDirty(): Promise<boolean>
  statusShort(): Promise<string[]>
  lastCommit(): Promise<string | null>
  /** Stage everything and commit; false when there was nothing to commit */
  commitAll(message: string): Promise<boolean>

  stashPush(message: string): Promise<boolean>
  stashPop(): Promise<boolean>

  rebase(onto: string): Promise<IntegrateResult>
  rebaseAbort(): Promise<void>
  merge(ref: string): Promise<IntegrateResult>
  mergeAbort(): Promise<void>

  push(branch: string, options?: PushOptions): Promise<PushResult>
  deleteRemoteBranch(branch: string): Promise<boolean>
  deleteLocalBranch(branch: string): Promise<boolean>

  addWorktree(path: string, branch: string, base: string): Promise<boolean>
  removeWorktree(path: string): Promise<boolean>
}
