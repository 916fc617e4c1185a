/**
 * GitClientImpl: GitClient backed by the git CLI via spawnGit.
 */

import { createLogger } from '../../utils/logger.js'
import type { Commit } from '../../core/types.js'
import type {
  GitClient,
  IntegrateResult,
  LogOptions,
  PushOptions,
  PushResult,
} from './git-client.js'
import { COMMIT_LOG_FORMAT, parseCommitLog, spawnGit, splitLines } from './git-utils.js'

const logger = createLogger('git-client')

const PUSH_REJECTED_PATTERN = /\[rejected\]|non-fast-forward|stale info|fetch first/i

export interface GitClientOptions {
  cwd: string
  remote?: string
  env?: NodeJS.ProcessEnv
}

export class GitClientImpl implements GitClient {
  readonly cwd: string
  readonly remote: string
  private readonly _env: NodeJS.ProcessEnv | undefined

  constructor(options: GitClientOptions) {
    this.cwd = options.cwd
    this.remote = options.remote ?? 'origin'
    this._env = options.env
  }

  at(cwd: string): GitClient {
    return new GitClientImpl({ cwd, remote: this.remote, env: this._env })
  }

  remoteRef(branch: string): string {
    return `${this.remote}/${branch}`
  }

  // ---------------------------------------------------------------------------
  // Refs
  // ---------------------------------------------------------------------------

  async fetch(ref?: string): Promise<boolean> {
    const args = ref === undefined ? ['fetch', this.remote] : ['fetch', this.remote, ref]
    const result = await this._git(args)
    if (result.code !== 0) {
      logger.warn({ ref, stderr: result.stderr }, 'git fetch failed')
      return false
    }
    return true
  }

  async revParse(ref: string): Promise<string | null> {
    const result = await this._git(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`])
    return result.code === 0 && result.stdout !== '' ? result.stdout : null
  }

  async currentBranch(): Promise<string | null> {
    const result = await this._git(['symbolic-ref', '--quiet', '--short', 'HEAD'])
    return result.code === 0 && result.stdout !== '' ? result.stdout : null
  }

  async branchExists(branch: string): Promise<boolean> {
    const result = await this._git(['show-ref', '--verify', '--quiet', `refs/heads/${branch}`])
    return result.code === 0
  }

  // ---------------------------------------------------------------------------
  // History
  // ---------------------------------------------------------------------------

  async log(range: string, options: LogOptions = {}): Promise<Commit[]> {
    const args = ['log', `--format=${COMMIT_LOG_FORMAT}`]
    if (options.limit !== undefined) args.push(`-n${String(options.limit)}`)
    args.push(range)
    if (options.not !== undefined && options.not.length > 0) args.push('--not', ...options.not)
    const result = await this._git(args)
    if (result.code !== 0) {
      logger.debug({ range, stderr: result.stderr }, 'git log failed')
      return []
    }
    return parseCommitLog(result.stdout)
  }

  async logOneline(range: string): Promise<string[]> {
    const result = await this._git(['log', '--oneline', range])
    return result.code === 0 ? splitLines(result.stdout) : []
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    const result = await this._git(['merge-base', '--is-ancestor', ancestor, descendant])
    return result.code === 0
  }

  async mergeBase(a: string, b: string): Promise<string | null> {
    const result = await this._git(['merge-base', a, b])
    return result.code === 0 && result.stdout !== '' ? result.stdout : null
  }

  async countCommits(range: string): Promise<number> {
    const result = await this._git(['rev-list', '--count', range])
    if (result.code !== 0) return 0
    const count = parseInt(result.stdout, 10)
    return Number.isNaN(count) ? 0 : count
  }

  async changedFiles(range: string): Promise<string[]> {
    const result = await this._git(['diff', '--name-only', range])
    return result.code === 0 ? splitLines(result.stdout) : []
  }

  async diffStat(range: string): Promise<string> {
    const result = await this._git(['diff', '--stat', range])
    return result.code === 0 ? result.stdout : ''
  }

  async diff(range: string, maxBytes = 64_000): Promise<string> {
    const result = await this._git(['diff', range])
    if (result.code !== 0) return ''
    return result.stdout.length > maxBytes ? result.stdout.slice(0, maxBytes) : result.stdout
  }

  // ---------------------------------------------------------------------------
  // Working tree
  // ---------------------------------------------------------------------------

  /** Staged, unstaged or untracked changes; the same set `stashPush` saves */
  async isDirty(): Promise<boolean> {
    const result = await this._git(['status', '--porcelain'])
    if (result.code !== 0) return true
    return splitLines(result.stdout).length > 0
  }

  async statusShort(): Promise<string[]> {
    const result = await this._git(['status', '--short'])
    return result.code === 0 ? splitLines(result.stdout) : []
  }

  async lastCommit(): Promise<string | null> {
    const result = await this._git(['log', '-1', '--oneline'])
    return result.code === 0 && result.stdout !== '' ? result.stdout : null
  }

  async commitAll(message: string): Promise<boolean> {
    const status = await this.statusShort()
    if (status.length === 0) return false
    const add = await this._git(['add', '-A'])
    if (add.code !== 0) {
      logger.warn({ stderr: add.stderr }, 'git add failed')
      return false
    }
    const commit = await this._git(['commit', '-m', message])
    if (commit.code !== 0) {
      logger.warn({ stderr: commit.stderr }, 'git commit failed')
      return false
    }
    return true
  }

  // ---------------------------------------------------------------------------
  // Stash
  // ---------------------------------------------------------------------------

  async stashPush(message: string): Promise<boolean> {
    const result = await this._git(['stash', 'push', '--include-untracked', '-m', message])
    return result.code === 0
  }

  async stashPop(): Promise<boolean> {
    const result = await this._git(['stash', 'pop'])
    if (result.code !== 0) {
      logger.warn({ stderr: result.stderr }, 'git stash pop failed')
      return false
    }
    return true
  }

  // ---------------------------------------------------------------------------
  // Rebase / merge
  // ---------------------------------------------------------------------------

  async rebase(onto: string): Promise<IntegrateResult> {
    const result = await this._git(['rebase', onto])
    if (result.code === 0) return { ok: true, conflicts: [] }
    return { ok: false, conflicts: await this._conflictingFiles() }
  }

  async rebaseAbort(): Promise<void> {
    const result = await this._git(['rebase', '--abort'])
    if (result.code !== 0) logger.warn({ stderr: result.stderr }, 'git rebase --abort failed')
  }

  async merge(ref: string): Promise<IntegrateResult> {
    const result = await this._git(['merge', '--no-edit', ref])
    if (result.code === 0) return { ok: true, conflicts: [] }
    return { ok: false, conflicts: await this._conflictingFiles() }
  }

  async mergeAbort(): Promise<void> {
    const result = await this._git(['merge', '--abort'])
    if (result.code !== 0) logger.warn({ stderr: result.stderr }, 'git merge --abort failed')
  }

  // ---------------------------------------------------------------------------
  // Remote
  // ---------------------------------------------------------------------------

  async push(branch: string, options: PushOptions = {}): Promise<PushResult> {
    const args = ['push']
    if (options.setUpstream === true) args.push('-u')
    if (options.forceWithLease !== undefined) {
      args.push(`--force-with-lease=${branch}:${options.forceWithLease.expectedSha}`)
    }
    args.push(this.remote, branch)
    const result = await this._git(args)
    if (result.code === 0) return { ok: true }
    return {
      ok: false,
      rejected: PUSH_REJECTED_PATTERN.test(result.stderr),
      message: result.stderr,
    }
  }

  async deleteRemoteBranch(branch: string): Promise<boolean> {
    const result = await this._git(['push', this.remote, '--delete', branch])
    return result.code === 0
  }

  async deleteLocalBranch(branch: string): Promise<boolean> {
    const result = await this._git(['branch', '-D', branch])
    return result.code === 0
  }

  // ---------------------------------------------------------------------------
  // Worktrees
  // ---------------------------------------------------------------------------

  async addWorktree(path: string, branch: string, base: string): Promise<boolean> {
    const args = (await this.branchExists(branch))
      ? ['worktree', 'add', path, branch]
      : ['worktree', 'add', '-b', branch, path, base]
    const result = await this._git(args)
    if (result.code !== 0) {
      logger.warn({ path, branch, stderr: result.stderr }, 'git worktree add failed')
      return false
    }
    return true
  }

  async removeWorktree(path: string): Promise<boolean> {
    const result = await this._git(['worktree', 'remove', '--force', path])
    return result.code === 0
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _conflictingFiles(): Promise<string[]> {
    const result = await this._git(['diff', '--name-only', '--diff-filter=U'])
    return result.code === 0 ? splitLines(result.stdout) : []
  }

  private _git(args: string[]): ReturnType<typeof spawnGit> {
    return spawnGit(args, { cwd: this.cwd, env: this._env })
  }
}

export function createGitClient(options: GitClientOptions): GitClient {
  return new GitClientImpl(options)
}
