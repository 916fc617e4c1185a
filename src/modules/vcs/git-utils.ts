/**
 * git-utils.ts: Low-level git process helpers.
 *
 * All git commands are executed via child_process.spawn (utils/process.ts).
 *
 * Functions:
 *  - spawnGit: Execute git with given args, returns stdout/stderr/code
 *  - parseCommitLog: Parses COMMIT_LOG_FORMAT log output into commits
 *  - splitLines: Splits command output into non-empty lines
 *  - findRepoRoot: Main clone root, also from inside a linked worktree
 */

import { dirname } from 'node:path'
import { PreconditionError } from '../../core/errors.js'
import { spawnProcess, type ProcessResult } from '../../utils/process.js'
import { createLogger } from '../../utils/logger.js'
import type { Commit } from '../../core/types.js'

const logger = createLogger('git-utils')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export type GitSpawnResult = ProcessResult

/** Unit separator between log fields; never appears in subjects */
export const LOG_FIELD_SEP = '\x1f'

/** `git log --format` producing sha, author epoch, committer epoch, subject */
export const COMMIT_LOG_FORMAT = '%H%x1f%at%x1f%ct%x1f%s'

// ---------------------------------------------------------------------------
// spawnGit
// ---------------------------------------------------------------------------

/**
 * Spawn a git subprocess with the given args.
 *
 * Never rejects: a spawn failure resolves with code 1 and the error text
 * in stderr. `TZ=UTC` is forced so date placeholders are never local time.
 *
 * @param args    - Arguments to pass to git (e.g., ['rebase', 'origin/main'])
 * @param options - Optional spawn options (cwd, env)
 */
export function spawnGit(args: string[], options?: SpawnOptions): Promise<GitSpawnResult> {
  logger.debug({ args, cwd: options?.cwd }, 'spawnGit')
  return spawnProcess('git', args, {
    cwd: options?.cwd,
    env: { ...(options?.env ?? process.env), TZ: 'UTC' },
  })
}

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

/** Split command output into trimmed, non-empty lines */
export function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== '')
}

/**
 * Parse COMMIT_LOG_FORMAT output.
 * Lines without four fields or with non-numeric timestamps are skipped.
 */
export function parseCommitLog(output: string): Commit[] {
  const commits: Commit[] = []
  for (const line of splitLines(output)) {
    const [sha, authored, committed, ...subject] = line.split(LOG_FIELD_SEP)
    if (sha === undefined || authored === undefined || committed === undefined) continue
    if (!/^\d+$/.test(authored) || !/^\d+$/.test(committed)) continue
    commits.push({
      sha,
      timestamp: parseInt(authored, 10),
      committedAt: parseInt(committed, 10),
      message: subject.join(LOG_FIELD_SEP),
    })
  }
  return commits
}

// ---------------------------------------------------------------------------
// Repository root
// ---------------------------------------------------------------------------

/**
 * Root of the main clone. The common git dir is shared by every linked
 * worktree, so this resolves the same directory from any of them.
 *
 * @throws {PreconditionError} when `cwd` is not inside a git repository
 */
export async function findRepoRoot(cwd: string, env?: NodeJS.ProcessEnv): Promise<string> {
  const result = await spawnGit(['rev-parse', '--path-format=absolute', '--git-common-dir'], { cwd, env })
  if (result.code !== 0 || result.stdout === '') {
    throw new PreconditionError('Not a git repository', { cwd, stderr: result.stderr })
  }
  return dirname(result.stdout)
}
