/**
 * Stash-safe integration: rebase or merge that leaves the working tree
 * exactly as it was when the operation has conflicts.
 *
 * Shared by divergence resolution (rebase onto the remote branch) and the
 * stale-branch manager (merge of mainline).
 */

import { createLogger } from '../../utils/logger.js'
import type { GitClient } from '../vcs/git-client.js'

const logger = createLogger('safe-integrate')

export type IntegrateKind = 'rebase' | 'merge'

export type SafeIntegrateResult =
  /** `stashKept`: the stash could not be re-applied and was left in place */
  | { ok: true; stashKept: boolean }
  | { ok: false; conflicts: string[] }

/**
 * 1. Dirty tree ⇒ stash (untracked files included).
 * 2. Rebase onto / merge `ref`.
 * 3. Conflict ⇒ abort, pop the stash, report the conflicting paths.
 * 4. Success ⇒ pop the stash; a pop conflict keeps the stash and warns.
 */
export async function safeIntegrate(
  git: GitClient,
  kind: IntegrateKind,
  ref: string
): Promise<SafeIntegrateResult> {
  let stashed = false
  if (await git.isDirty()) {
    stashed = await git.stashPush(`shipline: auto-stash before ${kind}`)
    if (stashed) logger.info({ cwd: git.cwd, kind }, 'Stashed uncommitted changes')
  }

  const result = kind === 'rebase' ? await git.rebase(ref) : await git.merge(ref)

  if (!result.ok) {
    logger.warn({ cwd: git.cwd, kind, ref, conflicts: result.conflicts }, 'Integration conflicted; aborting')
    if (kind === 'rebase') {
      await git.rebaseAbort()
    } else {
      await git.mergeAbort()
    }
    if (stashed && !(await git.stashPop())) {
      logger.warn({ cwd: git.cwd }, 'Could not re-apply stash after abort; it is preserved')
    }
    return { ok: false, conflicts: result.conflicts }
  }

  let stashKept = false
  if (stashed && !(await git.stashPop())) {
    stashKept = true
    logger.warn({ cwd: git.cwd }, "Stash pop had conflicts; stash preserved (run 'git stash pop' manually)")
  }
  return { ok: true, stashKept }
}
