/**
 * setupInterruptHandler: registers SIGINT and SIGTERM handlers that save
 * in-progress work before the process exits.
 *
 * On signal receipt:
 *  1. Commits and pushes uncommitted worktree changes (unattended), or asks
 *     first (attended)
 *  2. Saves a resume snapshot for the current issue
 *  3. Changes back to the repository root
 *  4. Exits with code 130
 *
 * Returns a cleanup function that removes the listeners (for test teardown).
 */

import { existsSync } from 'node:fs'
import type pino from 'pino'
import { errorMessage } from '../../core/errors.js'
import type { Mode } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { Prompter } from '../prompter/prompter.js'
import type { Snapshot } from '../session-tracker/schemas.js'
import type { SessionTracker } from '../session-tracker/session-tracker.js'
import type { GitClient } from '../vcs/git-client.js'

const defaultLogger = createLogger('interrupt-handler')

export const INTERRUPT_EXIT_CODE = 130

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The slice of `process` the handler touches */
export interface ProcessHooks {
  on(signal: NodeJS.Signals, handler: () => void): void
  removeListener(signal: NodeJS.Signals, handler: () => void): void
  chdir(directory: string): void
  exit(code: number): void
}

export interface InterruptHandlerOptions {
  repoRoot: string
  mode: Mode
  /** Client bound to the main clone */
  git: GitClient
  session: SessionTracker
  prompter?: Prompter
  hooks?: ProcessHooks
  logger?: pino.Logger
}

const processHooks: ProcessHooks = {
  on: (signal, handler) => {
    process.on(signal, handler)
  },
  removeListener: (signal, handler) => {
    process.removeListener(signal, handler)
  },
  chdir: (directory) => {
    process.chdir(directory)
  },
  exit: (code) => {
    process.exit(code)
  },
}

// ---------------------------------------------------------------------------
// saveInterruptedWork
// ---------------------------------------------------------------------------

/**
 * Commit work in the current issue's worktree and snapshot the issue.
 * Null when no issue is in progress.
 */
export async function saveInterruptedWork(
  options: Omit<InterruptHandlerOptions, 'hooks'>
): Promise<Snapshot | null> {
  const { session, git, mode, prompter } = options
  const log = options.logger ?? defaultLogger
  const state = session.read()
  if (state.currentIssue === null) return null

  const worktree = state.worktreePath
  if (worktree !== null && existsSync(worktree)) {
    const wt = git.at(worktree)
    if (await wt.isDirty()) {
      const branch = await wt.currentBranch()
      const commit =
        mode === 'unattended' ||
        prompter === undefined ||
        (await prompter.choose(
          `Uncommitted changes in ${worktree}. Commit them as work in progress?`,
          [
            { key: 'y', label: 'Commit and push a wip commit', value: 'commit', recommended: true },
            { key: 'n', label: 'Leave the changes uncommitted', value: 'leave' },
          ],
          'commit'
        )) === 'commit'

      if (commit && (await wt.commitAll(`wip: ${branch ?? 'detached'} auto-commit on interrupt`))) {
        log.info({ worktree, branch }, 'Work in progress committed')
        if (branch !== null) {
          const pushed = await wt.push(branch)
          if (!pushed.ok) log.warn({ branch, err: pushed.message }, 'Push of wip commit failed')
        }
      }
    }
  }

  return session.snapshot(state.currentIssue, 'interrupted', worktree)
}

// ---------------------------------------------------------------------------
// setupInterruptHandler
// ---------------------------------------------------------------------------

/**
 * Register SIGINT and SIGTERM handlers. A second signal while saving is
 * ignored.
 *
 * @returns Cleanup function that removes the signal listeners
 */
export function setupInterruptHandler(options: InterruptHandlerOptions): () => void {
  const hooks = options.hooks ?? processHooks
  const log = options.logger ?? defaultLogger
  let interrupted = false

  const interrupt = async (signal: NodeJS.Signals): Promise<void> => {
    if (interrupted) return
    interrupted = true
    log.warn({ signal }, 'Interrupted; saving work')

    try {
      const snapshot = await saveInterruptedWork(options)
      if (snapshot !== null) {
        log.info({ issue: snapshot.issue }, `Resume with: shipline run ${String(snapshot.issue)}`)
      }
    } catch (err) {
      log.error({ err: errorMessage(err) }, 'Failed to save work on interrupt')
    }

    hooks.chdir(options.repoRoot)
    hooks.exit(INTERRUPT_EXIT_CODE)
  }

  const sigintHandler = (): void => {
    void interrupt('SIGINT')
  }

  const sigtermHandler = (): void => {
    void interrupt('SIGTERM')
  }

  hooks.on('SIGINT', sigintHandler)
  hooks.on('SIGTERM', sigtermHandler)

  return (): void => {
    hooks.removeListener('SIGINT', sigintHandler)
    hooks.removeListener('SIGTERM', sigtermHandler)
  }
}
