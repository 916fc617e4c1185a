/**
 * `shipline session` command
 *
 * Shows the recorded session (mode, elapsed time, counters, the issue in
 * progress) or, with --reset, deletes the record. Approvals and sent
 * notifications go with it.
 */

import { existsSync } from 'node:fs'
import type { Command } from 'commander'
import { errorMessage } from '../../core/errors.js'
import type { SessionTracker } from '../../modules/session-tracker/session-tracker.js'
import { createLogger } from '../../utils/logger.js'
import { loadShiplineContext, type ContextLoader } from './context.js'

const logger = createLogger('session-cmd')

export const SESSION_EXIT_SUCCESS = 0
export const SESSION_EXIT_ERROR = 1

export interface SessionActionOptions {
  reset: boolean
  cwd: string
  env?: NodeJS.ProcessEnv
}

export function formatSession(session: SessionTracker): string {
  const state = session.read()
  const summary = session.summary()
  const lines = [
    `Mode: ${summary.mode}`,
    `Elapsed: ${summary.duration}`,
    `Issues: ${String(summary.completed)} completed, ${String(summary.failed)} failed`,
  ]
  if (state.currentIssue !== null) lines.push(`In progress: #${String(state.currentIssue)}`)
  if (state.limitReached !== null) lines.push(`Limit reached: ${state.limitReached}`)
  if (state.approvedBlockers.length > 0) lines.push(`Approved blockers: ${state.approvedBlockers.join(', ')}`)
  return lines.join('\n')
}

export async function runSessionAction(
  options: SessionActionOptions,
  loadContext: ContextLoader = loadShiplineContext
): Promise<number> {
  try {
    const { session } = await loadContext({ cwd: options.cwd, mode: 'unattended', env: options.env })

    if (!existsSync(session.statePath)) {
      process.stdout.write('No session recorded\n')
      return SESSION_EXIT_SUCCESS
    }
    if (options.reset) {
      session.cleanup()
      process.stdout.write('Session record removed\n')
      return SESSION_EXIT_SUCCESS
    }
    process.stdout.write(`${formatSession(session)}\n`)
    return SESSION_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    logger.error({ err }, 'runSessionAction failed')
    return SESSION_EXIT_ERROR
  }
}

export function registerSessionCommand(program: Command, cwd = process.cwd()): void {
  program
    .command('session')
    .description('Show the current session')
    .option('--reset', 'Delete the session record', false)
    .action(async (opts: { reset: boolean }) => {
      process.exitCode = await runSessionAction({ reset: opts.reset, cwd })
    })
}
