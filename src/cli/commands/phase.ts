/**
 * `shipline phase` command
 *
 * Prints the pipeline phase of one issue, read from the code host and the
 * issue's worktree when one exists. Read-only.
 *
 * Exit codes:
 *   0 - Phase printed
 *   1 - System error
 *   2 - Usage error (not an issue number)
 */

import { existsSync } from 'node:fs'
import type { Command } from 'commander'
import { errorMessage } from '../../core/errors.js'
import { issueWorktreePath } from '../../modules/pipeline/pipeline-impl.js'
import { formatPhase } from '../../modules/state-resolver/phase.js'
import { createLogger } from '../../utils/logger.js'
import { loadShiplineContext, type ContextLoader } from './context.js'
import { parseIssueNumbers } from './run.js'

const logger = createLogger('phase-cmd')

export const PHASE_EXIT_SUCCESS = 0
export const PHASE_EXIT_ERROR = 1
export const PHASE_EXIT_USAGE_ERROR = 2

export interface PhaseActionOptions {
  issue: string
  cwd: string
  env?: NodeJS.ProcessEnv
}

export async function runPhaseAction(
  options: PhaseActionOptions,
  loadContext: ContextLoader = loadShiplineContext
): Promise<number> {
  const parsed = parseIssueNumbers([options.issue])
  const issue = 'issues' in parsed ? parsed.issues[0] : undefined
  if (issue === undefined) {
    process.stderr.write(`Error: Not an issue number: ${options.issue}\n`)
    return PHASE_EXIT_USAGE_ERROR
  }

  try {
    const ctx = await loadContext({ cwd: options.cwd, mode: 'unattended', env: options.env })
    const worktree = issueWorktreePath(ctx.repoRoot, ctx.config.worktree_dir, issue)
    const state = await ctx.resolver.resolve(issue, existsSync(worktree) ? { worktreePath: worktree } : {})

    process.stdout.write(`#${String(issue)}: ${formatPhase(state.phase)}\n`)
    if (state.degraded.length > 0) {
      process.stdout.write(`Partial read; could not load: ${state.degraded.join(', ')}\n`)
    }
    return PHASE_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    logger.error({ err }, 'runPhaseAction failed')
    return PHASE_EXIT_ERROR
  }
}

export function registerPhaseCommand(program: Command, cwd = process.cwd()): void {
  program
    .command('phase <issue>')
    .description('Show where an issue stands in the pipeline')
    .action(async (issue: string) => {
      process.exitCode = await runPhaseAction({ issue, cwd })
    })
}
