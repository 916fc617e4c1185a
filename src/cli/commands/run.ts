/**
 * `shipline run` command
 *
 * Drives each issue through development, review, assessment, fixes and
 * merge, in order, until the batch completes or a batch-blocking blocker or
 * session limit halts it.
 *
 * Usage:
 *   shipline run 12 14 15             Process issues in the configured mode
 *   shipline run 12 --unattended      Never prompt; blockers halt or skip
 *   shipline run 12 --attended        Ask before acting on blockers
 *
 * Exit codes:
 *   0 - Every issue merged, restarted or was suspended at a session limit
 *   1 - System error (not a repository, bad config, unexpected exception)
 *   2 - Usage error (an argument is not an issue number)
 *   3 - At least one issue was blocked or failed
 */

import type { Command } from 'commander'
import { errorMessage } from '../../core/errors.js'
import type { Mode } from '../../core/types.js'
import { setupInterruptHandler, type ProcessHooks } from '../../modules/pipeline/interrupt-handler.js'
import type { BatchResult, IssueResult } from '../../modules/pipeline/types.js'
import { createLogger } from '../../utils/logger.js'
import { loadShiplineContext, type ContextLoader } from './context.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_ERROR = 1
export const RUN_EXIT_USAGE_ERROR = 2
export const RUN_EXIT_INCOMPLETE = 3

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunActionOptions {
  /** Raw arguments; `12` and `#12` are both accepted */
  issues: string[]
  mode?: Mode
  cwd: string
  env?: NodeJS.ProcessEnv
  /** Signal hooks for the interrupt handler (default: process) */
  hooks?: ProcessHooks
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse issue arguments. Returns the first invalid argument instead when
 * one is not a positive integer.
 */
export function parseIssueNumbers(args: string[]): { issues: number[] } | { invalid: string } {
  const issues: number[] = []
  for (const arg of args) {
    const match = /^#?(\d+)$/.exec(arg.trim())
    const value = match?.[1] === undefined ? 0 : Number.parseInt(match[1], 10)
    if (value <= 0) return { invalid: arg }
    issues.push(value)
  }
  return { issues }
}

export function formatIssueResult(result: IssueResult): string {
  const label = `#${String(result.issue)}`
  const { outcome } = result
  switch (outcome.kind) {
    case 'merged':
      return `${label} merged (PR #${String(outcome.pr)})`
    case 'blocked':
      return `${label} blocked [${outcome.blocker.type}]: ${outcome.blocker.details}`
    case 'failed':
      return `${label} failed: ${outcome.reason}`
    case 'restarted':
      return `${label} restarted: branch was ${String(outcome.behind)} commits behind`
    case 'suspended':
      return `${label} suspended: ${outcome.reason}`
  }
}

export function formatBatch(batch: BatchResult): string {
  const lines = batch.results.map(formatIssueResult)
  for (const result of batch.results) {
    if (result.outcome.kind === 'blocked') lines.push('', result.outcome.resume)
  }
  if (batch.halted && batch.skipped.length > 0) {
    lines.push('', `Batch halted; not started: ${batch.skipped.map((n) => `#${String(n)}`).join(', ')}`)
  }
  return lines.join('\n')
}

function exitCodeFor(batch: BatchResult): number {
  const incomplete = batch.results.some((r) => r.outcome.kind === 'blocked' || r.outcome.kind === 'failed')
  return incomplete ? RUN_EXIT_INCOMPLETE : RUN_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// runRunAction: testable core logic
// ---------------------------------------------------------------------------

export async function runRunAction(
  options: RunActionOptions,
  loadContext: ContextLoader = loadShiplineContext
): Promise<number> {
  const parsed = parseIssueNumbers(options.issues)
  if ('invalid' in parsed) {
    process.stderr.write(`Error: Not an issue number: ${parsed.invalid}\n`)
    return RUN_EXIT_USAGE_ERROR
  }

  let cleanup: (() => void) | undefined
  try {
    const ctx = await loadContext({ cwd: options.cwd, mode: options.mode, env: options.env })
    ctx.session.init(ctx.mode)
    cleanup = setupInterruptHandler({
      repoRoot: ctx.repoRoot,
      mode: ctx.mode,
      git: ctx.git,
      session: ctx.session,
      prompter: ctx.prompter,
      hooks: options.hooks,
    })

    const batch = await ctx.pipeline.processBatch(parsed.issues)
    const summary = ctx.session.summary()
    process.stdout.write(`${formatBatch(batch)}\n`)
    process.stdout.write(
      `\nSession (${summary.mode}): ${String(summary.completed)} completed, ${String(summary.failed)} failed in ${summary.duration}\n`
    )
    return exitCodeFor(batch)
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    logger.error({ err }, 'runRunAction failed')
    return RUN_EXIT_ERROR
  } finally {
    cleanup?.()
  }
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command, cwd = process.cwd()): void {
  program
    .command('run <issues...>')
    .description('Take issues from development to merge')
    .option('--attended', 'Prompt on blockers and ambiguous divergence')
    .option('--unattended', 'Never prompt; apply conservative defaults')
    .action(async (issues: string[], opts: { attended?: boolean; unattended?: boolean }) => {
      if (opts.attended === true && opts.unattended === true) {
        process.stderr.write('Error: --attended and --unattended are mutually exclusive\n')
        process.exitCode = RUN_EXIT_USAGE_ERROR
        return
      }
      const mode: Mode | undefined =
        opts.attended === true ? 'attended' : opts.unattended === true ? 'unattended' : undefined
      process.exitCode = await runRunAction({ issues, mode, cwd })
    })
}
