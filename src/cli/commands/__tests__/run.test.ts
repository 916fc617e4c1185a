/**
 * Unit tests for `src/cli/commands/run.ts`
 *
 * The context loader is replaced so no repository, config file or gh call
 * is needed; the pipeline is a stub returning canned batch results.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { PreconditionError } from '../../../core/errors.js'
import { DEFAULT_CONFIG } from '../../../modules/config/defaults.js'
import type { ProcessHooks } from '../../../modules/pipeline/interrupt-handler.js'
import type { Pipeline } from '../../../modules/pipeline/pipeline.js'
import type { BatchResult } from '../../../modules/pipeline/types.js'
import { createShiplineContext } from '../../../modules/pipeline/wiring.js'
import { captureOutput, type CapturedOutput } from '../../../../test/helpers/capture-output.js'
import type { ContextLoader } from '../context.js'
import {
  RUN_EXIT_ERROR,
  RUN_EXIT_INCOMPLETE,
  RUN_EXIT_SUCCESS,
  RUN_EXIT_USAGE_ERROR,
  formatIssueResult,
  parseIssueNumbers,
  runRunAction,
} from '../run.js'

let testDir: string
let output: CapturedOutput
let processBatch: Mock<Pipeline['processBatch']>
let loader: Mock<ContextLoader>
let hooks: ProcessHooks & { removeListener: Mock<ProcessHooks['removeListener']> }

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'shipline-run-cmd-'))
  output = captureOutput()
  processBatch = vi.fn<Pipeline['processBatch']>()
  loader = vi.fn<ContextLoader>(async () => {
    const base = createShiplineContext({ config: DEFAULT_CONFIG, repoRoot: testDir, mode: 'unattended' })
    return { ...base, pipeline: { processIssue: vi.fn<Pipeline['processIssue']>(), processBatch } }
  })
  hooks = {
    on: vi.fn<ProcessHooks['on']>(),
    removeListener: vi.fn<ProcessHooks['removeListener']>(),
    chdir: vi.fn<ProcessHooks['chdir']>(),
    exit: vi.fn<ProcessHooks['exit']>(),
  }
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(testDir, { recursive: true, force: true })
})

function firstLines(text: string, count: number): string[] {
  return text.split('\n').slice(0, count)
}

// ---------------------------------------------------------------------------
// parseIssueNumbers
// ---------------------------------------------------------------------------

describe('parseIssueNumbers', () => {
  it('accepts bare and #-prefixed numbers', () => {
    expect(parseIssueNumbers(['12', '#14'])).toEqual({ issues: [12, 14] })
  })

  it('reports the first argument that is not a positive integer', () => {
    expect(parseIssueNumbers(['3', '0', 'x'])).toEqual({ invalid: '0' })
    expect(parseIssueNumbers(['12a'])).toEqual({ invalid: '12a' })
  })
})

// ---------------------------------------------------------------------------
// formatIssueResult
// ---------------------------------------------------------------------------

describe('formatIssueResult', () => {
  it('formats each outcome', () => {
    expect(formatIssueResult({ issue: 4, outcome: { kind: 'merged', pr: 100 } })).toBe('#4 merged (PR #100)')
    expect(formatIssueResult({ issue: 4, outcome: { kind: 'failed', reason: 'Issue #4 not found' } })).toBe(
      '#4 failed: Issue #4 not found'
    )
    expect(formatIssueResult({ issue: 4, outcome: { kind: 'restarted', behind: 12 } })).toBe(
      '#4 restarted: branch was 12 commits behind'
    )
    expect(formatIssueResult({ issue: 4, outcome: { kind: 'suspended', reason: 'Session time limit' } })).toBe(
      '#4 suspended: Session time limit'
    )
    expect(
      formatIssueResult({
        issue: 4,
        outcome: {
          kind: 'blocked',
          blocker: { type: 'push_failed', urgency: 'high', details: 'Push of issue-4 failed', batchBlocking: true },
          resume: '## Resume issue #4',
        },
      })
    ).toBe('#4 blocked [push_failed]: Push of issue-4 failed')
  })
})

// ---------------------------------------------------------------------------
// runRunAction
// ---------------------------------------------------------------------------

describe('runRunAction', () => {
  it('rejects a non-numeric issue before loading anything', async () => {
    const code = await runRunAction({ issues: ['abc'], cwd: testDir, hooks }, loader)

    expect(code).toBe(RUN_EXIT_USAGE_ERROR)
    expect(output.stderr()).toBe('Error: Not an issue number: abc\n')
    expect(loader).not.toHaveBeenCalled()
  })

  it('processes the issues in order and exits 0 when all merge', async () => {
    processBatch.mockResolvedValue({
      results: [
        { issue: 12, outcome: { kind: 'merged', pr: 100 } },
        { issue: 14, outcome: { kind: 'merged', pr: 101 } },
      ],
      halted: false,
      skipped: [],
    })

    const code = await runRunAction({ issues: ['12', '#14'], cwd: testDir, hooks }, loader)

    expect(code).toBe(RUN_EXIT_SUCCESS)
    expect(processBatch).toHaveBeenCalledWith([12, 14])
    expect(firstLines(output.stdout(), 2)).toEqual(['#12 merged (PR #100)', '#14 merged (PR #101)'])
  })

  it('passes the mode flag to the loader', async () => {
    processBatch.mockResolvedValue({ results: [], halted: false, skipped: [] })
    await runRunAction({ issues: ['1'], mode: 'attended', cwd: testDir, hooks }, loader)
    expect(loader).toHaveBeenCalledWith({ cwd: testDir, mode: 'attended', env: undefined })
  })

  it('prints the resume procedure and skipped issues of a halted batch', async () => {
    const batch: BatchResult = {
      results: [
        {
          issue: 3,
          outcome: {
            kind: 'blocked',
            blocker: { type: 'merge_failed', urgency: 'high', details: 'Merge of PR #7 failed', batchBlocking: true },
            resume: '## Resume issue #3',
          },
        },
      ],
      halted: true,
      skipped: [4, 5],
    }
    processBatch.mockResolvedValue(batch)

    const code = await runRunAction({ issues: ['3', '4', '5'], cwd: testDir, hooks }, loader)

    expect(code).toBe(RUN_EXIT_INCOMPLETE)
    expect(firstLines(output.stdout(), 5)).toEqual([
      '#3 blocked [merge_failed]: Merge of PR #7 failed',
      '',
      '## Resume issue #3',
      '',
      'Batch halted; not started: #4, #5',
    ])
  })

  it('starts a session in the context mode and removes the signal handlers afterwards', async () => {
    processBatch.mockResolvedValue({ results: [], halted: false, skipped: [] })

    await runRunAction({ issues: ['1'], cwd: testDir, hooks }, loader)

    expect(output.stdout()).toContain('Session (unattended): 0 completed, 0 failed in ')
    expect(hooks.removeListener).toHaveBeenCalledTimes(2)
  })

  it('exits 1 with the error message when the context cannot be loaded', async () => {
    loader.mockRejectedValue(new PreconditionError('Not a git repository'))

    const code = await runRunAction({ issues: ['1'], cwd: testDir, hooks }, loader)

    expect(code).toBe(RUN_EXIT_ERROR)
    expect(output.stderr()).toBe('Error: Not a git repository\n')
  })
})
