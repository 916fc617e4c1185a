/**
 * Unit tests for `src/cli/commands/session.ts`
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'node:fs'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { DEFAULT_CONFIG } from '../../../modules/config/defaults.js'
import { createShiplineContext } from '../../../modules/pipeline/wiring.js'
import { SessionTrackerImpl } from '../../../modules/session-tracker/session-tracker-impl.js'
import { captureOutput, type CapturedOutput } from '../../../../test/helpers/capture-output.js'
import type { ContextLoader } from '../context.js'
import { SESSION_EXIT_SUCCESS, runSessionAction } from '../session.js'

let testDir: string
let output: CapturedOutput
let session: SessionTrackerImpl
let loader: ContextLoader

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'shipline-session-cmd-'))
  output = captureOutput()
  session = new SessionTrackerImpl({
    repoRoot: testDir,
    dataDir: '.shipline',
    limits: DEFAULT_CONFIG.session,
    now: () => 1_000,
  })
  loader = async () => ({
    ...createShiplineContext({ config: DEFAULT_CONFIG, repoRoot: testDir, mode: 'unattended' }),
    session,
  })
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(testDir, { recursive: true, force: true })
})

describe('runSessionAction', () => {
  it('reports when no session is recorded', async () => {
    const code = await runSessionAction({ reset: false, cwd: testDir }, loader)

    expect(code).toBe(SESSION_EXIT_SUCCESS)
    expect(output.stdout()).toBe('No session recorded\n')
  })

  it('prints the session record', async () => {
    session.init('attended')
    session.incrementCompleted()
    session.setCurrentIssue(7)
    session.addApprovedBlocker(7, 'critical_issues')

    await runSessionAction({ reset: false, cwd: testDir }, loader)

    expect(output.stdout()).toBe(
      [
        'Mode: attended',
        'Elapsed: 0s',
        'Issues: 1 completed, 0 failed',
        'In progress: #7',
        'Approved blockers: 7:critical_issues',
        '',
      ].join('\n')
    )
  })

  it('deletes the record with --reset', async () => {
    session.init('unattended')

    await runSessionAction({ reset: true, cwd: testDir }, loader)

    expect(output.stdout()).toBe('Session record removed\n')
    expect(existsSync(session.statePath)).toBe(false)
  })
})
