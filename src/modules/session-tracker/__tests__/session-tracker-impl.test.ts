/**
 * Unit tests for session-tracker-impl.ts
 *
 * Tests:
 *  - Record persistence and corrupt-record fallback
 *  - shouldContinue thresholds and latching
 *  - Approval / notification memoisation across init
 *  - Snapshots
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createEventBus } from '../../../core/event-bus.js'
import { FakeGitClient } from '../../../../test/helpers/fake-git.js'
import { SessionTrackerImpl, type SessionTrackerDeps } from '../session-tracker-impl.js'

const START = 1_700_000_000

let testDir: string
let clock: number

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'shipline-session-'))
  clock = START
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

function createTracker(overrides: Partial<SessionTrackerDeps> = {}): SessionTrackerImpl {
  return new SessionTrackerImpl({
    repoRoot: testDir,
    dataDir: '.shipline',
    limits: { max_issues: 8, max_hours: 4 },
    now: () => clock,
    ...overrides,
  })
}

// ---------------------------------------------------------------------------
// Record lifecycle
// ---------------------------------------------------------------------------

describe('record lifecycle', () => {
  it('returns defaults when no record exists', () => {
    const tracker = createTracker()
    const state = tracker.read()
    expect(state.issuesCompleted).toBe(0)
    expect(state.mode).toBe('attended')
    expect(existsSync(tracker.statePath)).toBe(false)
  })

  it('stores the record under the data directory', () => {
    const tracker = createTracker()
    tracker.init('unattended')
    expect(tracker.statePath).toBe(join(testDir, '.shipline', 'session.json'))
    expect(existsSync(tracker.statePath)).toBe(true)
  })

  it('persists counters across tracker instances', () => {
    createTracker().init('unattended')
    const first = createTracker()
    first.incrementCompleted()
    first.incrementCompleted()
    first.incrementFailed()
    first.setCurrentIssue(12)
    first.setCurrentWorktree('/tmp/wt-12')

    const state = createTracker().read()
    expect(state.issuesCompleted).toBe(2)
    expect(state.issuesFailed).toBe(1)
    expect(state.currentIssue).toBe(12)
    expect(state.worktreePath).toBe('/tmp/wt-12')
    expect(state.mode).toBe('unattended')
  })

  it('update stamps lastUpdate with the clock', () => {
    const tracker = createTracker()
    tracker.init('attended')
    clock = START + 90
    expect(tracker.update('currentIssue', 3).lastUpdate).toBe(START + 90)
  })

  it('treats a corrupt record as absent', async () => {
    await mkdir(join(testDir, '.shipline'), { recursive: true })
    await writeFile(join(testDir, '.shipline', 'session.json'), '{not json', 'utf-8')
    const tracker = createTracker()
    expect(tracker.read().issuesCompleted).toBe(0)
    expect(tracker.incrementCompleted()).toBe(1)
  })

  it('treats a record with the wrong shape as absent', async () => {
    await mkdir(join(testDir, '.shipline'), { recursive: true })
    await writeFile(join(testDir, '.shipline', 'session.json'), '{"issuesCompleted":"many"}', 'utf-8')
    expect(createTracker().read().issuesCompleted).toBe(0)
  })

  it('cleanup deletes the record', () => {
    const tracker = createTracker()
    tracker.init('attended')
    tracker.cleanup()
    expect(existsSync(tracker.statePath)).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Elapsed time
// ---------------------------------------------------------------------------

describe('elapsed time', () => {
  it('floors elapsed hours', () => {
    const tracker = createTracker()
    tracker.init('attended')
    clock = START + 2 * 3600 + 3599
    expect(tracker.elapsedSeconds()).toBe(10799)
    expect(tracker.elapsedHours()).toBe(2)
  })

  it('formats elapsed time', () => {
    const tracker = createTracker()
    tracker.init('attended')
    clock = START + 3725
    expect(tracker.formatElapsed()).toBe('1h 2m 5s')
  })
})

// ---------------------------------------------------------------------------
// shouldContinue
// ---------------------------------------------------------------------------

describe('shouldContinue', () => {
  it('continues below both limits', () => {
    const tracker = createTracker()
    tracker.init('unattended')
    for (let i = 0; i < 7; i++) tracker.incrementCompleted()
    clock = START + 4 * 3600 - 1
    expect(tracker.shouldContinue()).toBe('continue')
  })

  it('reports token_limit at max issues', () => {
    const tracker = createTracker()
    tracker.init('unattended')
    for (let i = 0; i < 8; i++) tracker.incrementCompleted()
    expect(tracker.shouldContinue()).toBe('token_limit')
  })

  it('reports time_limit at max whole hours', () => {
    const tracker = createTracker()
    tracker.init('unattended')
    clock = START + 4 * 3600
    expect(tracker.shouldContinue()).toBe('time_limit')
  })

  it('prefers token_limit when both limits are reached', () => {
    const tracker = createTracker()
    tracker.init('unattended')
    for (let i = 0; i < 8; i++) tracker.incrementCompleted()
    clock = START + 5 * 3600
    expect(tracker.shouldContinue()).toBe('token_limit')
  })

  it('latches the first limit until the next init', () => {
    const tracker = createTracker()
    tracker.init('unattended')
    clock = START + 4 * 3600
    expect(tracker.shouldContinue()).toBe('time_limit')

    // Clock skew backwards must not un-reach the limit
    clock = START + 60
    expect(tracker.shouldContinue()).toBe('time_limit')
    expect(createTracker().shouldContinue()).toBe('time_limit')

    tracker.init('unattended')
    expect(tracker.shouldContinue()).toBe('continue')
  })

  it('emits session:limit once per latch', () => {
    const eventBus = createEventBus()
    const handler = vi.fn()
    eventBus.on('session:limit', handler)
    const tracker = createTracker({ eventBus })
    tracker.init('unattended')
    for (let i = 0; i < 8; i++) tracker.incrementCompleted()

    tracker.shouldContinue()
    tracker.shouldContinue()
    expect(handler).toHaveBeenCalledTimes(1)
    expect(handler).toHaveBeenCalledWith({ reason: 'token_limit' })
  })
})

// ---------------------------------------------------------------------------
// Approvals and notifications
// ---------------------------------------------------------------------------

describe('approvals and notifications', () => {
  it('records approvals per issue and type', () => {
    const tracker = createTracker()
    tracker.init('attended')
    tracker.addApprovedBlocker(5, 'critical_issues')
    expect(tracker.hasApprovedBlocker(5, 'critical_issues')).toBe(true)
    expect(tracker.hasApprovedBlocker(6, 'critical_issues')).toBe(false)
    expect(tracker.hasApprovedBlocker(5, 'head_changed')).toBe(false)
  })

  it('does not duplicate approvals', () => {
    const tracker = createTracker()
    tracker.init('attended')
    tracker.addApprovedBlocker(5, 'critical_issues')
    tracker.addApprovedBlocker(5, 'critical_issues')
    expect(tracker.read().approvedBlockers).toEqual(['5:critical_issues'])
  })

  it('carries approvals and sent notifications across init while resetting counters', () => {
    const tracker = createTracker()
    tracker.init('attended')
    tracker.incrementCompleted()
    tracker.addApprovedBlocker(5, 'critical_issues')
    tracker.markNotificationSent(5, 'unrelated_divergence')

    const reinit = createTracker().init('unattended')
    expect(reinit.issuesCompleted).toBe(0)
    expect(reinit.mode).toBe('unattended')

    const fresh = createTracker()
    expect(fresh.hasApprovedBlocker(5, 'critical_issues')).toBe(true)
    expect(fresh.wasNotificationSent(5, 'unrelated_divergence')).toBe(true)
    expect(fresh.wasNotificationSent(5, 'critical_issues')).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

describe('snapshots', () => {
  it('captures worktree status and last commit', async () => {
    const git = new FakeGitClient(testDir)
    git.worktree = 'src/app.ts'
    git.refs.set('HEAD', 'abcdef1234567890')
    const tracker = createTracker({ git })
    tracker.init('unattended')
    tracker.setCurrentIssue(9)

    clock = START + 30
    const snap = await tracker.snapshot(9, 'session_limit', testDir)

    expect(snap).toMatchObject({
      savedAt: START + 30,
      reason: 'session_limit',
      issue: 9,
      worktreePath: testDir,
      gitStatus: [' M src/app.ts'],
      lastCommit: 'abcdef1 last commit',
    })
    expect(snap.session.currentIssue).toBe(9)
    expect(existsSync(join(testDir, '.shipline', 'snapshots', 'issue-9.json'))).toBe(true)
    expect(tracker.loadSnapshot(9)).toEqual(snap)
  })

  it('skips git capture when the worktree does not exist', async () => {
    const git = new FakeGitClient(testDir)
    git.worktree = 'dirty'
    const tracker = createTracker({ git })
    const snap = await tracker.snapshot(4, 'rebase_conflict', join(testDir, 'gone'))
    expect(snap.gitStatus).toEqual([])
    expect(snap.lastCommit).toBeNull()
  })

  it('clearSnapshot removes the file', async () => {
    const tracker = createTracker()
    await tracker.snapshot(4, 'agent_failed', null)
    tracker.clearSnapshot(4)
    expect(tracker.loadSnapshot(4)).toBeNull()
  })

  it('ignores a malformed snapshot', async () => {
    await mkdir(join(testDir, '.shipline', 'snapshots'), { recursive: true })
    await writeFile(join(testDir, '.shipline', 'snapshots', 'issue-2.json'), '{"issue":2}', 'utf-8')
    expect(createTracker().loadSnapshot(2)).toBeNull()
  })
})

// ---------------------------------------------------------------------------
// summary
// ---------------------------------------------------------------------------

describe('summary', () => {
  it('totals completed and failed issues', () => {
    const tracker = createTracker()
    tracker.init('unattended')
    tracker.incrementCompleted()
    tracker.incrementCompleted()
    tracker.incrementFailed()
    clock = START + 125
    expect(tracker.summary()).toEqual({
      mode: 'unattended',
      duration: '2m 5s',
      completed: 2,
      failed: 1,
      total: 3,
    })
  })
})
