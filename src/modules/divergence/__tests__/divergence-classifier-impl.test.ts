/**
 * Unit tests for DivergenceClassifierImpl
 *
 * Tests cover:
 *  - detection (fetch failure, equal heads, local-only ahead, three-way)
 *  - the classification chain and its mode-dependent fallback
 *  - resolution per decision-matrix row, including the leased force push
 *  - the failed-rebase round trip
 *  - pre-merge head verification
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { FakeGitClient, commit } from '../../../../test/helpers/fake-git.js'
import { FakeCodeHost } from '../../../../test/helpers/fake-code-host.js'
import { ScriptedPrompter } from '../../../../test/helpers/scripted-prompter.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { Commit } from '../../../core/types.js'
import type { Notification, NotificationSink } from '../../notifications/notification-sink.js'
import { Notifier } from '../../notifications/notifier.js'
import { createSessionTracker } from '../../session-tracker/session-tracker-impl.js'
import type { CommitClassifier } from '../commit-classifier.js'
import { DivergenceClassifierImpl, type DivergenceClassifierDeps } from '../divergence-classifier-impl.js'
import type { Classification, DivergenceContext, DivergenceReport } from '../types.js'

const BRANCH = 'issue-4'
const CWD = '/wt/issue-4'
const RANGE = 'local1..remote1'

let git: FakeGitClient
let codeHost: FakeCodeHost
let classify: Mock<CommitClassifier['classify']>
let classifier: CommitClassifier
let foreign: Commit[]

function setupDivergence(commits: Commit[], offMainline: Commit[] = commits): void {
  git.refs.set('HEAD', 'local1')
  git.refs.set('origin/issue-4', 'remote1')
  git.logs.set(RANGE, commits)
  git.logs.set(FakeGitClient.logKey(RANGE, ['origin/main']), offMainline)
  git.counts.set('remote1..local1', 2)
  git.diffs.set(`stat ${RANGE}`, ' src/b.ts | 4 ++--')
}

function create(overrides: Partial<DivergenceClassifierDeps> = {}): DivergenceClassifierImpl {
  return new DivergenceClassifierImpl({
    git,
    codeHost,
    classifier,
    mainline: 'main',
    assessmentTag: 'shipline-assessment',
    ...overrides,
  })
}

function context(mode: DivergenceContext['mode'], pr: number | null = 40): DivergenceContext {
  return { issue: 4, pr, mode }
}

function report(): DivergenceReport {
  return {
    branch: BRANCH,
    cwd: CWD,
    localHead: 'local1',
    remoteHead: 'remote1',
    foreignCommits: foreign,
    diffStat: '',
    localAhead: 2,
    threeWay: true,
  }
}

function classified(classification: Classification): { classification: Classification; source: 'classifier' } {
  return { classification, source: 'classifier' }
}

beforeEach(() => {
  git = new FakeGitClient(CWD)
  codeHost = new FakeCodeHost()
  classify = vi.fn<CommitClassifier['classify']>().mockResolvedValue(null)
  classifier = { classify }
  foreign = [commit('feat: add billing export', 1_700_000_500, 'f2'), commit('feat: billing model', 1_700_000_400, 'f1')]
})

// ---------------------------------------------------------------------------
// detect
// ---------------------------------------------------------------------------

describe('detect', () => {
  it('returns null when the fetch fails', async () => {
    setupDivergence(foreign)
    git.fetchOk = false
    expect(await create().detect(BRANCH, CWD)).toBeNull()
  })

  it('returns null when heads are equal', async () => {
    git.refs.set('HEAD', 'same')
    git.refs.set('origin/issue-4', 'same')
    expect(await create().detect(BRANCH, CWD)).toBeNull()
  })

  it('returns null when local is merely ahead', async () => {
    setupDivergence([])
    expect(await create().detect(BRANCH, CWD)).toBeNull()
  })

  it('reports foreign commits, local-ahead count and the three-way flag', async () => {
    setupDivergence(foreign)
    const eventBus = createEventBus()
    const seen = vi.fn()
    eventBus.on('divergence:detected', seen)

    const found = await create({ eventBus }).detect(BRANCH, CWD)

    expect(found).toEqual({
      branch: BRANCH,
      cwd: CWD,
      localHead: 'local1',
      remoteHead: 'remote1',
      foreignCommits: foreign,
      diffStat: ' src/b.ts | 4 ++--',
      localAhead: 2,
      threeWay: true,
    })
    expect(git.calls).toContain('fetch issue-4')
    expect(seen).toHaveBeenCalledWith({ branch: BRANCH, foreignCommits: 2, threeWay: true })
  })

  it('is not three-way when local has nothing of its own', async () => {
    setupDivergence(foreign)
    git.counts.set('remote1..local1', 0)
    expect((await create().detect(BRANCH, CWD))?.threeWay).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// classify
// ---------------------------------------------------------------------------

describe('classify', () => {
  it('uses the heuristics before the classifier', async () => {
    setupDivergence(foreign, [])
    const result = await create().classify(report(), context('unattended'))
    expect(result).toEqual({ classification: 'TRIVIAL', source: 'on-mainline' })
    expect(classify).not.toHaveBeenCalled()
  })

  it('asks the classifier with issue context when no heuristic matches', async () => {
    setupDivergence(foreign)
    codeHost.issues.set(4, { number: 4, title: 'Billing export', body: 'Export invoices' })
    classify.mockResolvedValue('RELATED')

    const result = await create().classify(report(), context('unattended'))

    expect(result).toEqual({ classification: 'RELATED', source: 'classifier' })
    expect(classify).toHaveBeenCalledWith({
      cwd: CWD,
      branch: BRANCH,
      issue: { number: 4, title: 'Billing export', body: 'Export invoices' },
      commits: foreign,
      diffStat: '',
    })
  })

  it('falls back to UNRELATED unattended', async () => {
    setupDivergence(foreign)
    expect(await create().classify(report(), context('unattended'))).toEqual({
      classification: 'UNRELATED',
      source: 'fallback',
    })
  })

  it('falls back to RELATED attended', async () => {
    setupDivergence(foreign)
    expect((await create().classify(report(), context('attended'))).classification).toBe('RELATED')
  })

  it('classifies without issue context when the issue read fails', async () => {
    setupDivergence(foreign)
    codeHost.failing.add('getIssue')
    classify.mockResolvedValue('UNRELATED')
    await create().classify(report(), context('unattended'))
    expect(classify).toHaveBeenCalledWith(expect.objectContaining({ issue: null }))
  })
})

// ---------------------------------------------------------------------------
// isReviewed
// ---------------------------------------------------------------------------

describe('isReviewed', () => {
  const assessment = (timestamp: number) => ({
    body: '',
    timestamp,
    dispositions: { ACTIONABLE_NOW: 0, ACTIONABLE_LATER: 0, DISMISSED: 0 },
    headSha: null,
  })

  it('is true only for an assessment strictly newer than every foreign commit', () => {
    const classifierImpl = create()
    expect(classifierImpl.isReviewed(report(), assessment(1_700_000_501))).toBe(true)
    expect(classifierImpl.isReviewed(report(), assessment(1_700_000_500))).toBe(false)
    expect(classifierImpl.isReviewed(report(), assessment(1_700_000_450))).toBe(false)
    expect(classifierImpl.isReviewed(report(), null)).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// resolve
// ---------------------------------------------------------------------------

describe('resolve', () => {
  it('rebases and plain-pushes a TRIVIAL divergence', async () => {
    const result = await create().resolve(report(), classified('TRIVIAL'), false, 'unattended', context('unattended'))
    expect(result).toEqual({ kind: 'resolved', action: 'rebased' })
    expect(git.calls).toEqual(['rebase origin/issue-4', 'push issue-4'])
  })

  it('blocks an unreviewed RELATED divergence unattended without touching git', async () => {
    const result = await create().resolve(report(), classified('RELATED'), false, 'unattended', context('unattended'))
    expect(result.kind).toBe('blocked')
    if (result.kind !== 'blocked') return
    expect(result.blocker.type).toBe('unreviewed_divergence')
    expect(result.blocker.batchBlocking).toBe(false)
    expect(git.calls).toEqual([])
  })

  it('blocks an UNRELATED divergence unattended with urgent urgency', async () => {
    const result = await create().resolve(report(), classified('UNRELATED'), true, 'unattended', context('unattended'))
    expect(result).toMatchObject({ kind: 'blocked', blocker: { type: 'unrelated_divergence', urgency: 'urgent' } })
  })

  it('pulls and asks for re-review when the operator chooses it', async () => {
    const prompter = new ScriptedPrompter(['pull-and-re-review'])
    const result = await create({ prompter }).resolve(
      report(),
      classified('RELATED'),
      false,
      'attended',
      context('attended')
    )
    expect(result).toEqual({ kind: 'needs-re-review' })
    expect(prompter.asked[0]?.offered).toEqual([
      'pull-and-re-review',
      'pull-without-review',
      'force-push-local',
      'abort',
    ])
    expect(git.calls).toEqual(['rebase origin/issue-4', 'push issue-4'])
  })

  it('blocks with operator_abort when the operator aborts', async () => {
    const prompter = new ScriptedPrompter(['abort'])
    const result = await create({ prompter }).resolve(
      report(),
      classified('RELATED'),
      false,
      'attended',
      context('attended')
    )
    expect(result).toMatchObject({ kind: 'blocked', blocker: { type: 'operator_abort' } })
  })

  describe('UNRELATED attended', () => {
    let dataDir: string

    beforeEach(async () => {
      dataDir = await mkdtemp(join(tmpdir(), 'shipline-divergence-'))
    })

    afterEach(async () => {
      await rm(dataDir, { recursive: true, force: true })
    })

    it('force-pushes with a lease on the detected remote head and notifies', async () => {
      const sent: Notification[] = []
      const sink: NotificationSink = {
        name: 'recording',
        send: async (n) => {
          sent.push(n)
        },
      }
      const session = createSessionTracker({ repoRoot: dataDir, dataDir: '.shipline', limits: { max_issues: 8, max_hours: 4 } })
      const prompter = new ScriptedPrompter(['force-push-local'])

      const result = await create({ prompter, notifier: new Notifier([sink], session) }).resolve(
        report(),
        classified('UNRELATED'),
        false,
        'attended',
        context('attended')
      )

      expect(result).toEqual({ kind: 'resolved', action: 'force-pushed' })
      expect(prompter.asked[0]?.offered).toEqual(['force-push-local', 'abort'])
      expect(git.pushes).toEqual([{ branch: BRANCH, options: { forceWithLease: { expectedSha: 'remote1' } } }])
      expect(sent).toHaveLength(1)
      expect(sent[0]?.urgency).toBe('urgent')
      expect(sent[0]?.title).toBe('Branch divergence on #4: UNRELATED')
    })
  })

  it('restores the tree and blocks after a failed rebase unattended', async () => {
    git.worktree = 'uncommitted edit'
    git.rebaseResult = { ok: false, conflicts: ['src/b.ts'] }

    const result = await create().resolve(report(), classified('TRIVIAL'), false, 'unattended', context('unattended'))

    expect(result).toMatchObject({ kind: 'blocked', blocker: { type: 'rebase_conflict' } })
    expect(git.worktree).toBe('uncommitted edit')
    expect(git.stash).toEqual([])
    expect(git.pushes).toEqual([])
  })

  it('offers force-push after a failed rebase attended', async () => {
    git.rebaseResult = { ok: false, conflicts: ['src/b.ts'] }
    const prompter = new ScriptedPrompter(['force-push-local'])
    const result = await create({ prompter }).resolve(
      report(),
      classified('TRIVIAL'),
      false,
      'attended',
      context('attended')
    )
    expect(result).toEqual({ kind: 'resolved', action: 'force-pushed' })
    expect(git.calls).toEqual(['rebase origin/issue-4', 'rebase --abort', 'push --force-with-lease issue-4'])
  })

  it('blocks with push_failed when the leased push is rejected', async () => {
    git.pushResults = [{ ok: false, rejected: true, message: 'stale info' }]
    const prompter = new ScriptedPrompter(['force-push-local'])
    const result = await create({ prompter }).resolve(
      report(),
      classified('UNRELATED'),
      false,
      'attended',
      context('attended')
    )
    expect(result).toMatchObject({ kind: 'blocked', blocker: { type: 'push_failed' } })
  })

  it('emits divergence:resolved with the outcome', async () => {
    const eventBus = createEventBus()
    const seen = vi.fn()
    eventBus.on('divergence:resolved', seen)
    await create({ eventBus }).resolve(report(), classified('TRIVIAL'), false, 'unattended', context('unattended'))
    expect(seen).toHaveBeenCalledWith({ branch: BRANCH, classification: 'TRIVIAL', outcome: 'resolved' })
  })
})

// ---------------------------------------------------------------------------
// handlePushRejection
// ---------------------------------------------------------------------------

describe('handlePushRejection', () => {
  it('blocks when the push was rejected but nothing foreign exists', async () => {
    git.refs.set('HEAD', 'same')
    git.refs.set('origin/issue-4', 'same')
    const result = await create().handlePushRejection(BRANCH, CWD, context('unattended'))
    expect(result).toMatchObject({ kind: 'blocked', blocker: { type: 'push_failed' } })
  })

  it('rebases a RELATED divergence already covered by an assessment', async () => {
    setupDivergence(foreign)
    classify.mockResolvedValue('RELATED')
    codeHost.addComment(40, '<!-- shipline-assessment head=abc1234 -->\nAll good', 1_700_000_600)

    const result = await create().handlePushRejection(BRANCH, CWD, context('unattended'))

    expect(result).toEqual({ kind: 'resolved', action: 'rebased' })
  })

  it('treats unreadable comments as unreviewed', async () => {
    setupDivergence(foreign)
    classify.mockResolvedValue('RELATED')
    codeHost.failing.add('listComments')
    const result = await create().handlePushRejection(BRANCH, CWD, context('unattended'))
    expect(result).toMatchObject({ kind: 'blocked', blocker: { type: 'unreviewed_divergence' } })
  })
})

// ---------------------------------------------------------------------------
// verifyHead
// ---------------------------------------------------------------------------

describe('verifyHead', () => {
  it('is ok when the head matches', async () => {
    codeHost.heads.set(40, 'abc')
    expect(await create().verifyHead(40, 'abc')).toEqual({ status: 'ok' })
  })

  it('reports a changed head', async () => {
    codeHost.heads.set(40, 'def')
    expect(await create().verifyHead(40, 'abc')).toEqual({ status: 'changed', expected: 'abc', current: 'def' })
  })

  it('is unknown when the head cannot be read', async () => {
    codeHost.failing.add('getHeadSha')
    expect(await create().verifyHead(40, 'abc')).toEqual({ status: 'unknown' })
  })
})
