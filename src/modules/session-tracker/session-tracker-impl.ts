/**
 * SessionTrackerImpl: JSON-file-backed session record.
 *
 * Layout under `<repoRoot>/<dataDir>/`:
 *   session.json               the current session
 *   snapshots/issue-<n>.json   resume snapshots
 *
 * Every mutation is a read-modify-write through writeFileAtomic. There is
 * no locking: one session per clone.
 */

import { existsSync, readFileSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { BlockerEvent, BlockerType, Mode } from '../../core/types.js'
import { writeFileAtomic } from '../../utils/atomic-write.js'
import { formatElapsed } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { SessionSettings } from '../config/config-schema.js'
import { nowEpochSeconds } from '../state-resolver/timestamps.js'
import type { GitClient } from '../vcs/git-client.js'
import { renderResumeProcedure } from './resume-procedure.js'
import { SessionStateSchema, SnapshotSchema, type SessionState, type Snapshot } from './schemas.js'
import type { ContinueDecision, SessionSummary, SessionTracker } from './session-tracker.js'

const logger = createLogger('session-tracker')

export interface SessionTrackerDeps {
  /** Main repository root (not a linked worktree) */
  repoRoot: string
  /** Data directory relative to repoRoot */
  dataDir: string
  limits: SessionSettings
  /** Used to capture worktree status in snapshots */
  git?: GitClient
  eventBus?: TypedEventBus
  /** Clock in epoch seconds */
  now?: () => number
}

function approvalKey(issue: number, type: string): string {
  return `${String(issue)}:${type}`
}

export class SessionTrackerImpl implements SessionTracker {
  readonly statePath: string
  private readonly _snapshotDir: string
  private readonly _limits: SessionSettings
  private readonly _git: GitClient | undefined
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => number

  constructor(deps: SessionTrackerDeps) {
    const dataRoot = join(deps.repoRoot, deps.dataDir)
    this.statePath = join(dataRoot, 'session.json')
    this._snapshotDir = join(dataRoot, 'snapshots')
    this._limits = deps.limits
    this._git = deps.git
    this._eventBus = deps.eventBus
    this._now = deps.now ?? nowEpochSeconds
  }

  // -------------------------------------------------------------------------
  // Record lifecycle
  // -------------------------------------------------------------------------

  init(mode: Mode): SessionState {
    const previous = this._load()
    const now = this._now()
    const state: SessionState = {
      startTime: now,
      mode,
      issuesCompleted: 0,
      issuesFailed: 0,
      currentIssue: null,
      worktreePath: null,
      lastUpdate: now,
      limitReached: null,
      approvedBlockers: previous?.approvedBlockers ?? [],
      notificationsSent: previous?.notificationsSent ?? [],
    }
    this._write(state)
    logger.info(
      { mode, carriedApprovals: state.approvedBlockers.length },
      'Session initialised'
    )
    return state
  }

  read(): SessionState {
    return this._load() ?? this._defaults()
  }

  update<K extends keyof SessionState>(key: K, value: SessionState[K]): SessionState {
    const state = this.read()
    state[key] = value
    state.lastUpdate = this._now()
    this._write(state)
    return state
  }

  cleanup(): void {
    rmSync(this.statePath, { force: true })
    logger.info({ path: this.statePath }, 'Session record removed')
  }

  // -------------------------------------------------------------------------
  // Counters
  // -------------------------------------------------------------------------

  incrementCompleted(): number {
    return this.update('issuesCompleted', this.read().issuesCompleted + 1).issuesCompleted
  }

  incrementFailed(): number {
    return this.update('issuesFailed', this.read().issuesFailed + 1).issuesFailed
  }

  setCurrentIssue(issue: number | null): void {
    this.update('currentIssue', issue)
  }

  setCurrentWorktree(worktreePath: string | null): void {
    this.update('worktreePath', worktreePath)
  }

  // -------------------------------------------------------------------------
  // Time and limits
  // -------------------------------------------------------------------------

  elapsedSeconds(): number {
    return Math.max(0, this._now() - this.read().startTime)
  }

  elapsedHours(): number {
    return Math.floor(this.elapsedSeconds() / 3600)
  }

  formatElapsed(): string {
    return formatElapsed(this.elapsedSeconds())
  }

  shouldContinue(): ContinueDecision {
    const state = this.read()
    if (state.limitReached !== null) return state.limitReached

    let reason: ContinueDecision = 'continue'
    if (state.issuesCompleted >= this._limits.max_issues) {
      reason = 'token_limit'
    } else if (this.elapsedHours() >= this._limits.max_hours) {
      reason = 'time_limit'
    }

    if (reason !== 'continue') {
      this.update('limitReached', reason)
      logger.info(
        { reason, completed: state.issuesCompleted, elapsed: this.formatElapsed() },
        'Session limit reached'
      )
      this._eventBus?.emit('session:limit', { reason })
    }
    return reason
  }

  // -------------------------------------------------------------------------
  // Memoised approvals and notifications
  // -------------------------------------------------------------------------

  addApprovedBlocker(issue: number, type: BlockerType): void {
    const key = approvalKey(issue, type)
    const state = this.read()
    if (state.approvedBlockers.includes(key)) return
    this.update('approvedBlockers', [...state.approvedBlockers, key])
  }

  hasApprovedBlocker(issue: number, type: BlockerType): boolean {
    return this.read().approvedBlockers.includes(approvalKey(issue, type))
  }

  markNotificationSent(issue: number, type: string): void {
    const key = approvalKey(issue, type)
    const state = this.read()
    if (state.notificationsSent.includes(key)) return
    this.update('notificationsSent', [...state.notificationsSent, key])
  }

  wasNotificationSent(issue: number, type: string): boolean {
    return this.read().notificationsSent.includes(approvalKey(issue, type))
  }

  // -------------------------------------------------------------------------
  // Snapshots
  // -------------------------------------------------------------------------

  async snapshot(issue: number, reason: string, worktreePath: string | null): Promise<Snapshot> {
    let gitStatus: string[] = []
    let lastCommit: string | null = null
    if (worktreePath !== null && this._git !== undefined && existsSync(worktreePath)) {
      const git = this._git.at(worktreePath)
      gitStatus = await git.statusShort()
      lastCommit = await git.lastCommit()
    }

    const snapshot: Snapshot = {
      savedAt: this._now(),
      reason,
      issue,
      worktreePath,
      session: this.read(),
      gitStatus,
      lastCommit,
    }
    const path = this._snapshotPath(issue)
    writeFileAtomic(path, `${JSON.stringify(snapshot, null, 2)}\n`)
    logger.info({ issue, reason, path }, 'Session snapshot saved')
    return snapshot
  }

  loadSnapshot(issue: number): Snapshot | null {
    const path = this._snapshotPath(issue)
    const raw = this._readJson(path)
    if (raw === undefined) return null
    const parsed = SnapshotSchema.safeParse(raw)
    if (!parsed.success) {
      logger.warn({ path, issues: parsed.error.issues.length }, 'Snapshot is malformed; ignoring')
      return null
    }
    return parsed.data
  }

  clearSnapshot(issue: number): void {
    rmSync(this._snapshotPath(issue), { force: true })
  }

  resumeProcedure(snapshot: Snapshot, blocker?: BlockerEvent): string {
    return renderResumeProcedure(snapshot, blocker)
  }

  summary(): SessionSummary {
    const state = this.read()
    return {
      mode: state.mode,
      duration: this.formatElapsed(),
      completed: state.issuesCompleted,
      failed: state.issuesFailed,
      total: state.issuesCompleted + state.issuesFailed,
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private _snapshotPath(issue: number): string {
    return join(this._snapshotDir, `issue-${String(issue)}.json`)
  }

  private _defaults(): SessionState {
    const now = this._now()
    return {
      startTime: now,
      mode: 'attended',
      issuesCompleted: 0,
      issuesFailed: 0,
      currentIssue: null,
      worktreePath: null,
      lastUpdate: now,
      limitReached: null,
      approvedBlockers: [],
      notificationsSent: [],
    }
  }

  /** Parsed record, or null when missing or invalid */
  private _load(): SessionState | null {
    const raw = this._readJson(this.statePath)
    if (raw === undefined) return null
    const parsed = SessionStateSchema.safeParse(raw)
    if (!parsed.success) {
      logger.warn({ path: this.statePath }, 'Session record is malformed; starting from defaults')
      return null
    }
    return parsed.data
  }

  /** JSON content of `path`; undefined when missing or unparseable */
  private _readJson(path: string): unknown {
    if (!existsSync(path)) return undefined
    try {
      return JSON.parse(readFileSync(path, 'utf-8')) as unknown
    } catch (err) {
      logger.warn({ path, err }, 'Could not read JSON file; treating as absent')
      return undefined
    }
  }

  private _write(state: SessionState): void {
    writeFileAtomic(this.statePath, `${JSON.stringify(state, null, 2)}\n`)
  }
}

export function createSessionTracker(deps: SessionTrackerDeps): SessionTracker {
  return new SessionTrackerImpl(deps)
}
