/**
 * Tests for git-utils: spawnGit and log parsing.
 *
 * child_process.spawn is mocked with fake processes so no real git runs.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'

// ---------------------------------------------------------------------------
// Mock child_process.spawn
// ---------------------------------------------------------------------------

function createFakeProcess() {
  const emitter = new EventEmitter()
  const stdout = new PassThrough()
  const stderr = new PassThrough()
  const proc = Object.assign(emitter, { stdin: null, stdout, stderr, pid: 4242, kill: vi.fn() })
  return { proc, stdout, stderr, emitter }
}

let nextProcess: ReturnType<typeof createFakeProcess> = createFakeProcess()

vi.mock('node:child_process', () => ({
  spawn: vi.fn(() => nextProcess.proc),
}))

import { spawn } from 'node:child_process'
import { PreconditionError } from '../../../core/errors.js'
import { findRepoRoot, spawnGit, parseCommitLog, splitLines } from '../git-utils.js'

// ---------------------------------------------------------------------------
// spawnGit
// ---------------------------------------------------------------------------

describe('spawnGit', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    nextProcess = createFakeProcess()
  })

  it('resolves trimmed stdout and the exit code', async () => {
    const promise = spawnGit(['rev-parse', 'HEAD'], { cwd: '/repo' })
    nextProcess.stdout.write('abc123\n')
    nextProcess.stdout.end()
    await new Promise((resolve) => setImmediate(resolve))
    nextProcess.emitter.emit('close', 0)
    await expect(promise).resolves.toEqual({ stdout: 'abc123', stderr: '', code: 0 })
  })

  it('forces TZ=UTC in the child environment', async () => {
    const promise = spawnGit(['log'], { cwd: '/repo', env: { PATH: '/usr/bin' } })
    nextProcess.emitter.emit('close', 0)
    await promise
    expect(spawn).toHaveBeenCalledWith(
      'git',
      ['log'],
      expect.objectContaining({ cwd: '/repo', env: { PATH: '/usr/bin', TZ: 'UTC' } })
    )
  })

  it('resolves code 1 with the error message when spawn fails', async () => {
    const promise = spawnGit(['status'])
    nextProcess.emitter.emit('error', new Error('spawn git ENOENT'))
    await expect(promise).resolves.toEqual({ stdout: '', stderr: 'spawn git ENOENT', code: 1 })
  })

  it('maps a null exit code to 1', async () => {
    const promise = spawnGit(['status'])
    nextProcess.emitter.emit('close', null)
    await expect(promise).resolves.toMatchObject({ code: 1 })
  })
})

describe('findRepoRoot', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    nextProcess = createFakeProcess()
  })

  it('returns the parent of the common git dir', async () => {
    const promise = findRepoRoot('/work/shipline-worktrees/issue-4')
    nextProcess.stdout.write('/work/project/.git\n')
    nextProcess.stdout.end()
    await new Promise((resolve) => setImmediate(resolve))
    nextProcess.emitter.emit('close', 0)
    await expect(promise).resolves.toBe('/work/project')
    expect(spawn).toHaveBeenCalledWith(
      'git',
      ['rev-parse', '--path-format=absolute', '--git-common-dir'],
      expect.objectContaining({ cwd: '/work/shipline-worktrees/issue-4' })
    )
  })

  it('throws PreconditionError outside a repository', async () => {
    const promise = findRepoRoot('/tmp')
    nextProcess.stderr.write('fatal: not a git repository\n')
    nextProcess.stderr.end()
    await new Promise((resolve) => setImmediate(resolve))
    nextProcess.emitter.emit('close', 128)
    await expect(promise).rejects.toBeInstanceOf(PreconditionError)
  })
})

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe('parseCommitLog', () => {
  it('parses sha, epoch and subject', () => {
    const output = [
      'aaa\x1f1700000000\x1f1700000500\x1ffeat: add gate',
      "bbb\x1f1699999000\x1f1699999000\x1fMerge branch 'main' into issue-4",
    ].join('\n')
    expect(parseCommitLog(output)).toEqual([
      { sha: 'aaa', timestamp: 1700000000, committedAt: 1700000500, message: 'feat: add gate' },
      { sha: 'bbb', timestamp: 1699999000, committedAt: 1699999000, message: "Merge branch 'main' into issue-4" },
    ])
  })

  it('skips malformed lines', () => {
    expect(parseCommitLog('garbage\nccc\x1fnot-a-number\x1f1\x1fx')).toEqual([])
  })

  it('returns an empty list for empty output', () => {
    expect(parseCommitLog('')).toEqual([])
  })
})

describe('splitLines', () => {
  it('drops blank lines and trailing whitespace', () => {
    expect(splitLines(' M src/a.ts  \n\n?? notes.md\n')).toEqual([' M src/a.ts', '?? notes.md'])
  })
})
