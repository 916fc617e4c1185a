/**
 * NotesStore: the shared notes document under the data directory.
 *
 * Every edit is a read-modify-write of the whole file through an atomic
 * replace. There is no locking: one session per clone.
 */

import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { writeFileAtomic } from '../../utils/atomic-write.js'
import { createLogger } from '../../utils/logger.js'
import type { NotesSettings } from '../config/config-schema.js'
import { nowEpochSeconds } from '../state-resolver/timestamps.js'
import {
  emptyNotes,
  parseNotes,
  prependEntry,
  renderNotes,
  replaceSection,
  type NotesDocument,
} from './notes-document.js'
import { extractSecurityFindings } from './security-findings.js'

const logger = createLogger('notes')

export interface NotesStoreDeps {
  repoRoot: string
  dataDir: string
  limits: NotesSettings
  now?: () => number
}

export interface CurrentWork {
  issue: number
  title: string
  branch: string
  pr?: number | null
}

export interface CompletedWork {
  issue: number
  pr: number
  title: string
  duration?: string
}

function day(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().slice(0, 10)
}

/** Quote free text so its own headings cannot start new sections or entries */
function quote(lines: string[]): string[] {
  return lines.map((line) => (line === '' ? '>' : `> ${line}`))
}

export class NotesStore {
  readonly path: string
  private readonly _limits: NotesSettings
  private readonly _now: () => number

  constructor(deps: NotesStoreDeps) {
    this.path = join(deps.repoRoot, deps.dataDir, 'notes.md')
    this._limits = deps.limits
    this._now = deps.now ?? nowEpochSeconds
  }

  read(): NotesDocument {
    if (!existsSync(this.path)) return emptyNotes()
    return parseNotes(readFileSync(this.path, 'utf-8'))
  }

  /** Create the document with all three sections if it does not exist */
  init(): void {
    if (existsSync(this.path)) return
    this._write(emptyNotes())
    logger.info({ path: this.path }, 'Notes document created')
  }

  setCurrentWork(work: CurrentWork): void {
    const lines = [
      `### Issue #${String(work.issue)}: ${work.title}`,
      '',
      `- Branch: \`${work.branch}\``,
      ...(work.pr === undefined || work.pr === null ? [] : [`- PR: #${String(work.pr)}`]),
      `- Started: ${day(this._now())}`,
    ]
    this._edit((doc) => replaceSection(doc, 'current', lines))
  }

  clearCurrentWork(): void {
    this._edit((doc) => replaceSection(doc, 'current', []))
  }

  /** Returns the number of finding lines recorded */
  recordSecurityFindings(pr: number, title: string, reviewBody: string): number {
    const findings = extractSecurityFindings(reviewBody)
    const entry = [
      `### PR #${String(pr)}: ${title} (${day(this._now())})`,
      '',
      ...(findings.length === 0 ? ['No significant security issues found'] : quote(findings)),
    ]
    this._edit((doc) => prependEntry(doc, 'security', entry, this._limits.security_keep))
    logger.info({ pr, findings: findings.length }, 'Security findings recorded')
    return findings.length
  }

  archiveCompleted(work: CompletedWork): void {
    const entry = [
      `### PR #${String(work.pr)}: ${work.title} (${day(this._now())})`,
      '',
      `- Issue: #${String(work.issue)}`,
      ...(work.duration === undefined ? [] : [`- Duration: ${work.duration}`]),
    ]
    this._edit((doc) => prependEntry(doc, 'archive', entry, this._limits.completed_keep))
  }

  private _edit(change: (doc: NotesDocument) => void): void {
    const doc = this.read()
    change(doc)
    this._write(doc)
  }

  private _write(doc: NotesDocument): void {
    writeFileAtomic(this.path, renderNotes(doc))
  }
}

export function createNotesStore(deps: NotesStoreDeps): NotesStore {
  return new NotesStore(deps)
}
