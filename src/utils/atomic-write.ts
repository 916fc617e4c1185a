/**
 * Atomic file replacement for the session record, snapshots and the notes
 * document.
 */

import { mkdirSync, renameSync, unlinkSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'

/**
 * Write `content` to `filePath` atomically (temp file + rename), creating
 * the parent directory if needed. Readers see either the old or the new
 * file, never a partial one.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true })
  const tmpPath = `${filePath}.tmp.${String(process.pid)}.${String(Date.now())}`
  try {
    writeFileSync(tmpPath, content, 'utf-8')
    renameSync(tmpPath, filePath)
  } catch (err) {
    try {
      unlinkSync(tmpPath)
    } catch {
      // tmp file was never created
    }
    throw err
  }
}
