/**
 * captureOutput: collect what a command writes to stdout and stderr.
 * Call from beforeEach; vi.restoreAllMocks() undoes the spies.
 */

import { vi } from 'vitest'

export interface CapturedOutput {
  stdout: () => string
  stderr: () => string
}

export function captureOutput(): CapturedOutput {
  let stdout = ''
  let stderr = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  return { stdout: () => stdout, stderr: () => stderr }
}
