/**
 * spawnProcess: run a short-lived CLI tool and collect its output.
 *
 * Shared by the git, gh and credential-probe adapters. Long-running agent
 * processes use modules/agent instead, which streams and enforces timeouts.
 */

import { spawn } from 'node:child_process'

export interface ProcessOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Written to stdin, which is then closed */
  input?: string
}

export interface ProcessResult {
  stdout: string
  stderr: string
  code: number
}

/**
 * Spawn `command` with `args`. Never rejects: a spawn failure resolves with
 * code 1 and the error text in stderr.
 */
export function spawnProcess(
  command: string,
  args: string[],
  options: ProcessOptions = {}
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on('close', (code) => {
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err) => {
      resolve({ stdout: '', stderr: err.message, code: 1 })
    })

    if (options.input !== undefined && proc.stdin !== null) {
      proc.stdin.end(options.input)
    }
  })
}
