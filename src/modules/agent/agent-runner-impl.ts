/**
 * AgentRunnerImpl: spawn-based agent execution.
 *
 * - Uses child_process.spawn, never exec; the prompt goes to stdin
 * - Logs a heartbeat every `heartbeat_seconds` while the agent runs
 * - On timeout: SIGTERM, then SIGKILL after `kill_grace_seconds`
 */

import { spawn } from 'node:child_process'
import { AgentError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { AgentSettings } from '../config/config-schema.js'
import type { AgentRunRequest, AgentRunResult, AgentRunner } from './agent-runner.js'

const logger = createLogger('agent')

export class AgentRunnerImpl implements AgentRunner {
  private readonly _settings: AgentSettings
  private readonly _env: NodeJS.ProcessEnv

  constructor(settings: AgentSettings, env: NodeJS.ProcessEnv = process.env) {
    this._settings = settings
    this._env = env
  }

  run(request: AgentRunRequest): Promise<AgentRunResult> {
    const label = request.label ?? 'agent'
    const timeoutMs = request.timeoutMs ?? this._settings.timeout_seconds * 1000
    const { command, args } = this._settings

    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: request.cwd,
        env: this._env,
        stdio: ['pipe', 'pipe', 'pipe'],
      })
      const startedAt = Date.now()
      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      let timedOut = false
      let settled = false
      let killHandle: ReturnType<typeof setTimeout> | null = null

      const heartbeat = setInterval(() => {
        logger.info(
          { label, elapsedSeconds: Math.round((Date.now() - startedAt) / 1000) },
          'Agent still running'
        )
      }, this._settings.heartbeat_seconds * 1000)

      const timeoutHandle = setTimeout(() => {
        timedOut = true
        logger.warn({ label, timeoutMs }, 'Agent timed out; terminating')
        proc.kill('SIGTERM')
        if (settled) return
        killHandle = setTimeout(() => {
          logger.warn({ label }, 'Agent ignored SIGTERM; killing')
          proc.kill('SIGKILL')
        }, this._settings.kill_grace_seconds * 1000)
      }, timeoutMs)

      const clearTimers = (): void => {
        clearInterval(heartbeat)
        clearTimeout(timeoutHandle)
        if (killHandle !== null) clearTimeout(killHandle)
      }

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      proc.on('error', (err) => {
        clearTimers()
        if (settled) return
        settled = true
        reject(new AgentError(`Failed to start agent "${command}": ${err.message}`, { command, label }))
      })

      proc.on('close', (code) => {
        clearTimers()
        if (settled) return
        settled = true
        const durationMs = Date.now() - startedAt
        const exitCode = code ?? -1
        logger.debug({ label, exitCode, timedOut, durationMs }, 'Agent exited')
        resolve({
          exitCode,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
          timedOut,
          durationMs,
        })
      })

      if (proc.stdin !== null) {
        proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
          // The agent may exit before reading its prompt
          if (err.code !== 'EPIPE') logger.warn({ label, error: err.message }, 'stdin write error')
        })
        proc.stdin.end(request.prompt)
      }

      logger.debug({ label, command, cwd: request.cwd, timeoutMs }, 'Agent started')
    })
  }
}

export function createAgentRunner(settings: AgentSettings, env?: NodeJS.ProcessEnv): AgentRunner {
  return new AgentRunnerImpl(settings, env)
}
