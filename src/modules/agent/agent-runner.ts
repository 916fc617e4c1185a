/**
 * AgentRunner interface: runs the AI coding agent as a child process.
 */

export interface AgentRunRequest {
  prompt: string
  /** Working directory, normally the issue's worktree */
  cwd: string
  /** Overrides the configured timeout */
  timeoutMs?: number
  /** Short task name for logs, e.g. "review" */
  label?: string
}

export interface AgentRunResult {
  exitCode: number
  stdout: string
  stderr: string
  /**
   * True when the process was killed on timeout. Not an error: the caller
   * inspects whatever work the agent left in the worktree.
   */
  timedOut: boolean
  durationMs: number
}

export interface AgentRunner {
  /** Rejects with AgentError only when the process cannot be started */
  run(request: AgentRunRequest): Promise<AgentRunResult>
}
