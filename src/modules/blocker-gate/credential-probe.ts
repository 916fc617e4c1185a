/**
 * CredentialProbe: checks that the cloud credentials the project's work
 * needs are still valid.
 */

import { createLogger } from '../../utils/logger.js'
import { spawnProcess } from '../../utils/process.js'

const logger = createLogger('credential-probe')

export interface CredentialProbe {
  valid(): Promise<boolean>
}

export interface CommandProbeOptions {
  command: string
  args: string[]
  env?: NodeJS.ProcessEnv
}

/** Runs a command; exit code 0 means the credentials are valid */
export class CommandCredentialProbe implements CredentialProbe {
  private readonly _options: CommandProbeOptions

  constructor(options: CommandProbeOptions) {
    this._options = options
  }

  async valid(): Promise<boolean> {
    const { command, args, env } = this._options
    const result = await spawnProcess(command, args, { env })
    if (result.code !== 0) {
      logger.warn({ command, code: result.code, stderr: result.stderr }, 'Credential probe failed')
      return false
    }
    return true
  }
}
