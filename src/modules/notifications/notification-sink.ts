/**
 * Notification sinks: where alerts about blockers and completions go.
 *
 * The log sink is always present. A command sink pipes each notification
 * into a user-configured program (a Slack or mail wrapper, for example).
 */

import { ShiplineError } from '../../core/errors.js'
import type { Urgency } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { maskTokens } from '../../utils/masking.js'
import { spawnProcess } from '../../utils/process.js'

const logger = createLogger('notifications')

export interface Notification {
  title: string
  body: string
  urgency: Urgency
  issue?: number
}

export interface NotificationSink {
  readonly name: string
  /** Rejects when delivery fails; the Notifier absorbs the failure */
  send(notification: Notification): Promise<void>
}

// ---------------------------------------------------------------------------
// LogNotificationSink
// ---------------------------------------------------------------------------

export class LogNotificationSink implements NotificationSink {
  readonly name = 'log'

  async send(notification: Notification): Promise<void> {
    const fields = { issue: notification.issue, urgency: notification.urgency, body: notification.body }
    if (notification.urgency === 'normal') {
      logger.info(fields, notification.title)
    } else {
      logger.warn(fields, notification.title)
    }
  }
}

// ---------------------------------------------------------------------------
// CommandNotificationSink
// ---------------------------------------------------------------------------

export interface CommandSinkOptions {
  command: string
  args: string[]
  env?: NodeJS.ProcessEnv
}

/**
 * Runs `command args...` with the notification text on stdin and
 * SHIPLINE_URGENCY / SHIPLINE_TITLE in the environment.
 */
export class CommandNotificationSink implements NotificationSink {
  readonly name = 'command'
  private readonly _options: CommandSinkOptions

  constructor(options: CommandSinkOptions) {
    this._options = options
  }

  async send(notification: Notification): Promise<void> {
    const result = await spawnProcess(this._options.command, this._options.args, {
      env: {
        ...(this._options.env ?? process.env),
        SHIPLINE_URGENCY: notification.urgency,
        SHIPLINE_TITLE: notification.title,
      },
      input: `${notification.title}\n\n${notification.body}\n`,
    })
    if (result.code !== 0) {
      throw new ShiplineError(
        `Notification command exited with code ${String(result.code)}`,
        'NOTIFICATION_FAILED',
        { command: this._options.command, stderr: maskTokens(result.stderr) }
      )
    }
  }
}
