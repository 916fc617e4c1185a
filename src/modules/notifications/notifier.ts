/**
 * Notifier: fans a notification out to every sink, and deduplicates
 * per-issue alerts through the session record so resumed runs do not
 * repeat them.
 */

import { errorMessage } from '../../core/errors.js'
import type { BlockerEvent } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { SessionTracker } from '../session-tracker/session-tracker.js'
import type { Notification, NotificationSink } from './notification-sink.js'

const logger = createLogger('notifier')

export interface BlockerContext {
  pr?: number | null
  worktreePath?: string | null
}

export class Notifier {
  private readonly _sinks: NotificationSink[]
  private readonly _session: SessionTracker

  constructor(sinks: NotificationSink[], session: SessionTracker) {
    this._sinks = sinks
    this._session = session
  }

  /** Deliver to all sinks; returns the number that succeeded */
  async notify(notification: Notification): Promise<number> {
    let delivered = 0
    for (const sink of this._sinks) {
      try {
        await sink.send(notification)
        delivered += 1
      } catch (err) {
        logger.warn({ sink: sink.name, title: notification.title, err: errorMessage(err) }, 'Notification delivery failed')
      }
    }
    return delivered
  }

  /**
   * Deliver unless (issue, type) was already sent this clone. Returns true
   * when at least one sink took the notification; otherwise it is retried
   * on the next call.
   */
  async notifyOnce(issue: number, type: string, notification: Notification): Promise<boolean> {
    if (this._session.wasNotificationSent(issue, type)) {
      logger.debug({ issue, type }, 'Notification already sent; skipping')
      return false
    }
    const delivered = await this.notify({ ...notification, issue })
    if (delivered === 0) return false
    this._session.markNotificationSent(issue, type)
    return true
  }

  notifyBlocker(issue: number, blocker: BlockerEvent, context: BlockerContext = {}): Promise<boolean> {
    return this.notifyOnce(issue, blocker.type, blockerNotification(issue, blocker, context))
  }
}

export function blockerNotification(
  issue: number,
  blocker: BlockerEvent,
  context: BlockerContext = {}
): Notification {
  const lines = [`Type: ${blocker.type}`, `Issue: #${String(issue)}`]
  if (context.pr !== undefined && context.pr !== null) lines.push(`PR: #${String(context.pr)}`)
  if (context.worktreePath !== undefined && context.worktreePath !== null) {
    lines.push(`Worktree: ${context.worktreePath}`)
  }
  lines.push('', 'Details:', blocker.details, '', `To resume: shipline run ${String(issue)}`)
  return {
    title: `Workflow blocker on #${String(issue)}: ${blocker.type}`,
    body: lines.join('\n'),
    urgency: blocker.urgency,
    issue,
  }
}

export function completionNotification(issue: number, pr: number, title: string, duration: string): Notification {
  return {
    title: `Issue #${String(issue)} complete`,
    body: [`PR #${String(pr)}: ${title}`, `Duration: ${duration}`].join('\n'),
    urgency: 'normal',
    issue,
  }
}
