/**
 * Barrel exports for the notifications module.
 */

export { LogNotificationSink, CommandNotificationSink } from './notification-sink.js'
export type { Notification, NotificationSink, CommandSinkOptions } from './notification-sink.js'
export { Notifier, blockerNotification, completionNotification } from './notifier.js'
export type { BlockerContext } from './notifier.js'
