/**
 * Unit tests for TypedEventBus and PipelineEvents.
 *
 * Covers:
 *  - Emit/subscribe with the event's payload
 *  - Unsubscribe removes only the given handler
 *  - Handlers run in registration order, before emit() returns
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { PipelineEvents } from '../event-bus.types.js'

function makeHandler<K extends keyof PipelineEvents>(_event: K): (payload: PipelineEvents[K]) => void {
  return vi.fn()
}

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes a handler with the emitted payload', () => {
    const handler = makeHandler('stale:restarted')
    bus.on('stale:restarted', handler)

    bus.emit('stale:restarted', { issue: 7, behind: 12 })

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith({ issue: 7, behind: 12 })
  })

  it('does not invoke handlers of other events', () => {
    const handler = makeHandler('stale:synced')
    bus.on('stale:synced', handler)

    bus.emit('stale:restarted', { issue: 7, behind: 12 })

    expect(handler).not.toHaveBeenCalled()
  })

  it('passes blocker payloads through unchanged', () => {
    const handler = makeHandler('blocker:raised')
    bus.on('blocker:raised', handler)

    const payload: PipelineEvents['blocker:raised'] = {
      issue: 3,
      blocker: { type: 'critical_issues', urgency: 'high', details: 'CRITICAL issues found', batchBlocking: false },
    }
    bus.emit('blocker:raised', payload)

    expect(handler).toHaveBeenCalledWith(payload)
  })

  it('off() removes only the given handler', () => {
    const removed = makeHandler('issue:complete')
    const kept = makeHandler('issue:complete')
    bus.on('issue:complete', removed)
    bus.on('issue:complete', kept)

    bus.off('issue:complete', removed)
    bus.emit('issue:complete', { issue: 1, outcome: 'merged' })

    expect(removed).not.toHaveBeenCalled()
    expect(kept).toHaveBeenCalledOnce()
  })

  it('off() is a no-op for a handler that was never registered', () => {
    expect(() => {
      bus.off('session:limit', makeHandler('session:limit'))
    }).not.toThrow()
  })

  it('runs handlers in registration order before emit() returns', () => {
    const order: number[] = []
    bus.on('phase:resolved', () => order.push(1))
    bus.on('phase:resolved', () => order.push(2))

    bus.emit('phase:resolved', { issue: 1, phase: 'Not started' })

    expect(order).toEqual([1, 2])
  })

  it('accepts emits with no handlers registered', () => {
    expect(() => {
      bus.emit('divergence:detected', { branch: 'issue-1', foreignCommits: 2, threeWay: false })
    }).not.toThrow()
  })
})

describe('createEventBus', () => {
  it('returns independent buses', () => {
    const a = createEventBus()
    const b = createEventBus()
    const handler = makeHandler('session:limit')
    a.on('session:limit', handler)

    b.emit('session:limit', { reason: 'time_limit' })

    expect(handler).not.toHaveBeenCalled()
  })
})
