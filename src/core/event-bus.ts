/**
 * TypedEventBus: typed internal pub/sub between the pipeline and its observers.
 *
 * Built on top of Node.js EventEmitter. Dispatch is synchronous: handlers
 * run before emit() returns.
 */

import { EventEmitter } from 'node:events'
import type { PipelineEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

export interface TypedEventBus {
  emit<K extends keyof PipelineEvents>(event: K, payload: PipelineEvents[K]): void

  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void

  off<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('stale:restarted', ({ issue, behind }) => {
 *   console.log(`#${issue} restarted, ${behind} behind`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  emit<K extends keyof PipelineEvents>(event: K, payload: PipelineEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
