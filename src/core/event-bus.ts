/**
 * TypedEventBus: typed pub/sub for repair run progress.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 */

import { EventEmitter } from 'node:events'
import type { RepairEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `RepairEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous: all registered handlers run before emit() returns.
   */
  emit<K extends keyof RepairEvents>(event: K, payload: RepairEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof RepairEvents>(event: K, handler: (payload: RepairEvents[K]) => void): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof RepairEvents>(event: K, handler: (payload: RepairEvents[K]) => void): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('repair:finished', ({ success, iterations }) => {
 *   console.log(`Run finished after ${iterations} iteration(s): ${success}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(50)
  }

  emit<K extends keyof RepairEvents>(event: K, payload: RepairEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof RepairEvents>(event: K, handler: (payload: RepairEvents[K]) => void): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof RepairEvents>(event: K, handler: (payload: RepairEvents[K]) => void): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
