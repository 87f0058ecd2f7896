/**
 * TypedEventBus: typed internal pub/sub for decoupled module communication.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 *  - EventBus cannot depend on any module.
 */

import { EventEmitter } from 'node:events'
import type { EngineEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `EngineEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous: all registered handlers run before emit() returns.
   */
  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('task:failed', ({ nonce, error }) => {
 *   console.log(`Task ${nonce} failed: ${error.kind}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    // Embedders may attach a listener per task; raise the limit above the default 10
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof EngineEvents>(
    event: K,
    handler: (payload: EngineEvents[K]) => void
  ): void {
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
