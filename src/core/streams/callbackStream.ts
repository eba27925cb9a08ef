/**
 * Core Layer - Callback-to-Stream Adapter
 *
 * Generic constructors that turn callback/listener-shaped vendor calls into
 * RxJS Observables. Every vendor operation in the infrastructure layer is an
 * instantiation of one of these.
 *
 * Shared guarantees:
 * - nothing touches the vendor before subscription
 * - vendor values and errors are relayed unchanged, in vendor order
 * - callbacks arriving after termination or disposal are dropped
 * - the release action runs exactly once per subscription
 */

import { noop, Observable, Subscription, type Subscriber } from 'rxjs'
import { reportLateCallback } from './diagnostics.js'

// ============================================================================
// Types
// ============================================================================

/**
 * Subscriber facade handed to vendor callbacks.
 * Every method is a no-op once the stream has terminated or been disposed.
 */
export interface StreamEmitter<T> {
  readonly closed: boolean
  next(value: T): void
  error(err: unknown): void
  complete(): void
}

/** Node-style completion callback; a non-nullish `error` means failure. */
export type VendorCallback<T> = (error: unknown, value: T) => void

export type ListenerRegistration<T, H> = (
  emit: (value: T) => void,
  fail: (error: unknown) => void
) => H

function createEmitter<T>(subscriber: Subscriber<T>): StreamEmitter<T> {
  return {
    get closed() {
      return subscriber.closed
    },
    next(value) {
      if (subscriber.closed) {
        reportLateCallback({ kind: 'next', value })
        return
      }
      subscriber.next(value)
    },
    error(err) {
      if (subscriber.closed) {
        reportLateCallback({ kind: 'error', error: err })
        return
      }
      subscriber.error(err)
    },
    complete() {
      if (subscriber.closed) {
        reportLateCallback({ kind: 'complete' })
        return
      }
      subscriber.complete()
    },
  }
}

function emitLast<T>(emitter: StreamEmitter<T>, value: T): void {
  emitter.next(value)
  // A synchronous downstream unsubscribe (take(1) and friends) closes us early.
  if (!emitter.closed) emitter.complete()
}

function isVendorError(error: unknown): boolean {
  return error !== null && error !== undefined
}

/**
 * Relay one terminal vendor callback: fail with a non-nullish `error`,
 * otherwise emit `value` and complete.
 */
export function relayResult<T>(emitter: StreamEmitter<T>, error: unknown, value: T): void {
  if (isVendorError(error)) {
    emitter.error(error)
  } else {
    emitLast(emitter, value)
  }
}

// ============================================================================
// Construction Primitive
// ============================================================================

/**
 * Build a stream from a start/release pair.
 *
 * `start` runs once per subscription and returns whatever handle the vendor
 * gave back; `release` receives that handle when the subscription ends,
 * whichever terminal path is taken. A synchronous throw from `start` becomes
 * the stream error and `release` is skipped, since there is no handle.
 */
export function callbackStream<T, H>(
  start: (emitter: StreamEmitter<T>) => H,
  release: (handle: H) => void
): Observable<T> {
  return new Observable<T>((subscriber) => {
    const handle = start(createEmitter(subscriber))
    return () => release(handle)
  })
}

// ============================================================================
// Contracts
// ============================================================================

/**
 * Single-shot contract: one vendor call, one terminal callback.
 *
 * Success emits the payload then completes; an error fails the stream with
 * the vendor value as-is. `cancel` runs only when the consumer disposes
 * before the vendor called back.
 */
export function fromSingleShot<T, H = void>(
  start: (callback: VendorCallback<T>) => H,
  cancel?: (handle: H) => void
): Observable<T> {
  return callbackStream<T, { handle: H; state: { settled: boolean } }>(
    (emitter) => {
      const state = { settled: false }
      const handle = start((error, value) => {
        if (state.settled) {
          reportLateCallback(isVendorError(error) ? { kind: 'error', error } : { kind: 'next', value })
          return
        }
        state.settled = true
        relayResult(emitter, error, value)
      })
      return { handle, state }
    },
    ({ handle, state }) => {
      if (!state.settled && cancel) cancel(handle)
    }
  )
}

/**
 * Multi-shot contract: a registered listener forwards every invocation.
 *
 * The stream never completes on its own. `fail` (vendor-side revocation)
 * errors it. `unregister` receives the listener handle exactly once.
 */
export function fromListener<T, H>(
  register: ListenerRegistration<T, H>,
  unregister: (handle: H) => void
): Observable<T> {
  return callbackStream<T, H>(
    (emitter) =>
      register(
        (value) => emitter.next(value),
        (error) => emitter.error(error)
      ),
    unregister
  )
}

/**
 * Observe-once contract: the first listener invocation is emitted, then the
 * stream completes. The vendor detaches single-event listeners itself, so
 * the release action is empty. Disposing before the first event leaves the
 * vendor listener attached; its eventual invocation is dropped.
 */
export function fromListenerOnce<T>(register: ListenerRegistration<T, void>): Observable<T> {
  return callbackStream<T, void>(
    (emitter) =>
      register(
        (value) => emitLast(emitter, value),
        (error) => emitter.error(error)
      ),
    noop
  )
}

/**
 * Scoped task: `start` creates a vendor task on subscription and `project`
 * describes what to relay from it. Disposing before the projected stream
 * terminated cancels the task.
 */
export function fromTask<K, T>(
  start: () => K,
  project: (task: K) => Observable<T>,
  cancel: (task: K) => void
): Observable<T> {
  return callbackStream<T, { task: K; finished: boolean; subscription: Subscription }>(
    (emitter) => {
      const scope = { task: start(), finished: false, subscription: Subscription.EMPTY }
      scope.subscription = project(scope.task).subscribe({
        next: (value) => emitter.next(value),
        error: (err) => {
          scope.finished = true
          emitter.error(err)
        },
        complete: () => {
          scope.finished = true
          emitter.complete()
        },
      })
      return scope
    },
    (scope) => {
      scope.subscription.unsubscribe()
      if (!scope.finished) cancel(scope.task)
    }
  )
}
