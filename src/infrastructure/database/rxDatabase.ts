/**
 * Infrastructure Layer - Database Adapters
 *
 * Observable wrappers for realtime database queries and references.
 */

import type { Observable } from 'rxjs'
import { fromListener, fromListenerOnce, fromSingleShot } from '../../core/streams/callbackStream.js'
import type {
  DataEventType,
  DataSnapshot,
  DatabaseListenerHandle,
  DatabaseQuery,
  DatabaseReference,
  Priority,
  TransactionUpdate,
} from '../../core/ports/database.js'

export type SiblingKeyedSnapshot = {
  snapshot: DataSnapshot
  previousSiblingKey: string | null
}

export type TransactionOutcome = {
  committed: boolean
  snapshot: DataSnapshot | null
}

// ============================================================================
// Listeners
// ============================================================================

/**
 * Listen for data changes at a location.
 * Emits the initial data and again on every change until unsubscribed.
 */
export function observe(query: DatabaseQuery, eventType: DataEventType): Observable<DataSnapshot> {
  return fromListener<DataSnapshot, DatabaseListenerHandle>(
    (emit, fail) => query.observe(eventType, emit, fail),
    (handle) => query.removeObserver(handle)
  )
}

/**
 * Like `observe`, also passing the key of the previous sibling by priority
 * order for child_added, child_changed and child_moved.
 */
export function observeWithSiblingKey(
  query: DatabaseQuery,
  eventType: DataEventType
): Observable<SiblingKeyedSnapshot> {
  return fromListener<SiblingKeyedSnapshot, DatabaseListenerHandle>(
    (emit, fail) =>
      query.observeWithPreviousSiblingKey(
        eventType,
        (snapshot, previousSiblingKey) => emit({ snapshot, previousSiblingKey }),
        fail
      ),
    (handle) => query.removeObserver(handle)
  )
}

export function observeSingleEvent(query: DatabaseQuery, eventType: DataEventType): Observable<DataSnapshot> {
  return fromListenerOnce<DataSnapshot>((emit, fail) => query.observeSingleEvent(eventType, emit, fail))
}

export function observeSingleEventWithSiblingKey(
  query: DatabaseQuery,
  eventType: DataEventType
): Observable<SiblingKeyedSnapshot> {
  return fromListenerOnce<SiblingKeyedSnapshot>((emit, fail) =>
    query.observeSingleEventWithPreviousSiblingKey(
      eventType,
      (snapshot, previousSiblingKey) => emit({ snapshot, previousSiblingKey }),
      fail
    )
  )
}

// ============================================================================
// Writes
// ============================================================================

/**
 * Write data to this location, replacing it and all children.
 * Writing `null` is equivalent to `removeValue`. Omitting `priority` clears
 * any stored priority.
 */
export function setValue(ref: DatabaseReference, value: unknown, priority?: Priority): Observable<DatabaseReference> {
  return fromSingleShot<DatabaseReference>((done) => ref.setValue(value, priority, done))
}

/** Update the given children without overwriting sibling keys. */
export function updateChildValues(
  ref: DatabaseReference,
  values: Record<string, unknown>
): Observable<DatabaseReference> {
  return fromSingleShot<DatabaseReference>((done) => ref.updateChildValues(values, done))
}

export function removeValue(ref: DatabaseReference): Observable<DatabaseReference> {
  return fromSingleShot<DatabaseReference>((done) => ref.removeValue(done))
}

export function setPriority(ref: DatabaseReference, priority: Priority): Observable<DatabaseReference> {
  return fromSingleShot<DatabaseReference>((done) => ref.setPriority(priority, done))
}

/**
 * Optimistic-concurrency update. `update` may run several times if the
 * local data turns out to be stale; return `{ kind: 'abort' }` to give up.
 */
export function runTransaction(
  ref: DatabaseReference,
  update: TransactionUpdate,
  options?: { applyLocally?: boolean }
): Observable<TransactionOutcome> {
  return fromSingleShot<TransactionOutcome>((done) =>
    ref.runTransaction(
      update,
      (error, committed, snapshot) => done(error, { committed, snapshot }),
      options?.applyLocally
    )
  )
}

// ============================================================================
// Presence
// ============================================================================

/** Set `value` at this location once the client disconnects. */
export function onDisconnectSetValue(
  ref: DatabaseReference,
  value: unknown,
  priority?: Priority
): Observable<DatabaseReference> {
  return fromSingleShot<DatabaseReference>((done) => ref.onDisconnectSetValue(value, priority, done))
}

export function onDisconnectUpdateChildValues(
  ref: DatabaseReference,
  values: Record<string, unknown>
): Observable<DatabaseReference> {
  return fromSingleShot<DatabaseReference>((done) => ref.onDisconnectUpdateChildValues(values, done))
}

export function onDisconnectRemoveValue(ref: DatabaseReference): Observable<DatabaseReference> {
  return fromSingleShot<DatabaseReference>((done) => ref.onDisconnectRemoveValue(done))
}
