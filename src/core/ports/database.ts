/**
 * Core Layer - Ports
 *
 * Realtime database surface consumed by the database adapters.
 * A vendor SDK binding satisfies these interfaces structurally.
 */

// ============================================================================
// Events & Snapshots
// ============================================================================

export type DataEventType =
  | 'value'
  | 'child_added'
  | 'child_changed'
  | 'child_moved'
  | 'child_removed'

/** Opaque handle returned when a listener is registered. */
export type DatabaseListenerHandle = number

/**
 * Immutable view of the data at a location.
 * `value` is `null` when the location holds no data.
 */
export interface DataSnapshot {
  readonly key: string | null
  readonly value: unknown
  readonly children: Iterable<DataSnapshot>
}

export type Priority = string | number | null

// ============================================================================
// Transactions
// ============================================================================

export interface MutableData {
  readonly key: string | null
  value: unknown
}

export type TransactionResult =
  | { kind: 'success'; data: MutableData }
  | { kind: 'abort' }

export type TransactionUpdate = (current: MutableData) => TransactionResult

// ============================================================================
// Callbacks
// ============================================================================

export type DatabaseCancelCallback = (error: Error) => void

export type DatabaseCompletionCallback = (error: Error | null, ref: DatabaseReference) => void

export type TransactionCompletionCallback = (
  error: Error | null,
  committed: boolean,
  snapshot: DataSnapshot | null
) => void

// ============================================================================
// Query & Reference
// ============================================================================

export interface DatabaseQuery {
  /**
   * Register a listener fired for the initial data and again on every change.
   * `onCancel` fires once if the server revokes the listener.
   */
  observe(
    eventType: DataEventType,
    onEvent: (snapshot: DataSnapshot) => void,
    onCancel?: DatabaseCancelCallback
  ): DatabaseListenerHandle

  /**
   * Same as `observe`, additionally passing the key of the previous sibling
   * for child_added, child_changed and child_moved.
   */
  observeWithPreviousSiblingKey(
    eventType: DataEventType,
    onEvent: (snapshot: DataSnapshot, previousSiblingKey: string | null) => void,
    onCancel?: DatabaseCancelCallback
  ): DatabaseListenerHandle

  /** Fires once with the initial data, then detaches itself. */
  observeSingleEvent(
    eventType: DataEventType,
    onEvent: (snapshot: DataSnapshot) => void,
    onCancel?: DatabaseCancelCallback
  ): void

  observeSingleEventWithPreviousSiblingKey(
    eventType: DataEventType,
    onEvent: (snapshot: DataSnapshot, previousSiblingKey: string | null) => void,
    onCancel?: DatabaseCancelCallback
  ): void

  removeObserver(handle: DatabaseListenerHandle): void
}

export interface DatabaseReference extends DatabaseQuery {
  readonly key: string | null

  setValue(value: unknown, priority: Priority | undefined, onComplete: DatabaseCompletionCallback): void
  updateChildValues(values: Record<string, unknown>, onComplete: DatabaseCompletionCallback): void
  removeValue(onComplete: DatabaseCompletionCallback): void
  setPriority(priority: Priority, onComplete: DatabaseCompletionCallback): void

  runTransaction(
    update: TransactionUpdate,
    onComplete: TransactionCompletionCallback,
    applyLocally?: boolean
  ): void

  onDisconnectSetValue(value: unknown, priority: Priority | undefined, onComplete: DatabaseCompletionCallback): void
  onDisconnectUpdateChildValues(values: Record<string, unknown>, onComplete: DatabaseCompletionCallback): void
  onDisconnectRemoveValue(onComplete: DatabaseCompletionCallback): void
}
