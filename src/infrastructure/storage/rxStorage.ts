/**
 * Infrastructure Layer - Storage Adapters
 *
 * Upload/download tasks are exposed two ways:
 * - plain: the task itself, or its single terminal result
 * - with progress: status events merged by arrival until the task succeeds
 *   or fails
 *
 * Disposing a subscription before its task finished cancels the task.
 */

import { merge, mergeMap, Subscription, takeWhile, type Observable, type OperatorFunction } from 'rxjs'
import {
  callbackStream,
  fromSingleShot,
  fromTask,
  relayResult,
  type VendorCallback,
} from '../../core/streams/callbackStream.js'
import {
  StorageTaskStatus,
  type StorageDownloadTask,
  type StorageMetadata,
  type StorageObserverHandle,
  type StorageReference,
  type StorageTask,
  type StorageTaskSnapshot,
  type StorageUploadTask,
} from '../../core/ports/storage.js'

// ============================================================================
// Event Types
// ============================================================================

export type StorageTaskEvent = {
  status: StorageTaskStatus
  snapshot: StorageTaskSnapshot
}

export type DownloadEvent<T> =
  | { status: typeof StorageTaskStatus.Progress; snapshot: StorageTaskSnapshot }
  | { status: typeof StorageTaskStatus.Success; result: T }

export function isTerminalStatus(status: StorageTaskStatus): boolean {
  return status === StorageTaskStatus.Success || status === StorageTaskStatus.Failure
}

// ============================================================================
// Task Status
// ============================================================================

/**
 * Listen for one status of a task. A snapshot carrying an error fails the
 * stream; the success status emits once and completes.
 */
export function observeStatus(task: StorageTask, status: StorageTaskStatus): Observable<StorageTaskEvent> {
  return callbackStream<StorageTaskEvent, StorageObserverHandle>(
    (emitter) =>
      task.observeStatus(status, (snapshot) => {
        if (snapshot.error) {
          emitter.error(snapshot.error)
          return
        }
        if (status === StorageTaskStatus.Success) {
          relayResult<StorageTaskEvent>(emitter, null, { status, snapshot })
          return
        }
        emitter.next({ status, snapshot })
      }),
    (handle) => task.removeObserver(handle)
  )
}

/**
 * Progress, success and failure listeners merged by arrival. The first
 * terminal event is emitted last; every listener is removed afterwards.
 */
export function observeTaskEvents(task: StorageTask): Observable<StorageTaskEvent> {
  return merge(
    observeStatus(task, StorageTaskStatus.Progress),
    observeStatus(task, StorageTaskStatus.Success),
    observeStatus(task, StorageTaskStatus.Failure)
  ).pipe(takeWhile((event) => !isTerminalStatus(event.status), true))
}

/**
 * Map a stream of tasks to their merged status events. The first terminal
 * event ends the stream and disposes the source.
 */
export function storageStatus<K extends StorageTask>(): OperatorFunction<K, StorageTaskEvent> {
  return (source) =>
    source.pipe(
      mergeMap((task: K) => observeTaskEvents(task)),
      takeWhile((event) => !isTerminalStatus(event.status), true)
    )
}

// ============================================================================
// Upload
// ============================================================================

type TaskScope<K> = {
  task: K
  state: { finished: boolean }
  watch: Subscription
}

function emitTask<K extends StorageTask>(start: () => K): Observable<K> {
  return callbackStream<K, TaskScope<K>>(
    (emitter) => {
      const task = start()
      const state = { finished: false }
      // Registered before the task is handed out, so it sees a terminal
      // status ahead of any downstream listener.
      const watch = observeTaskEvents(task).subscribe({
        error: () => {
          state.finished = true
        },
        complete: () => {
          state.finished = true
        },
      })
      emitter.next(task)
      return { task, state, watch }
    },
    ({ task, state, watch }) => {
      watch.unsubscribe()
      if (!state.finished) task.cancel()
    }
  )
}

/**
 * Upload in-memory data. Emits the running task and stays open until
 * unsubscribed; unsubscribing before the task succeeded or failed cancels
 * the upload. Prefer a file upload for large payloads.
 */
export function putData(
  ref: StorageReference,
  data: Uint8Array,
  metadata?: StorageMetadata
): Observable<StorageUploadTask> {
  return emitTask(() => ref.putData(data, metadata))
}

export function putFile(
  ref: StorageReference,
  fileUrl: string,
  metadata?: StorageMetadata
): Observable<StorageUploadTask> {
  return emitTask(() => ref.putFile(fileUrl, metadata))
}

export function putDataWithProgress(
  ref: StorageReference,
  data: Uint8Array,
  metadata?: StorageMetadata
): Observable<StorageTaskEvent> {
  return fromTask(() => ref.putData(data, metadata), observeTaskEvents, (task) => task.cancel())
}

export function putFileWithProgress(
  ref: StorageReference,
  fileUrl: string,
  metadata?: StorageMetadata
): Observable<StorageTaskEvent> {
  return fromTask(() => ref.putFile(fileUrl, metadata), observeTaskEvents, (task) => task.cancel())
}

// ============================================================================
// Download
// ============================================================================

/**
 * Download into memory. The backend fails the task when the object exceeds
 * `maxSize` bytes.
 */
export function getData(ref: StorageReference, maxSize: number): Observable<Uint8Array | null> {
  return fromSingleShot<Uint8Array | null, StorageDownloadTask>(
    (done) => ref.getData(maxSize, done),
    (task) => task.cancel()
  )
}

/** Download to a local file; emits the written file URL. */
export function writeToFile(ref: StorageReference, fileUrl: string): Observable<string | null> {
  return fromSingleShot<string | null, StorageDownloadTask>(
    (done) => ref.write(fileUrl, done),
    (task) => task.cancel()
  )
}

type DownloadScope = {
  task: StorageDownloadTask
  state: { settled: boolean }
  progress: Subscription
}

function trackDownload<T>(start: (done: VendorCallback<T>) => StorageDownloadTask): Observable<DownloadEvent<T>> {
  return callbackStream<DownloadEvent<T>, DownloadScope>(
    (emitter) => {
      const state = { settled: false }
      const task = start((error, result) => {
        state.settled = true
        relayResult<DownloadEvent<T>>(emitter, error, { status: StorageTaskStatus.Success, result })
      })
      const progress = observeStatus(task, StorageTaskStatus.Progress).subscribe({
        next: ({ snapshot }) => emitter.next({ status: StorageTaskStatus.Progress, snapshot }),
        error: (err) => {
          state.settled = true
          emitter.error(err)
        },
      })
      return { task, state, progress }
    },
    ({ task, state, progress }) => {
      progress.unsubscribe()
      if (!state.settled) task.cancel()
    }
  )
}

export function getDataWithProgress(
  ref: StorageReference,
  maxSize: number
): Observable<DownloadEvent<Uint8Array | null>> {
  return trackDownload<Uint8Array | null>((done) => ref.getData(maxSize, done))
}

export function writeToFileWithProgress(
  ref: StorageReference,
  fileUrl: string
): Observable<DownloadEvent<string | null>> {
  return trackDownload<string | null>((done) => ref.write(fileUrl, done))
}

// ============================================================================
// Object Operations
// ============================================================================

/**
 * Long-lived download URL with a revocable token, suitable for sharing.
 */
export function downloadURL(ref: StorageReference): Observable<string | null> {
  return fromSingleShot<string | null>((done) => ref.downloadURL(done))
}

export function deleteObject(ref: StorageReference): Observable<void> {
  return fromSingleShot<void>((done) => ref.delete((error) => done(error, undefined)))
}

export function getMetadata(ref: StorageReference): Observable<StorageMetadata | null> {
  return fromSingleShot<StorageMetadata | null>((done) => ref.getMetadata(done))
}

export function updateMetadata(
  ref: StorageReference,
  metadata: StorageMetadata
): Observable<StorageMetadata | null> {
  return fromSingleShot<StorageMetadata | null>((done) => ref.updateMetadata(metadata, done))
}
