/**
 * Core Layer - Ports
 *
 * File storage surface consumed by the storage adapters.
 * Upload and download tasks share one status enumeration.
 */

// ============================================================================
// Task Status
// ============================================================================

export const StorageTaskStatus = {
  Resume: 'resume',
  Progress: 'progress',
  Pause: 'pause',
  Success: 'success',
  Failure: 'failure',
} as const
export type StorageTaskStatus = (typeof StorageTaskStatus)[keyof typeof StorageTaskStatus]

// ============================================================================
// Metadata & Snapshots
// ============================================================================

export interface StorageMetadata {
  name?: string
  fullPath?: string
  size?: number
  contentType?: string
  cacheControl?: string
  customMetadata?: Record<string, string>
}

export interface StorageTaskSnapshot {
  readonly status: StorageTaskStatus
  readonly bytesTransferred: number
  readonly totalBytes: number
  readonly metadata: StorageMetadata | null
  /** Set on failure snapshots. */
  readonly error: Error | null
}

// ============================================================================
// Tasks
// ============================================================================

export type StorageObserverHandle = string

export interface StorageTask {
  observeStatus(status: StorageTaskStatus, handler: (snapshot: StorageTaskSnapshot) => void): StorageObserverHandle
  removeObserver(handle: StorageObserverHandle): void
  cancel(): void
  pause(): void
  resume(): void
}

export interface StorageUploadTask extends StorageTask {
  readonly kind: 'upload'
}

export interface StorageDownloadTask extends StorageTask {
  readonly kind: 'download'
}

// ============================================================================
// Reference
// ============================================================================

export type StorageCallback<T> = (error: Error | null, result: T) => void

export interface StorageReference {
  readonly fullPath: string

  putData(data: Uint8Array, metadata?: StorageMetadata, onComplete?: StorageCallback<StorageMetadata | null>): StorageUploadTask
  putFile(fileUrl: string, metadata?: StorageMetadata, onComplete?: StorageCallback<StorageMetadata | null>): StorageUploadTask

  /**
   * Downloads into memory. The task fails if the object is larger than
   * `maxSize` bytes.
   */
  getData(maxSize: number, onComplete: StorageCallback<Uint8Array | null>): StorageDownloadTask
  write(fileUrl: string, onComplete: StorageCallback<string | null>): StorageDownloadTask

  downloadURL(onComplete: StorageCallback<string | null>): void
  delete(onComplete: (error: Error | null) => void): void
  getMetadata(onComplete: StorageCallback<StorageMetadata | null>): void
  updateMetadata(metadata: StorageMetadata, onComplete: StorageCallback<StorageMetadata | null>): void
}
