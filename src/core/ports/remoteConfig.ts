/**
 * Core Layer - Ports
 *
 * Remote configuration surface consumed by the remote config adapter.
 */

export type RemoteConfigFetchStatus = 'noFetchYet' | 'success' | 'failure' | 'throttled'

export interface RemoteConfig {
  readonly lastFetchStatus: RemoteConfigFetchStatus

  /**
   * Fetch config data; fetched data stays cached for `expirationDuration`
   * seconds before a new fetch hits the backend.
   */
  fetch(
    expirationDuration: number,
    onComplete: (status: RemoteConfigFetchStatus, error: Error | null) => void
  ): void

  /** Make the last fetched config available to getters. */
  activate(onComplete: (error: Error | null, changed: boolean) => void): void

  getValue(key: string): string | null
}
