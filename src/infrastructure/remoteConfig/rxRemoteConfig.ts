/**
 * Infrastructure Layer - Remote Config Adapters
 */

import { noop, type Observable } from 'rxjs'
import { callbackStream, fromSingleShot, relayResult } from '../../core/streams/callbackStream.js'
import { reportLateCallback } from '../../core/streams/diagnostics.js'
import type { RemoteConfig, RemoteConfigFetchStatus } from '../../core/ports/remoteConfig.js'

/**
 * Raised when a fetch finishes without success and the vendor supplied no
 * error of its own (e.g. a throttled fetch).
 */
export class RemoteConfigFetchError extends Error {
  readonly status: RemoteConfigFetchStatus

  constructor(status: RemoteConfigFetchStatus) {
    super(`Remote config fetch finished with status "${status}"`)
    this.name = 'RemoteConfigFetchError'
    this.status = status
  }
}

export type FetchOptions = {
  /** Activate fetched values before emitting. Defaults to true. */
  activate?: boolean
}

/** Make the last fetched values live; emits whether anything changed. */
export function activate(remoteConfig: RemoteConfig): Observable<boolean> {
  return fromSingleShot<boolean>((done) => remoteConfig.activate(done))
}

/**
 * Fetch remote config values, cached by the vendor for `expirationDuration`
 * seconds, then activate them and emit the instance. Nothing is activated
 * once the subscription has ended.
 */
export function fetchWithExpirationDuration(
  remoteConfig: RemoteConfig,
  expirationDuration: number,
  options?: FetchOptions
): Observable<RemoteConfig> {
  const shouldActivate = options?.activate ?? true

  return callbackStream<RemoteConfig, void>(
    (emitter) => {
      const state = { settled: false }
      remoteConfig.fetch(expirationDuration, (status, error) => {
        if (state.settled || emitter.closed) {
          reportLateCallback(error ? { kind: 'error', error } : { kind: 'next', value: status })
          return
        }
        state.settled = true
        if (error) {
          emitter.error(error)
          return
        }
        if (status !== 'success') {
          emitter.error(new RemoteConfigFetchError(status))
          return
        }
        if (!shouldActivate) {
          relayResult(emitter, null, remoteConfig)
          return
        }
        remoteConfig.activate((activateError) => relayResult(emitter, activateError, remoteConfig))
      })
    },
    noop
  )
}
