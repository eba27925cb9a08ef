import type { Observable } from 'rxjs'
import { createDefaultAdapterConfig, type AdapterConfig } from '../config/adapterConfig.js'
import type { RemoteConfig } from '../core/ports/remoteConfig.js'
import type { StorageReference } from '../core/ports/storage.js'
import {
  setLateCallbackHandler,
  type LateCallbackEvent,
  type LateCallbackHandler,
} from '../core/streams/diagnostics.js'
import * as auth from '../infrastructure/auth/index.js'
import * as database from '../infrastructure/database/index.js'
import * as remoteConfig from '../infrastructure/remoteConfig/index.js'
import * as storage from '../infrastructure/storage/index.js'

export type StorageApi = Omit<typeof storage, 'getData' | 'getDataWithProgress'> & {
  getData(ref: StorageReference, maxSize?: number): Observable<Uint8Array | null>
  getDataWithProgress(
    ref: StorageReference,
    maxSize?: number
  ): Observable<storage.DownloadEvent<Uint8Array | null>>
}

export type RemoteConfigApi = typeof remoteConfig & {
  /** Fetch with the configured expiration and activation defaults. */
  fetch(
    target: RemoteConfig,
    expirationDuration?: number,
    options?: remoteConfig.FetchOptions
  ): Observable<RemoteConfig>
}

export type RxBackend = {
  readonly config: AdapterConfig
  readonly database: typeof database
  readonly auth: typeof auth
  readonly storage: StorageApi
  readonly remoteConfig: RemoteConfigApi
  /** Uninstall the late callback warning, if this backend installed it. */
  dispose(): void
}

function describeLateCallback(event: LateCallbackEvent): string {
  switch (event.kind) {
    case 'next':
      return 'value'
    case 'error': {
      const reason = event.error instanceof Error ? event.error.message : String(event.error)
      return `error (${reason})`
    }
    case 'complete':
      return 'completion'
  }
}

/**
 * Bind the adapter modules to one configuration.
 *
 * The returned functions are the plain module functions, except that
 * download size limits and remote config fetch parameters fall back to the
 * configured values.
 */
export function createRxBackend(opts: {
  config?: AdapterConfig
  onWarn?: (message: string) => void
} = {}): RxBackend {
  const config = opts.config ?? createDefaultAdapterConfig()
  const warn = opts.onWarn ?? ((message: string) => console.warn(message))

  let installed: LateCallbackHandler | null = null
  let previous: LateCallbackHandler | null = null
  if (config.diagnostics.warnOnLateCallback) {
    installed = (event) => {
      warn(`[RxBackend] dropped vendor ${describeLateCallback(event)} delivered after the stream ended`)
    }
    previous = setLateCallbackHandler(installed)
  }

  const storageApi: StorageApi = {
    ...storage,
    getData: (ref, maxSize = config.storage.maxDownloadSizeBytes) => storage.getData(ref, maxSize),
    getDataWithProgress: (ref, maxSize = config.storage.maxDownloadSizeBytes) =>
      storage.getDataWithProgress(ref, maxSize),
  }

  const remoteConfigApi: RemoteConfigApi = {
    ...remoteConfig,
    fetch: (
      target,
      expirationDuration = config.remoteConfig.expirationDurationSeconds,
      options
    ) =>
      remoteConfig.fetchWithExpirationDuration(target, expirationDuration, {
        ...options,
        activate: options?.activate ?? config.remoteConfig.activateFetched,
      }),
  }

  return {
    config,
    database,
    auth,
    storage: storageApi,
    remoteConfig: remoteConfigApi,
    dispose() {
      if (!installed) return
      const current = setLateCallbackHandler(previous)
      // Someone replaced our handler in the meantime; leave theirs in place.
      if (current !== installed) setLateCallbackHandler(current)
      installed = null
    },
  }
}
