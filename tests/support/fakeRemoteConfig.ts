import type { RemoteConfig, RemoteConfigFetchStatus } from '../../src/core/ports/remoteConfig.js'

export class FakeRemoteConfig implements RemoteConfig {
  lastFetchStatus: RemoteConfigFetchStatus = 'noFetchYet'
  readonly values = new Map<string, string>()
  readonly fetches: Array<{
    expirationDuration: number
    complete: (status: RemoteConfigFetchStatus, error: Error | null) => void
  }> = []
  readonly activations: Array<(error: Error | null, changed: boolean) => void> = []

  fetch(
    expirationDuration: number,
    onComplete: (status: RemoteConfigFetchStatus, error: Error | null) => void
  ): void {
    this.fetches.push({
      expirationDuration,
      complete: (status, error) => {
        this.lastFetchStatus = status
        onComplete(status, error)
      },
    })
  }

  activate(onComplete: (error: Error | null, changed: boolean) => void): void {
    this.activations.push(onComplete)
  }

  getValue(key: string): string | null {
    return this.values.get(key) ?? null
  }
}
