/**
 * Core Layer - Stream Diagnostics
 *
 * Vendor SDKs occasionally invoke a callback after the stream it feeds has
 * already terminated (a "single-shot" completion firing twice, a listener
 * firing after removal). Such invocations are dropped; this module lets the
 * host observe them.
 */

export type LateCallbackEvent =
  | { kind: 'next'; value: unknown }
  | { kind: 'error'; error: unknown }
  | { kind: 'complete' }

export type LateCallbackHandler = (event: LateCallbackEvent) => void

let lateCallbackHandler: LateCallbackHandler | null = null

/**
 * Install the process-wide late callback handler.
 * Returns the previously installed handler so callers can restore it.
 */
export function setLateCallbackHandler(handler: LateCallbackHandler | null): LateCallbackHandler | null {
  const previous = lateCallbackHandler
  lateCallbackHandler = handler
  return previous
}

export function reportLateCallback(event: LateCallbackEvent): void {
  if (!lateCallbackHandler) return
  try {
    lateCallbackHandler(event)
  } catch (err) {
    console.error('[CallbackStream] late callback handler failed:', err)
  }
}
