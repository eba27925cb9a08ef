/**
 * Core Layer Index
 *
 * Re-exports the stream constructors and vendor ports.
 */

// Streams
export * from './streams/callbackStream.js'
export * from './streams/diagnostics.js'

// Ports
export * from './ports/index.js'
