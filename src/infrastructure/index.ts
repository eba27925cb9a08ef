/**
 * Infrastructure Layer Index
 *
 * Re-exports the vendor adapters.
 */

// Database
export * from './database/index.js'

// Auth
export * from './auth/index.js'

// Storage
export * from './storage/index.js'

// Remote Config
export * from './remoteConfig/index.js'
