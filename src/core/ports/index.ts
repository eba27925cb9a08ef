/**
 * Core Layer - Ports Index
 *
 * Re-exports the vendor SDK surfaces the adapters consume.
 */

export * from './auth.js'
export * from './database.js'
export * from './remoteConfig.js'
export * from './storage.js'
