export * from './rxStorage.js'
