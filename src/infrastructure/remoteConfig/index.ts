export * from './rxRemoteConfig.js'
