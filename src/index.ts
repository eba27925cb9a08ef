export * from './core/index.js'
export * from './infrastructure/index.js'
export * from './config/adapterConfig.js'
export * from './app/createRxBackend.js'
