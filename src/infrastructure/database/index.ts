export * from './rxDatabase.js'
export * from './snapshotOperators.js'
