export * from './rxAuth.js'
export * from './rxUser.js'
