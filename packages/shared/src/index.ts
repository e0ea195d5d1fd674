export * from './constants.js'
export * from './types.js'
export * from './validators.js'
export * from './status.js'
