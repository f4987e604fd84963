/**
 * gitscope - Main module exports
 * Public API surface of the library
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger } from './utils/logger.js'

// Getting and setting git config
export * from './modules/git-config/index.js'

// Underlying store and repository lookup
export * from './modules/config-store/index.js'
export * from './modules/repository/index.js'

// gitscope's own settings
export * from './modules/settings/index.js'
