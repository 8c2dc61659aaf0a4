/**
 * Effect module barrel export.
 */

// Errors
export * from "./errors"

// Configuration
export * from "./Config"

// Services
export * from "./services"

// Runtime
export * from "./runtime"
