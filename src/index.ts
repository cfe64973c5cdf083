// =============================================================================
// BlipVM - Umbrella Package
// =============================================================================
// Re-exports the engine and the Node.js tooling so scripts can depend on
// 'blipvm' alone.

export * from '@blipvm/core'
export * from '@blipvm/node'
