// Shared type definitions for the collection export

export * from './release'
export * from './folder'
export * from './export'
export * from './session'
