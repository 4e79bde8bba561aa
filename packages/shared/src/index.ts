// Shared zod schemas for untyped diagram and finite-set input.

export * from './schemas/index'
