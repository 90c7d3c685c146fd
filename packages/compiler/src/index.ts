/**
 * Keel compiler public API.
 *
 * Middle-end for a PHP subset: resolves names and types, normalizes
 * control flow, builds SSA and lowers to a typed IR with explicit
 * reference counting. A reference runtime executes the IR in process.
 */

export * from './cfg/index.ts'
export * from './check/index.ts'
export * from './core/index.ts'
export * from './ir/index.ts'
export * from './lower/index.ts'
export { matchOnly, type ParseResult, parse } from './parse/parser.ts'
export * from './pipeline/index.ts'
export * from './runtime/index.ts'
export * from './ssa/index.ts'
