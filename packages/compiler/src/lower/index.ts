export { splitCriticalEdges } from './edges.ts'
export { lowerFunction, lowerUnit } from './lower.ts'
export { insertRefCounts } from './refcount.ts'
