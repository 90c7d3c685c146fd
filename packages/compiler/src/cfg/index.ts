export { type CfgUnit, normalize, normalizeFunction, pruneUnreachable } from './normalize.ts'
export { formatBlocks, formatInst, formatOperand, formatRvalue, formatTerminator, printCfg } from './printer.ts'
export { mayThrow } from './throws.ts'
export * from './types.ts'
