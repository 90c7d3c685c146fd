export { buildSsa } from './builder.ts'
export {
	cfgSuccessors,
	computeDominators,
	type DominatorTree,
	dominanceFrontiers,
	type GraphBlock,
	iteratedFrontier,
	reversePostorder,
	type Successors,
} from './dominance.ts'
export { formatSsaOperand, printSsa } from './printer.ts'
export * from './types.ts'
export { verifySsa } from './verify.ts'
