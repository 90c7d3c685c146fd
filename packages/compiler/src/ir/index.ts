export { type CallMayThrow, callMayThrow, RUNTIME_FUNCTIONS, type RuntimeFunction, runtimeFunction } from './abi.ts'
export { formatIrInst, formatIrTerminator, printIrFunction, printIrModule } from './printer.ts'
export { simulateRefCounts, verifyRefCounts } from './refcheck.ts'
export {
	type ArithOp,
	type Callee,
	type CallInst,
	type CastOp,
	type Effect,
	type FcmpPredicate,
	type IcmpPredicate,
	type IrBlock,
	type IrClass,
	type IrExtern,
	type IrFunction,
	type IrGraph,
	type IrInst,
	type IrModule,
	type IrParam,
	type PhiIncoming as IrPhiIncoming,
	type IrSlot,
	type IrTerminator,
	IrType,
	instOperands as irInstOperands,
	instResult,
	irGraph,
	irPredecessors,
	irTypeOf,
	isHandle,
	terminatorOperands as irTerminatorOperands,
	terminatorSuccessors,
	type UnaryOp,
} from './types.ts'
export { validateFunction, validateModule } from './validate.ts'
