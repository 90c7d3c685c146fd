/**
 * Control-flow normalization.
 *
 * Lowers the structured, typed body of each function into basic blocks of
 * three-address instructions. Every construct is reduced to jumps and
 * two-way branches:
 *
 * - loops get a header testing the condition and a back edge to it
 * - `foreach` iterates a snapshot of the array by position
 * - `switch` and `match` become chains of tests
 * - `finally` bodies are copied onto every path leaving the protected
 *   region, exceptional ones included
 *
 * Inside a `try`, each operation that may throw ends its block with an
 * `invoke` whose exception edge leads to a landing block of its own. The
 * landing block names the exception and jumps to the handler's dispatch
 * chain, so landing blocks always have exactly one predecessor.
 */

import { CONSTRUCTOR } from '../check/declarations.ts'
import { THROWABLE } from '../check/statements.ts'
import type { SymbolTable } from '../check/symbols.ts'
import type {
	ResolvedUnit,
	TMatch,
	TypedCatch,
	TypedExpr,
	TypedFunction,
	TypedLValue,
	TypedStmt,
	TypedVar,
} from '../check/typed.ts'
import { ANY_ARRAY, BOOL, INT, MIXED, objectOf, type PhpType, settle, STRING, typeToString, VOID } from '../check/types.ts'
import { type ConstValue, intConst, NULL_CONST, stringConst } from '../check/values.ts'
import type { CompilationContext } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type { SourceLocation } from '../core/location.ts'
import { irTypeOf } from '../ir/types.ts'
import { mayThrow } from './throws.ts'
import {
	type BlockId,
	blockId,
	type CfgBlock,
	type CfgFunction,
	type CfgInst,
	type CfgTerminator,
	type Operand,
	type Rvalue,
	computePreds,
	successors,
} from './types.ts'

export interface CfgUnit {
	readonly unit: string
	readonly file: string
	readonly functions: readonly CfgFunction[]
}

interface MutableBlock {
	readonly id: BlockId
	readonly insts: CfgInst[]
	terminator: CfgTerminator | null
}

/** Where exceptions raised in the current region go */
interface Handler {
	readonly dispatch: BlockId
	/** Variable the landing blocks store the exception in */
	readonly exception: string
}

interface LoopFrame {
	readonly breakTarget: BlockId
	readonly continueTarget: BlockId
	/** Number of enclosing `finally` scopes outside the loop */
	readonly cleanupDepth: number
}

interface FinallyScope {
	readonly body: readonly TypedStmt[]
	/** Handler in effect around the `try` statement */
	readonly handler: Handler | null
	readonly loopDepth: number
	readonly cleanupDepth: number
}

function constOperand(value: ConstValue, type: PhpType): Operand {
	return { kind: 'const', type, value }
}

function varOperand(name: string, type: PhpType): Operand {
	return { kind: 'var', name, type }
}

const UNMATCHED_PATTERN = 'UnmatchedPatternError'
const TYPE_ERROR = 'TypeError'

class FunctionNormalizer {
	private readonly blocks: MutableBlock[] = []
	private readonly targeted = new Set<BlockId>()
	private readonly locals: Map<string, PhpType>
	private readonly warned = new Set<string>()
	private current: MutableBlock | null
	private handler: Handler | null = null
	private loops: LoopFrame[] = []
	private cleanups: FinallyScope[] = []
	private nextTemp = 0

	constructor(
		private readonly fn: TypedFunction,
		private readonly symbols: SymbolTable,
		private readonly context: CompilationContext
	) {
		this.locals = new Map(fn.locals)
		this.current = this.newBlock()
	}

	run(): CfgFunction {
		this.statements(this.fn.body)
		if (this.current !== null) this.fallOffEnd()
		for (const block of this.blocks) {
			if (block.terminator === null) block.terminator = { kind: 'unreachable' }
		}
		const blocks = pruneUnreachable(
			this.blocks.map((block) => ({
				id: block.id,
				insts: block.insts,
				terminator: block.terminator ?? { kind: 'unreachable' },
			}))
		)
		return {
			blocks,
			loc: this.fn.loc,
			locals: this.locals,
			name: this.fn.name,
			params: this.fn.params,
			returnType: this.fn.returnType,
			thisClass: this.fn.thisClass,
			unit: this.fn.unit,
		}
	}

	// ==========================================================================
	// Blocks
	// ==========================================================================

	private newBlock(): MutableBlock {
		const block: MutableBlock = { id: blockId(this.blocks.length), insts: [], terminator: null }
		this.blocks.push(block)
		return block
	}

	/** The current block, or a fresh unreachable one after a terminator */
	private block(): MutableBlock {
		if (this.current === null) this.current = this.newBlock()
		return this.current
	}

	private terminate(terminator: CfgTerminator): void {
		const block = this.block()
		block.terminator = terminator
		for (const edge of successors(terminator)) this.targeted.add(edge.target)
		this.current = null
	}

	private jumpTo(target: MutableBlock): void {
		if (this.current !== null) this.terminate({ kind: 'jump', target: target.id })
	}

	/** Continue in `join` if anything reaches it */
	private continueIn(join: MutableBlock): void {
		this.current = this.targeted.has(join.id) ? join : null
	}

	private temp(type: PhpType): string {
		const name = `%n${this.nextTemp++}`
		this.locals.set(name, type)
		return name
	}

	// ==========================================================================
	// Instructions
	// ==========================================================================

	/**
	 * Emit `dest = value`. Inside a protected region a throwing operation
	 * ends the block with an invoke.
	 */
	private emit(dest: string | null, type: PhpType, value: Rvalue<Operand>, loc: SourceLocation): void {
		if (this.handler !== null && mayThrow(value, type)) {
			const normal = this.newBlock()
			this.terminate({ dest, kind: 'invoke', loc, normal: normal.id, type, unwind: this.landing(), value })
			this.current = normal
			return
		}
		this.block().insts.push({ dest, kind: 'assign', loc, type, value })
	}

	/** Evaluate `value` into a fresh temporary */
	private compute(type: PhpType, value: Rvalue<Operand>, loc: SourceLocation): Operand {
		if (type.kind === 'void') {
			this.emit(null, VOID, value, loc)
			return constOperand(NULL_CONST, MIXED)
		}
		const name = this.temp(type)
		this.emit(name, type, value, loc)
		return varOperand(name, type)
	}

	private landing(): BlockId {
		const handler = this.handler
		if (handler === null) throw new InternalCompilerError('normalize', 'landing block outside a protected region')
		const block = this.newBlock()
		block.insts.push({
			dest: handler.exception,
			kind: 'assign',
			loc: this.fn.loc,
			type: objectOf(THROWABLE),
			value: { kind: 'caught' },
		})
		block.terminator = { kind: 'jump', target: handler.dispatch }
		this.targeted.add(handler.dispatch)
		return block.id
	}

	private throwValue(value: Operand, loc: SourceLocation): void {
		this.terminate({ kind: 'throw', loc, unwind: this.handler === null ? null : this.landing(), value })
	}

	/** Convert `operand` when its machine representation differs from `type`'s */
	private coerce(operand: Operand, type: PhpType, loc: SourceLocation): Operand {
		if (irTypeOf(operand.type) === irTypeOf(type)) return operand
		return this.compute(type, { from: operand.type, kind: 'convert', mode: 'implicit', to: type, value: operand }, loc)
	}

	private assignVar(name: string, type: PhpType, value: Operand, loc: SourceLocation): void {
		this.emit(name, type, { kind: 'use', value: this.coerce(value, type, loc) }, loc)
	}

	/** Allocate `className`, run its constructor and throw the result */
	private throwNew(className: string, message: Operand, loc: SourceLocation): void {
		const symbol = this.symbols.lookupClass(className)
		if (symbol === undefined) throw new InternalCompilerError('normalize', `built-in class ${className} is not declared`)
		const object = this.compute(objectOf(symbol.name, true), { className: symbol.name, kind: 'new' }, loc)
		const constructor = this.symbols.findMethod(symbol.name, CONSTRUCTOR)
		if (constructor !== undefined) {
			this.emit(null, VOID, { args: [object, message], callee: constructor.mangled, kind: 'call' }, loc)
		}
		this.throwValue(object, loc)
	}

	private fallOffEnd(): void {
		const { returnType } = this.fn
		if (returnType.kind === 'void') {
			this.terminate({ kind: 'return', loc: this.fn.loc, value: null })
			return
		}
		if (returnType.kind === 'mixed') {
			this.terminate({ kind: 'return', loc: this.fn.loc, value: constOperand(NULL_CONST, MIXED) })
			return
		}
		const message = `${this.fn.name}(): Return value must be of type ${typeToString(returnType)}, none returned`
		this.throwNew(TYPE_ERROR, constOperand(stringConst(message), STRING), this.fn.loc)
	}

	// ==========================================================================
	// Expressions
	// ==========================================================================

	private args(values: readonly TypedExpr[]): Operand[] {
		return values.map((value) => this.value(value))
	}

	/** Evaluate `expr` for its effects only */
	private effect(expr: TypedExpr): void {
		switch (expr.kind) {
			case 'Const':
			case 'Local':
				return
			case 'Seq':
				for (const effect of expr.effects) this.effect(effect)
				this.effect(expr.result)
				return
			case 'Assign':
				this.assign(expr.target, expr.value, expr.loc)
				return
			case 'Call':
				this.emit(null, expr.type, { args: this.args(expr.args), callee: expr.callee, kind: 'call' }, expr.loc)
				return
			case 'Builtin':
				this.emit(null, expr.type, { args: this.args(expr.args), kind: 'builtin', runtime: expr.runtime }, expr.loc)
				return
			default:
				this.value(expr)
		}
	}

	private value(expr: TypedExpr): Operand {
		const { loc, type } = expr
		switch (expr.kind) {
			case 'Const':
				return constOperand(expr.value, type)
			case 'Local':
				return varOperand(expr.name, type)
			case 'Seq':
				for (const effect of expr.effects) this.effect(effect)
				return this.value(expr.result)
			case 'Binary': {
				const left = this.value(expr.left)
				const right = this.value(expr.right)
				return this.compute(type, { kind: 'binary', left, op: expr.op, operandType: expr.operandType, right }, loc)
			}
			case 'Logical':
				return this.logical(expr.op, expr.left, expr.right, loc)
			case 'Unary':
				return this.compute(type, { kind: 'unary', op: expr.op, operand: this.value(expr.operand) }, loc)
			case 'Convert': {
				const value = this.value(expr.expr)
				return this.compute(type, { from: value.type, kind: 'convert', mode: expr.mode, to: type, value }, loc)
			}
			case 'Assign':
				return this.assign(expr.target, expr.value, loc)
			case 'Call':
				return this.compute(type, { args: this.args(expr.args), callee: expr.callee, kind: 'call' }, loc)
			case 'Builtin':
				return this.compute(type, { args: this.args(expr.args), kind: 'builtin', runtime: expr.runtime }, loc)
			case 'New': {
				const object = this.compute(type, { className: expr.className, kind: 'new' }, loc)
				if (expr.constructor !== null) {
					const args = this.args(expr.args)
					this.emit(null, VOID, { args: [object, ...args], callee: expr.constructor, kind: 'call' }, loc)
				}
				return object
			}
			case 'MethodCall': {
				const object = this.value(expr.object)
				return this.compute(
					type,
					{
						args: this.args(expr.args),
						className: expr.className,
						dispatch: expr.dispatch,
						kind: 'methodCall',
						object,
						target: expr.target,
					},
					loc
				)
			}
			case 'StaticCall': {
				const self = expr.thisArg === null ? [] : [this.value(expr.thisArg)]
				return this.compute(type, { args: [...self, ...this.args(expr.args)], callee: expr.callee, kind: 'call' }, loc)
			}
			case 'DynMethodCall': {
				const object = this.value(expr.object)
				return this.compute(type, { args: this.args(expr.args), kind: 'dynMethodCall', method: expr.method, object }, loc)
			}
			case 'PropGet':
				return this.compute(
					type,
					{ className: expr.className, kind: 'propGet', name: expr.name, object: this.value(expr.object), slot: expr.slot },
					loc
				)
			case 'DynPropGet':
				return this.compute(type, { kind: 'dynPropGet', name: expr.name, object: this.value(expr.object) }, loc)
			case 'ArrayLiteral': {
				let array = this.compute(type, { kind: 'arrayNew' }, loc)
				for (const item of expr.items) {
					const key = item.key === null ? null : this.value(item.key)
					const element = this.value(item.value)
					array = this.compute(
						type,
						key === null
							? { array, kind: 'arrayPush', value: element }
							: { array, key, kind: 'arraySet', value: element },
						loc
					)
				}
				return array
			}
			case 'Index': {
				const array = this.value(expr.array)
				const key = this.value(expr.key)
				return this.compute(type, { array, key, kind: 'arrayGet' }, loc)
			}
			case 'IssetIndex': {
				const array = this.value(expr.array)
				const key = this.value(expr.key)
				return this.compute(BOOL, { array, key, kind: 'arrayHas' }, loc)
			}
			case 'IsNotNull': {
				const isNull = this.compute(BOOL, { kind: 'isNull', value: this.value(expr.expr) }, loc)
				return this.compute(BOOL, { kind: 'unary', op: 'not', operand: isNull }, loc)
			}
			case 'InstanceOf':
				return this.compute(BOOL, { className: expr.className, kind: 'instanceOf', value: this.value(expr.expr) }, loc)
			case 'Ternary':
				return this.ternary(expr.cond, expr.then, expr.else, type, loc)
			case 'Match':
				return this.match(expr)
			case 'Print': {
				this.block().insts.push({ kind: 'echo', loc, value: this.value(expr.expr) })
				return constOperand(intConst(1n), INT)
			}
		}
	}

	private logical(op: 'and' | 'or', left: TypedExpr, right: TypedExpr, loc: SourceLocation): Operand {
		const result = this.temp(BOOL)
		const first = this.value(left)
		this.assignVar(result, BOOL, first, loc)
		const rhs = this.newBlock()
		const join = this.newBlock()
		this.terminate(
			op === 'and'
				? { cond: first, else: join.id, kind: 'branch', loc, then: rhs.id }
				: { cond: first, else: rhs.id, kind: 'branch', loc, then: join.id }
		)
		this.current = rhs
		this.assignVar(result, BOOL, this.value(right), loc)
		this.jumpTo(join)
		this.current = join
		return varOperand(result, BOOL)
	}

	private ternary(cond: TypedExpr, then: TypedExpr, otherwise: TypedExpr, type: PhpType, loc: SourceLocation): Operand {
		const result = this.temp(type)
		const test = this.value(cond)
		const thenBlock = this.newBlock()
		const elseBlock = this.newBlock()
		const join = this.newBlock()
		this.terminate({ cond: test, else: elseBlock.id, kind: 'branch', loc, then: thenBlock.id })
		for (const [block, value] of [
			[thenBlock, then],
			[elseBlock, otherwise],
		] as const) {
			this.current = block
			this.assignVar(result, type, this.value(value), loc)
			this.jumpTo(join)
		}
		this.current = join
		return varOperand(result, type)
	}

	/**
	 * Identity tests in arm order. Without a default arm the chain ends in
	 * an UnmatchedPatternError unless the arms cover every value.
	 */
	private match(expr: TMatch): Operand {
		const { loc, type } = expr
		const subject = this.value(expr.subject)
		const result = this.temp(type)
		const join = this.newBlock()
		const pending: { block: MutableBlock; body: TypedExpr }[] = []
		for (const arm of expr.arms) {
			const body = this.newBlock()
			pending.push({ block: body, body: arm.body })
			if (arm.tests === null) {
				this.jumpTo(body)
				break
			}
			for (const test of arm.tests) {
				const cond = this.value(test)
				const next = this.newBlock()
				this.terminate({ cond, else: next.id, kind: 'branch', loc: test.loc, then: body.id })
				this.current = next
			}
		}
		if (this.current !== null) {
			if (expr.exhaustive) {
				this.terminate({ kind: 'unreachable' })
			} else {
				const boxed = this.coerce(subject, MIXED, loc)
				const repr = this.compute(STRING, { args: [boxed], kind: 'builtin', runtime: 'rt_debug_repr' }, loc)
				const prefix = constOperand(stringConst('Unhandled match case '), STRING)
				const message = this.compute(
					STRING,
					{ kind: 'binary', left: prefix, op: 'concat', operandType: STRING, right: repr },
					loc
				)
				this.throwNew(UNMATCHED_PATTERN, message, loc)
			}
		}
		for (const { block, body } of pending) {
			this.current = block
			this.assignVar(result, type, this.value(body), body.loc)
			this.jumpTo(join)
		}
		this.continueIn(join)
		return varOperand(result, type)
	}

	// ==========================================================================
	// Assignment
	// ==========================================================================

	private assign(target: TypedLValue, value: TypedExpr, loc: SourceLocation): Operand {
		if (target.kind === 'Local') {
			const operand = this.value(value)
			this.assignVar(target.name, target.type, operand, loc)
			return varOperand(target.name, target.type)
		}
		if (target.kind === 'Index') {
			const container = this.containerOf(target.base, loc)
			const key = target.key === null ? null : this.value(target.key)
			const operand = this.value(value)
			this.storeIndex(target, container, key, operand, loc)
			return operand
		}
		const object = this.value(target.object)
		const operand = this.value(value)
		this.storeMember(target, object, operand, loc)
		return operand
	}

	private storeMember(
		target: Extract<TypedLValue, { kind: 'Prop' | 'DynProp' }>,
		object: Operand,
		value: Operand,
		loc: SourceLocation
	): void {
		if (target.kind === 'Prop') {
			this.block().insts.push({
				className: target.className,
				kind: 'propSet',
				loc,
				name: target.name,
				object,
				slot: target.slot,
				value: this.coerce(value, target.type, loc),
			})
			return
		}
		const args = [object, constOperand(stringConst(target.name), STRING), this.coerce(value, MIXED, loc)]
		this.emit(null, VOID, { args, kind: 'builtin', runtime: 'rt_dyn_prop_set' }, loc)
	}

	/** Write `value` back to an assignable location */
	private store(target: TypedLValue, value: Operand, loc: SourceLocation): void {
		switch (target.kind) {
			case 'Local':
				this.assignVar(target.name, target.type, value, loc)
				return
			case 'Prop':
			case 'DynProp':
				this.storeMember(target, this.value(target.object), value, loc)
				return
			case 'Index': {
				const container = this.containerOf(target.base, loc)
				const key = target.key === null ? null : this.value(target.key)
				this.storeIndex(target, container, key, value, loc)
			}
		}
	}

	private storeIndex(
		target: Extract<TypedLValue, { kind: 'Index' }>,
		container: Operand,
		key: Operand | null,
		value: Operand,
		loc: SourceLocation
	): void {
		const element = this.coerce(value, target.arrayType.element, loc)
		const updated = this.compute(
			target.arrayType,
			key === null
				? { array: container, kind: 'arrayPush', value: element }
				: { array: container, key, kind: 'arraySet', value: element },
			loc
		)
		this.store(target.base, updated, loc)
	}

	private read(target: TypedLValue, loc: SourceLocation): Operand {
		switch (target.kind) {
			case 'Local':
				return varOperand(target.name, target.type)
			case 'Prop':
				return this.compute(
					target.type,
					{
						className: target.className,
						kind: 'propGet',
						name: target.name,
						object: this.value(target.object),
						slot: target.slot,
					},
					loc
				)
			case 'DynProp':
				return this.compute(MIXED, { kind: 'dynPropGet', name: target.name, object: this.value(target.object) }, loc)
			case 'Index': {
				// `$a[][...] = ...` writes into a new element
				if (target.key === null) return this.compute(target.type, { kind: 'arrayNew' }, loc)
				const container = this.containerOf(target.base, loc)
				return this.compute(target.type, { array: container, key: this.value(target.key), kind: 'arrayGet' }, loc)
			}
		}
	}

	/** Current array at `target`; null and untyped values become arrays */
	private containerOf(target: TypedLValue, loc: SourceLocation): Operand {
		const current = this.read(target, loc)
		if (current.type.kind === 'array') return current
		const boxed = this.coerce(current, MIXED, loc)
		const arrayType = target.kind === 'Index' && target.type.kind === 'array' ? target.type : ANY_ARRAY
		return this.compute(arrayType, { args: [boxed], kind: 'builtin', runtime: 'rt_autovivify' }, loc)
	}

	// ==========================================================================
	// Statements
	// ==========================================================================

	private statements(statements: readonly TypedStmt[]): void {
		let reported = false
		for (const stmt of statements) {
			if (this.current === null && !reported) {
				reported = true
				const key = `${stmt.loc.line}:${stmt.loc.column}`
				if (!this.warned.has(key)) {
					this.warned.add(key)
					this.context.emitAt('KLCFG050', stmt.loc)
				}
			}
			this.statement(stmt)
		}
	}

	private statement(stmt: TypedStmt): void {
		const { loc } = stmt
		switch (stmt.kind) {
			case 'Expr':
				this.effect(stmt.expr)
				return
			case 'Echo':
				for (const value of stmt.values) {
					const operand = this.value(value)
					this.block().insts.push({ kind: 'echo', loc, value: operand })
				}
				return
			case 'If': {
				const cond = this.value(stmt.cond)
				const thenBlock = this.newBlock()
				const elseBlock = stmt.else.length > 0 ? this.newBlock() : null
				const join = this.newBlock()
				this.terminate({ cond, else: (elseBlock ?? join).id, kind: 'branch', loc: stmt.cond.loc, then: thenBlock.id })
				this.current = thenBlock
				this.statements(stmt.then)
				this.jumpTo(join)
				if (elseBlock !== null) {
					this.current = elseBlock
					this.statements(stmt.else)
					this.jumpTo(join)
				}
				this.continueIn(join)
				return
			}
			case 'While': {
				const header = this.newBlock()
				this.jumpTo(header)
				this.current = header
				const cond = this.value(stmt.cond)
				const body = this.newBlock()
				const exit = this.newBlock()
				this.terminate({ cond, else: exit.id, kind: 'branch', loc: stmt.cond.loc, then: body.id })
				this.current = body
				this.loop(exit, header, stmt.body)
				this.jumpTo(header)
				this.continueIn(exit)
				return
			}
			case 'DoWhile': {
				const body = this.newBlock()
				const test = this.newBlock()
				const exit = this.newBlock()
				this.jumpTo(body)
				this.current = body
				this.loop(exit, test, stmt.body)
				this.jumpTo(test)
				this.current = test
				const cond = this.value(stmt.cond)
				this.terminate({ cond, else: exit.id, kind: 'branch', loc: stmt.cond.loc, then: body.id })
				this.continueIn(exit)
				return
			}
			case 'For': {
				for (const init of stmt.init) this.effect(init)
				const header = this.newBlock()
				const body = this.newBlock()
				const step = this.newBlock()
				const exit = this.newBlock()
				this.jumpTo(header)
				this.current = header
				const tests = stmt.cond
				for (const effect of tests.slice(0, -1)) this.effect(effect)
				const last = tests[tests.length - 1]
				if (last === undefined) {
					this.jumpTo(body)
				} else {
					this.terminate({ cond: this.value(last), else: exit.id, kind: 'branch', loc: last.loc, then: body.id })
				}
				this.current = body
				this.loop(exit, step, stmt.body)
				this.jumpTo(step)
				this.current = step
				for (const update of stmt.update) this.effect(update)
				this.jumpTo(header)
				this.continueIn(exit)
				return
			}
			case 'Foreach':
				this.foreach(stmt)
				return
			case 'Switch':
				this.switch(stmt.cases)
				return
			case 'Try':
				this.try(stmt.body, stmt.catches, stmt.finally, loc)
				return
			case 'Return':
				this.return(stmt.value, loc)
				return
			case 'Break':
			case 'Continue':
				this.jump(stmt.kind, stmt.depth)
				return
			case 'Throw':
				this.throwValue(this.value(stmt.value), loc)
				return
			case 'Unset':
				this.unset(stmt.target, loc)
				return
			case 'Require':
				this.emit(
					null,
					VOID,
					{ args: [constOperand(stringConst(stmt.unit), STRING)], kind: 'builtin', runtime: 'rt_require' },
					loc
				)
				return
		}
	}

	private loop(breakTarget: MutableBlock, continueTarget: MutableBlock, body: readonly TypedStmt[]): void {
		this.loops.push({ breakTarget: breakTarget.id, cleanupDepth: this.cleanups.length, continueTarget: continueTarget.id })
		try {
			this.statements(body)
		} finally {
			this.loops.pop()
		}
	}

	/**
	 * The array is read once into a snapshot; the loop walks the snapshot's
	 * positions, so writes to the source array inside the body do not
	 * change the iterations.
	 */
	private foreach(stmt: Extract<TypedStmt, { kind: 'Foreach' }>): void {
		const { arrayType, loc } = stmt
		const subject = this.value(stmt.subject)
		const snapshot = this.temp(arrayType)
		this.emit(snapshot, arrayType, { kind: 'use', value: subject }, loc)
		const array = varOperand(snapshot, arrayType)
		const count = this.compute(INT, { array, kind: 'arrayCount' }, loc)
		const position = this.temp(INT)
		this.emit(position, INT, { kind: 'use', value: constOperand(intConst(0n), INT) }, loc)
		const index = varOperand(position, INT)

		const header = this.newBlock()
		const body = this.newBlock()
		const step = this.newBlock()
		const exit = this.newBlock()
		this.jumpTo(header)
		this.current = header
		const more = this.compute(BOOL, { kind: 'binary', left: index, op: 'lt', operandType: INT, right: count }, loc)
		this.terminate({ cond: more, else: exit.id, kind: 'branch', loc, then: body.id })

		this.current = body
		if (stmt.key !== null) {
			const keyType = arrayType.key.kind === 'never' ? INT : arrayType.key
			this.bind(stmt.key, this.compute(keyType, { array, index, kind: 'arrayKeyAt' }, loc), loc)
		}
		const element = this.compute(settle(arrayType.element), { array, index, kind: 'arrayValueAt' }, loc)
		this.bind(stmt.value, element, loc)
		this.loop(exit, step, stmt.body)
		this.jumpTo(step)

		this.current = step
		this.emit(
			position,
			INT,
			{ kind: 'binary', left: index, op: 'add', operandType: INT, right: constOperand(intConst(1n), INT) },
			loc
		)
		this.jumpTo(header)
		this.continueIn(exit)
	}

	private bind(variable: TypedVar, value: Operand, loc: SourceLocation): void {
		this.assignVar(variable.name, variable.type, value, loc)
	}

	/**
	 * Case tests run in order; the first match enters its body, which falls
	 * through into the next body unless it breaks. With no match control
	 * goes to `default`, or past the switch.
	 */
	private switch(cases: Extract<TypedStmt, { kind: 'Switch' }>['cases']): void {
		const exit = this.newBlock()
		const bodies = cases.map(() => this.newBlock())
		for (const [i, c] of cases.entries()) {
			const body = bodies[i]
			if (c.test === null || body === undefined) continue
			const cond = this.value(c.test)
			const next = this.newBlock()
			this.terminate({ cond, else: next.id, kind: 'branch', loc: c.loc, then: body.id })
			this.current = next
		}
		const fallback = bodies[cases.findIndex((c) => c.test === null)]
		this.jumpTo(fallback ?? exit)
		for (const [i, c] of cases.entries()) {
			const body = bodies[i]
			if (body === undefined) continue
			this.current = body
			this.loop(exit, exit, c.body)
			this.jumpTo(bodies[i + 1] ?? exit)
		}
		this.continueIn(exit)
	}

	// ==========================================================================
	// Exceptions and Exits
	// ==========================================================================

	/**
	 * Copy a `finally` body at the current position. It runs under the
	 * handler, loops and cleanups in effect around its `try`.
	 */
	private runFinally(scope: FinallyScope): void {
		const saved = { cleanups: this.cleanups, handler: this.handler, loops: this.loops }
		this.handler = scope.handler
		this.cleanups = this.cleanups.slice(0, scope.cleanupDepth)
		this.loops = this.loops.slice(0, scope.loopDepth)
		try {
			this.statements(scope.body)
		} finally {
			this.cleanups = saved.cleanups
			this.handler = saved.handler
			this.loops = saved.loops
		}
	}

	/** Run `body` under `handler` with `scope` pending */
	private protect(handler: Handler | null, scope: FinallyScope | null, body: readonly TypedStmt[]): void {
		const outer = this.handler
		this.handler = handler
		if (scope !== null) this.cleanups.push(scope)
		try {
			this.statements(body)
		} finally {
			if (scope !== null) this.cleanups.pop()
			this.handler = outer
		}
	}

	private try(
		body: readonly TypedStmt[],
		catches: readonly TypedCatch[],
		cleanup: readonly TypedStmt[] | null,
		loc: SourceLocation
	): void {
		const outer = this.handler
		const join = this.newBlock()
		const dispatch = this.newBlock()
		const caught = this.temp(objectOf(THROWABLE))
		const scope: FinallyScope | null =
			cleanup === null
				? null
				: { body: cleanup, cleanupDepth: this.cleanups.length, handler: outer, loopDepth: this.loops.length }
		const rethrowBlock = scope === null ? null : this.newBlock()
		const pending = scope === null ? null : this.temp(objectOf(THROWABLE))
		const rethrow: Handler | null =
			rethrowBlock === null || pending === null ? null : { dispatch: rethrowBlock.id, exception: pending }

		const leave = () => {
			if (this.current === null) return
			if (scope !== null) this.runFinally(scope)
			this.jumpTo(join)
		}

		this.protect({ dispatch: dispatch.id, exception: caught }, scope, body)
		leave()

		// Exceptions from the try body: test each clause, most specific first
		this.current = dispatch
		const exception = varOperand(caught, objectOf(THROWABLE))
		const clauses: { block: MutableBlock; clause: TypedCatch }[] = []
		for (const clause of catches) {
			const block = this.newBlock()
			clauses.push({ block, clause })
			for (const className of clause.classes) {
				const matches = this.compute(BOOL, { className, kind: 'instanceOf', value: exception }, clause.loc)
				const next = this.newBlock()
				this.terminate({ cond: matches, else: next.id, kind: 'branch', loc: clause.loc, then: block.id })
				this.current = next
			}
		}
		if (rethrow !== null && rethrowBlock !== null) {
			this.emit(rethrow.exception, objectOf(THROWABLE), { kind: 'use', value: exception }, loc)
			this.jumpTo(rethrowBlock)
		} else {
			this.throwValue(exception, loc)
		}

		for (const { block, clause } of clauses) {
			this.current = block
			if (clause.variable !== null) this.bind(clause.variable, exception, clause.loc)
			this.protect(rethrow ?? outer, scope, clause.body)
			leave()
		}

		// Exceptions from catch bodies, and unmatched ones: run the finally
		// body, then rethrow the same object
		if (scope !== null && rethrow !== null && rethrowBlock !== null) {
			this.current = rethrowBlock
			this.runFinally(scope)
			if (this.current !== null) this.throwValue(varOperand(rethrow.exception, objectOf(THROWABLE)), loc)
		}
		this.continueIn(join)
	}

	private return(value: TypedExpr | null, loc: SourceLocation): void {
		let operand = value === null ? null : this.value(value)
		if (operand !== null && operand.kind === 'var' && this.cleanups.length > 0) {
			// finally bodies may reassign the returned variable
			const held = this.temp(operand.type)
			this.emit(held, operand.type, { kind: 'use', value: operand }, loc)
			operand = varOperand(held, operand.type)
		}
		for (const scope of [...this.cleanups].reverse()) {
			this.runFinally(scope)
			if (this.current === null) return
		}
		this.terminate({ kind: 'return', loc, value: operand })
	}

	private jump(kind: 'Break' | 'Continue', depth: number): void {
		const frame = this.loops[this.loops.length - depth]
		if (frame === undefined) throw new InternalCompilerError('normalize', `${kind.toLowerCase()} ${depth} has no target`)
		for (const scope of this.cleanups.slice(frame.cleanupDepth).reverse()) {
			this.runFinally(scope)
			if (this.current === null) return
		}
		this.terminate({ kind: 'jump', target: kind === 'Break' ? frame.breakTarget : frame.continueTarget })
	}

	private unset(target: TypedLValue, loc: SourceLocation): void {
		if (target.kind !== 'Index' || target.key === null) {
			throw new InternalCompilerError('normalize', 'unset target is not an array element')
		}
		const current = this.read(target.base, loc)
		const key = this.value(target.key)
		if (current.type.kind === 'array') {
			const updated = this.compute(current.type, { array: current, key, kind: 'arrayUnset' }, loc)
			this.store(target.base, updated, loc)
			return
		}
		const args = [this.coerce(current, MIXED, loc), this.coerce(key, MIXED, loc)]
		const updated = this.compute(MIXED, { args, kind: 'builtin', runtime: 'rt_mixed_unset' }, loc)
		this.store(target.base, updated, loc)
	}
}

// ============================================================================
// Pruning
// ============================================================================

function retarget(terminator: CfgTerminator, map: (id: BlockId) => BlockId): CfgTerminator {
	switch (terminator.kind) {
		case 'jump':
			return { kind: 'jump', target: map(terminator.target) }
		case 'branch':
			return { ...terminator, else: map(terminator.else), then: map(terminator.then) }
		case 'invoke':
			return { ...terminator, normal: map(terminator.normal), unwind: map(terminator.unwind) }
		case 'throw':
			return { ...terminator, unwind: terminator.unwind === null ? null : map(terminator.unwind) }
		case 'return':
		case 'unreachable':
			return terminator
	}
}

/**
 * Drop blocks the entry cannot reach and number the rest densely in
 * creation order.
 */
export function pruneUnreachable(
	blocks: readonly { id: BlockId; insts: readonly CfgInst[]; terminator: CfgTerminator }[]
): CfgBlock[] {
	const byId = new Map(blocks.map((block) => [block.id, block]))
	const reached = new Set<BlockId>()
	const first = blocks[0]
	const stack = first === undefined ? [] : [first.id]
	while (stack.length > 0) {
		const id = stack.pop()
		if (id === undefined || reached.has(id)) continue
		reached.add(id)
		const block = byId.get(id)
		if (block !== undefined) for (const edge of successors(block.terminator)) stack.push(edge.target)
	}
	const kept = blocks.filter((block) => reached.has(block.id))
	const renumber = new Map(kept.map((block, i) => [block.id, blockId(i)]))
	const map = (id: BlockId): BlockId => {
		const next = renumber.get(id)
		if (next === undefined) throw new InternalCompilerError('normalize', `edge to pruned block ${id}`)
		return next
	}
	const renumbered = kept.map((block) => ({
		id: map(block.id),
		insts: block.insts,
		terminator: retarget(block.terminator, map),
	}))
	const preds = computePreds(renumbered)
	return renumbered.map((block) => ({ ...block, preds: preds.get(block.id) ?? [] }))
}

/**
 * Normalize one checked function.
 */
export function normalizeFunction(fn: TypedFunction, symbols: SymbolTable, context: CompilationContext): CfgFunction {
	return new FunctionNormalizer(fn, symbols, context).run()
}

/**
 * Normalize every function of a resolved unit. Reports unreachable code
 * as KLCFG050 warnings.
 */
export function normalize(resolved: ResolvedUnit, context: CompilationContext): CfgUnit {
	return {
		file: resolved.file,
		functions: resolved.functions.map((fn) => normalizeFunction(fn, resolved.symbols, context)),
		unit: resolved.symbols.unit,
	}
}
