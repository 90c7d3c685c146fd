/**
 * Resolved, typed tree produced by the checker.
 *
 * Every expression carries its static type; implicit conversions are
 * explicit `Convert` nodes and names are bound to symbols. Values the
 * source reads more than once (`match` subjects, compound assignment
 * targets, postfix `++`) are held in compiler temporaries whose names
 * start with `%`.
 */

import type { SourceLocation } from '../core/location.ts'
import type { ClassSymbol, FunctionSymbol, SymbolTable } from './symbols.ts'
import type { ArrayType, PhpType } from './types.ts'
import type { ConstValue } from './values.ts'

interface TypedBase {
	readonly type: PhpType
	readonly loc: SourceLocation
}

/**
 * Operators after typing. Arithmetic and comparison operators apply to
 * the operand type recorded on the node.
 */
export type TypedBinaryOp =
	| 'add'
	| 'sub'
	| 'mul'
	| 'div'
	| 'mod'
	| 'pow'
	| 'concat'
	| 'eq'
	| 'ne'
	| 'lt'
	| 'le'
	| 'gt'
	| 'ge'
	| 'cmp'
	| 'identical'
	| 'notIdentical'
	| 'bitAnd'
	| 'bitOr'
	| 'bitXor'
	| 'shl'
	| 'shr'

export type TypedUnaryOp = 'not' | 'neg' | 'bitNot'

export interface TConst extends TypedBase {
	readonly kind: 'Const'
	readonly value: ConstValue
}

export interface TLocal extends TypedBase {
	readonly kind: 'Local'
	readonly name: string
}

/** Evaluates `effects` in order, then yields `result` */
export interface TSeq extends TypedBase {
	readonly kind: 'Seq'
	readonly effects: readonly TypedExpr[]
	readonly result: TypedExpr
}

export interface TBinary extends TypedBase {
	readonly kind: 'Binary'
	readonly op: TypedBinaryOp
	readonly operandType: PhpType
	readonly left: TypedExpr
	readonly right: TypedExpr
}

export interface TLogical extends TypedBase {
	readonly kind: 'Logical'
	readonly op: 'and' | 'or'
	readonly left: TypedExpr
	readonly right: TypedExpr
}

export interface TUnary extends TypedBase {
	readonly kind: 'Unary'
	readonly op: TypedUnaryOp
	readonly operand: TypedExpr
}

export interface TConvert extends TypedBase {
	readonly kind: 'Convert'
	/** `cast` for explicit `(int)` style casts, which coerce leniently */
	readonly mode: 'implicit' | 'cast'
	readonly expr: TypedExpr
}

export interface TAssign extends TypedBase {
	readonly kind: 'Assign'
	readonly target: TypedLValue
	readonly value: TypedExpr
}

export interface TCall extends TypedBase {
	readonly kind: 'Call'
	readonly callee: string
	readonly args: readonly TypedExpr[]
}

export interface TBuiltin extends TypedBase {
	readonly kind: 'Builtin'
	readonly name: string
	readonly runtime: string
	readonly args: readonly TypedExpr[]
}

export interface TNew extends TypedBase {
	readonly kind: 'New'
	readonly className: string
	/** Mangled constructor, inherited or own; `null` when there is none */
	readonly constructor: string | null
	readonly args: readonly TypedExpr[]
}

export interface TMethodCall extends TypedBase {
	readonly kind: 'MethodCall'
	readonly object: TypedExpr
	readonly className: string
	readonly method: string
	/**
	 * `static` calls go straight to the mangled `target`; `virtual` ones load
	 * the vtable slot of method `target`; `interface` ones look the method up
	 * by name on the receiver's class
	 */
	readonly dispatch: 'static' | 'virtual' | 'interface'
	readonly target: string
	readonly args: readonly TypedExpr[]
}

/** `parent::f()`, `self::f()`, `Foo::f()`: always statically bound */
export interface TStaticCall extends TypedBase {
	readonly kind: 'StaticCall'
	readonly callee: string
	readonly thisArg: TypedExpr | null
	readonly args: readonly TypedExpr[]
}

export interface TDynMethodCall extends TypedBase {
	readonly kind: 'DynMethodCall'
	readonly object: TypedExpr
	readonly method: string
	readonly args: readonly TypedExpr[]
}

export interface TPropGet extends TypedBase {
	readonly kind: 'PropGet'
	readonly object: TypedExpr
	readonly className: string
	readonly name: string
	readonly slot: number
}

export interface TDynPropGet extends TypedBase {
	readonly kind: 'DynPropGet'
	readonly object: TypedExpr
	readonly name: string
}

export interface TArrayItem {
	readonly key: TypedExpr | null
	readonly value: TypedExpr
}

export interface TArrayLiteral extends TypedBase {
	readonly kind: 'ArrayLiteral'
	readonly items: readonly TArrayItem[]
}

export interface TIndex extends TypedBase {
	readonly kind: 'Index'
	readonly array: TypedExpr
	readonly key: TypedExpr
	readonly arrayType: ArrayType
}

/** `isset($a[$k])`: key present and value not null */
export interface TIssetIndex extends TypedBase {
	readonly kind: 'IssetIndex'
	readonly array: TypedExpr
	readonly key: TypedExpr
	readonly arrayType: ArrayType
}

export interface TIsNotNull extends TypedBase {
	readonly kind: 'IsNotNull'
	readonly expr: TypedExpr
}

export interface TInstanceOf extends TypedBase {
	readonly kind: 'InstanceOf'
	readonly expr: TypedExpr
	readonly className: string
}

export interface TTernary extends TypedBase {
	readonly kind: 'Ternary'
	readonly cond: TypedExpr
	readonly then: TypedExpr
	readonly else: TypedExpr
}

export interface TMatchArm {
	/** Identity tests against the subject temporary; `null` for `default` */
	readonly tests: readonly TypedExpr[] | null
	readonly body: TypedExpr
}

export interface TMatch extends TypedBase {
	readonly kind: 'Match'
	/** Temporary or local holding the subject */
	readonly subject: TypedExpr
	readonly arms: readonly TMatchArm[]
	/** No runtime failure path is needed */
	readonly exhaustive: boolean
}

export interface TPrint extends TypedBase {
	readonly kind: 'Print'
	readonly expr: TypedExpr
}

export type TypedExpr =
	| TConst
	| TLocal
	| TSeq
	| TBinary
	| TLogical
	| TUnary
	| TConvert
	| TAssign
	| TCall
	| TBuiltin
	| TNew
	| TMethodCall
	| TStaticCall
	| TDynMethodCall
	| TPropGet
	| TDynPropGet
	| TArrayLiteral
	| TIndex
	| TIssetIndex
	| TIsNotNull
	| TInstanceOf
	| TTernary
	| TMatch
	| TPrint

// =============================================================================
// ASSIGNMENT TARGETS
// =============================================================================

export type TypedLValue =
	| { readonly kind: 'Local'; readonly name: string; readonly type: PhpType; readonly loc: SourceLocation }
	| {
			readonly kind: 'Prop'
			readonly object: TypedExpr
			readonly className: string
			readonly name: string
			readonly slot: number
			readonly type: PhpType
			readonly loc: SourceLocation
	  }
	| {
			readonly kind: 'DynProp'
			readonly object: TypedExpr
			readonly name: string
			readonly type: PhpType
			readonly loc: SourceLocation
	  }
	| {
			readonly kind: 'Index'
			readonly base: TypedLValue
			/** `null` appends */
			readonly key: TypedExpr | null
			readonly arrayType: ArrayType
			readonly type: PhpType
			readonly loc: SourceLocation
	  }

// =============================================================================
// STATEMENTS
// =============================================================================

interface StmtBase {
	readonly loc: SourceLocation
}

export interface TypedVar {
	readonly name: string
	readonly type: PhpType
}

export interface TypedCase {
	/** Loose-equality test against the subject temporary; `null` for `default` */
	readonly test: TypedExpr | null
	readonly body: readonly TypedStmt[]
	readonly loc: SourceLocation
}

export interface TypedCatch {
	/** Caught classes, most specific first */
	readonly classes: readonly string[]
	readonly variable: TypedVar | null
	readonly body: readonly TypedStmt[]
	readonly loc: SourceLocation
}

export type TypedStmt =
	| (StmtBase & { readonly kind: 'Expr'; readonly expr: TypedExpr })
	| (StmtBase & { readonly kind: 'Echo'; readonly values: readonly TypedExpr[] })
	| (StmtBase & {
			readonly kind: 'If'
			readonly cond: TypedExpr
			readonly then: readonly TypedStmt[]
			readonly else: readonly TypedStmt[]
	  })
	| (StmtBase & { readonly kind: 'While'; readonly cond: TypedExpr; readonly body: readonly TypedStmt[] })
	| (StmtBase & { readonly kind: 'DoWhile'; readonly body: readonly TypedStmt[]; readonly cond: TypedExpr })
	| (StmtBase & {
			readonly kind: 'For'
			readonly init: readonly TypedExpr[]
			/** All but the last are evaluated for effect; the last is the test */
			readonly cond: readonly TypedExpr[]
			readonly update: readonly TypedExpr[]
			readonly body: readonly TypedStmt[]
	  })
	| (StmtBase & {
			readonly kind: 'Foreach'
			readonly subject: TypedExpr
			readonly arrayType: ArrayType
			readonly key: TypedVar | null
			readonly value: TypedVar
			readonly body: readonly TypedStmt[]
	  })
	| (StmtBase & {
			readonly kind: 'Switch'
			readonly cases: readonly TypedCase[]
	  })
	| (StmtBase & {
			readonly kind: 'Try'
			readonly body: readonly TypedStmt[]
			readonly catches: readonly TypedCatch[]
			readonly finally: readonly TypedStmt[] | null
	  })
	| (StmtBase & { readonly kind: 'Return'; readonly value: TypedExpr | null })
	| (StmtBase & { readonly kind: 'Break'; readonly depth: number })
	| (StmtBase & { readonly kind: 'Continue'; readonly depth: number })
	| (StmtBase & { readonly kind: 'Throw'; readonly value: TypedExpr })
	| (StmtBase & { readonly kind: 'Unset'; readonly target: TypedLValue })
	| (StmtBase & { readonly kind: 'Require'; readonly unit: string })

// =============================================================================
// FUNCTIONS AND UNITS
// =============================================================================

export interface TypedFunction {
	/** Mangled name of the lowered function */
	readonly name: string
	readonly unit: string
	readonly loc: SourceLocation
	readonly params: readonly TypedVar[]
	readonly returnType: PhpType
	/** Every local, parameters included, with its inferred or declared type */
	readonly locals: ReadonlyMap<string, PhpType>
	readonly body: readonly TypedStmt[]
	/** Class of `$this` for instance methods */
	readonly thisClass: string | null
}

export interface ResolvedUnit {
	readonly file: string
	readonly symbols: SymbolTable
	/** Top-level code first, then functions, then methods */
	readonly functions: readonly TypedFunction[]
	readonly classes: readonly ClassSymbol[]
	readonly externs: readonly FunctionSymbol[]
	readonly requires: readonly string[]
}

/** Name of the function holding a unit's top-level code */
export function unitMainName(unit: string): string {
	return `__main@${unit}`
}

/** Unit name of a source path: its file name without `.php` */
export function unitNameOf(path: string): string {
	const base = path.split(/[\\/]/).pop() ?? path
	return base.replace(/\.php$/i, '')
}
