/**
 * Syntax tree for the PHP subset.
 *
 * Nodes are plain immutable records tagged by `kind`. The front-end
 * builds them once; the resolver reads them and never writes back.
 */

import type { SourceLocation } from './location.ts'

interface NodeBase {
	readonly loc: SourceLocation
}

export type Visibility = 'public' | 'protected' | 'private'

/**
 * A declared type: one or more class/builtin names, optionally nullable.
 * `?int` is `{ names: ['int'], nullable: true }`; `int|string` has two names.
 */
export interface TypeHint extends NodeBase {
	readonly kind: 'TypeHint'
	readonly names: readonly string[]
	readonly nullable: boolean
}

export interface Attribute extends NodeBase {
	readonly kind: 'Attribute'
	readonly name: string
	readonly args: readonly Expr[]
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export type BinaryOperator =
	| '+'
	| '-'
	| '*'
	| '/'
	| '%'
	| '**'
	| '.'
	| '=='
	| '!='
	| '==='
	| '!=='
	| '<'
	| '<='
	| '>'
	| '>='
	| '<=>'
	| '&&'
	| '||'
	| '??'
	| '&'
	| '|'
	| '^'
	| '<<'
	| '>>'

export type UnaryOperator = '!' | '-' | '+' | '~'

export type AssignOperator =
	| '='
	| '+='
	| '-='
	| '*='
	| '/='
	| '.='
	| '%='
	| '**='
	| '??='
	| '|='
	| '&='
	| '^='
	| '<<='
	| '>>='

export type CastType = 'int' | 'float' | 'string' | 'bool' | 'array'

export interface IntLiteral extends NodeBase {
	readonly kind: 'IntLiteral'
	readonly value: bigint
}

export interface FloatLiteral extends NodeBase {
	readonly kind: 'FloatLiteral'
	readonly value: number
}

export interface StringLiteral extends NodeBase {
	readonly kind: 'StringLiteral'
	readonly value: string
}

/** Double-quoted string with `$var` or `{$expr}` parts */
export interface InterpolatedString extends NodeBase {
	readonly kind: 'InterpolatedString'
	readonly parts: readonly (string | Expr)[]
}

export interface BoolLiteral extends NodeBase {
	readonly kind: 'BoolLiteral'
	readonly value: boolean
}

export interface NullLiteral extends NodeBase {
	readonly kind: 'NullLiteral'
}

export interface ArrayItem extends NodeBase {
	readonly key: Expr | null
	readonly value: Expr
}

export interface ArrayLiteral extends NodeBase {
	readonly kind: 'ArrayLiteral'
	readonly items: readonly ArrayItem[]
}

export interface Variable extends NodeBase {
	readonly kind: 'Variable'
	readonly name: string
}

/** A bare name: `PHP_EOL`, `true`, a user constant */
export interface ConstFetch extends NodeBase {
	readonly kind: 'ConstFetch'
	readonly name: string
}

export interface ClassConstFetch extends NodeBase {
	readonly kind: 'ClassConstFetch'
	readonly className: string
	readonly name: string
}

export interface Binary extends NodeBase {
	readonly kind: 'Binary'
	readonly op: BinaryOperator
	readonly left: Expr
	readonly right: Expr
}

export interface Unary extends NodeBase {
	readonly kind: 'Unary'
	readonly op: UnaryOperator
	readonly operand: Expr
}

export interface IncDec extends NodeBase {
	readonly kind: 'IncDec'
	readonly op: '++' | '--'
	readonly prefix: boolean
	readonly target: Expr
}

export interface Assign extends NodeBase {
	readonly kind: 'Assign'
	readonly op: AssignOperator
	readonly target: Expr
	readonly value: Expr
}

export interface Ternary extends NodeBase {
	readonly kind: 'Ternary'
	readonly cond: Expr
	/** `null` for the short form `a ?: b` */
	readonly then: Expr | null
	readonly else: Expr
}

export interface Call extends NodeBase {
	readonly kind: 'Call'
	readonly name: string
	readonly args: readonly Expr[]
}

export interface MethodCall extends NodeBase {
	readonly kind: 'MethodCall'
	readonly object: Expr
	readonly method: string
	readonly args: readonly Expr[]
}

/** `Foo::bar()`, `parent::bar()`, `self::bar()`, `static::bar()` */
export interface StaticCall extends NodeBase {
	readonly kind: 'StaticCall'
	readonly className: string
	readonly method: string
	readonly args: readonly Expr[]
}

export interface PropertyFetch extends NodeBase {
	readonly kind: 'PropertyFetch'
	readonly object: Expr
	readonly name: string
}

/** `$a[$k]`; `index` is null for the append form `$a[] = ...` */
export interface Index extends NodeBase {
	readonly kind: 'Index'
	readonly array: Expr
	readonly index: Expr | null
}

export interface New extends NodeBase {
	readonly kind: 'New'
	readonly className: string
	readonly args: readonly Expr[]
}

export interface InstanceOf extends NodeBase {
	readonly kind: 'InstanceOf'
	readonly expr: Expr
	readonly className: string
}

export interface Cast extends NodeBase {
	readonly kind: 'Cast'
	readonly to: CastType
	readonly expr: Expr
}

export interface MatchArm extends NodeBase {
	/** `null` marks the `default` arm */
	readonly conditions: readonly Expr[] | null
	readonly body: Expr
}

export interface Match extends NodeBase {
	readonly kind: 'Match'
	readonly subject: Expr
	readonly arms: readonly MatchArm[]
}

export interface Isset extends NodeBase {
	readonly kind: 'Isset'
	readonly targets: readonly Expr[]
}

export interface Empty extends NodeBase {
	readonly kind: 'Empty'
	readonly expr: Expr
}

export interface Print extends NodeBase {
	readonly kind: 'Print'
	readonly expr: Expr
}

/**
 * Syntax the front-end recognises only so the resolver can reject it
 * with a precise message (`$$name`, closures, `eval`, ...).
 */
export interface UnsupportedExpr extends NodeBase {
	readonly kind: 'UnsupportedExpr'
	readonly construct: string
}

export type Expr =
	| IntLiteral
	| FloatLiteral
	| StringLiteral
	| InterpolatedString
	| BoolLiteral
	| NullLiteral
	| ArrayLiteral
	| Variable
	| ConstFetch
	| ClassConstFetch
	| Binary
	| Unary
	| IncDec
	| Assign
	| Ternary
	| Call
	| MethodCall
	| StaticCall
	| PropertyFetch
	| Index
	| New
	| InstanceOf
	| Cast
	| Match
	| Isset
	| Empty
	| Print
	| UnsupportedExpr

// =============================================================================
// STATEMENTS
// =============================================================================

export interface ExpressionStatement extends NodeBase {
	readonly kind: 'ExpressionStatement'
	readonly expr: Expr
}

export interface Echo extends NodeBase {
	readonly kind: 'Echo'
	readonly exprs: readonly Expr[]
}

export interface ElseIf extends NodeBase {
	readonly cond: Expr
	readonly body: readonly Stmt[]
}

export interface If extends NodeBase {
	readonly kind: 'If'
	readonly cond: Expr
	readonly then: readonly Stmt[]
	readonly elseIfs: readonly ElseIf[]
	readonly else: readonly Stmt[] | null
}

export interface While extends NodeBase {
	readonly kind: 'While'
	readonly cond: Expr
	readonly body: readonly Stmt[]
}

export interface DoWhile extends NodeBase {
	readonly kind: 'DoWhile'
	readonly body: readonly Stmt[]
	readonly cond: Expr
}

export interface For extends NodeBase {
	readonly kind: 'For'
	readonly init: readonly Expr[]
	readonly cond: readonly Expr[]
	readonly update: readonly Expr[]
	readonly body: readonly Stmt[]
}

export interface Foreach extends NodeBase {
	readonly kind: 'Foreach'
	readonly subject: Expr
	readonly key: string | null
	readonly value: string
	readonly byRef: boolean
	readonly body: readonly Stmt[]
}

export interface SwitchCase extends NodeBase {
	/** `null` marks the `default` case */
	readonly test: Expr | null
	readonly body: readonly Stmt[]
}

export interface Switch extends NodeBase {
	readonly kind: 'Switch'
	readonly subject: Expr
	readonly cases: readonly SwitchCase[]
}

export interface CatchClause extends NodeBase {
	readonly types: readonly string[]
	readonly variable: string | null
	readonly body: readonly Stmt[]
}

export interface Try extends NodeBase {
	readonly kind: 'Try'
	readonly body: readonly Stmt[]
	readonly catches: readonly CatchClause[]
	readonly finally: readonly Stmt[] | null
}

export interface Return extends NodeBase {
	readonly kind: 'Return'
	readonly value: Expr | null
}

export interface Break extends NodeBase {
	readonly kind: 'Break'
	readonly depth: number
}

export interface Continue extends NodeBase {
	readonly kind: 'Continue'
	readonly depth: number
}

export interface Throw extends NodeBase {
	readonly kind: 'Throw'
	readonly value: Expr
}

export interface Block extends NodeBase {
	readonly kind: 'Block'
	readonly body: readonly Stmt[]
}

export interface Unset extends NodeBase {
	readonly kind: 'Unset'
	readonly targets: readonly Expr[]
}

/** `require_once 'lib.php';` with a literal path */
export interface Require extends NodeBase {
	readonly kind: 'Require'
	readonly path: string
}

export interface Nop extends NodeBase {
	readonly kind: 'Nop'
}

export interface UnsupportedStatement extends NodeBase {
	readonly kind: 'UnsupportedStatement'
	readonly construct: string
}

export type Stmt =
	| ExpressionStatement
	| Echo
	| If
	| While
	| DoWhile
	| For
	| Foreach
	| Switch
	| Try
	| Return
	| Break
	| Continue
	| Throw
	| Block
	| Unset
	| Require
	| Nop
	| UnsupportedStatement
	| FunctionDecl
	| ClassDecl
	| InterfaceDecl

// =============================================================================
// DECLARATIONS
// =============================================================================

export interface Param extends NodeBase {
	readonly name: string
	readonly type: TypeHint | null
	readonly default: Expr | null
	readonly byRef: boolean
	readonly variadic: boolean
}

export interface FunctionDecl extends NodeBase {
	readonly kind: 'FunctionDecl'
	readonly name: string
	readonly params: readonly Param[]
	readonly returnType: TypeHint | null
	/** `null` for body-less (foreign) declarations */
	readonly body: readonly Stmt[] | null
	readonly attributes: readonly Attribute[]
}

export interface MethodDecl extends NodeBase {
	readonly kind: 'MethodDecl'
	readonly name: string
	readonly params: readonly Param[]
	readonly returnType: TypeHint | null
	readonly body: readonly Stmt[] | null
	readonly visibility: Visibility
	readonly isStatic: boolean
	readonly isFinal: boolean
	readonly isAbstract: boolean
	readonly attributes: readonly Attribute[]
}

export interface PropertyDecl extends NodeBase {
	readonly kind: 'PropertyDecl'
	readonly name: string
	readonly type: TypeHint | null
	readonly default: Expr | null
	readonly visibility: Visibility
	readonly isStatic: boolean
	readonly isReadonly: boolean
}

export interface ConstDecl extends NodeBase {
	readonly kind: 'ConstDecl'
	readonly name: string
	readonly value: Expr
	readonly visibility: Visibility
}

export interface ClassDecl extends NodeBase {
	readonly kind: 'ClassDecl'
	readonly name: string
	readonly parent: string | null
	readonly interfaces: readonly string[]
	readonly isAbstract: boolean
	readonly isFinal: boolean
	readonly constants: readonly ConstDecl[]
	readonly properties: readonly PropertyDecl[]
	readonly methods: readonly MethodDecl[]
	readonly attributes: readonly Attribute[]
	/** Names from `use Trait;` members; traits are rejected by the resolver */
	readonly traits: readonly string[]
}

export interface InterfaceDecl extends NodeBase {
	readonly kind: 'InterfaceDecl'
	readonly name: string
	readonly parents: readonly string[]
	readonly constants: readonly ConstDecl[]
	readonly methods: readonly MethodDecl[]
}

export type Declaration = FunctionDecl | ClassDecl | InterfaceDecl

/**
 * One parsed translation unit.
 */
export interface Program extends NodeBase {
	readonly kind: 'Program'
	readonly file: string
	readonly statements: readonly Stmt[]
}

export function isDeclaration(stmt: Stmt): stmt is Declaration {
	return stmt.kind === 'FunctionDecl' || stmt.kind === 'ClassDecl' || stmt.kind === 'InterfaceDecl'
}

/**
 * Literal `require_once` paths of a unit, in source order.
 */
export function collectRequires(program: Program): string[] {
	const paths: string[] = []
	for (const stmt of program.statements) {
		if (stmt.kind === 'Require') paths.push(stmt.path)
	}
	return paths
}
