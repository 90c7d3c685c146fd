/**
 * Declaration pass: builds the unit's symbol table.
 *
 * Classes are declared parent-first so every layout and vtable is built
 * from an already-final parent. Signatures may name classes declared later
 * in the same unit.
 */

import type {
	Attribute,
	ClassDecl,
	ConstDecl,
	Expr,
	FunctionDecl,
	InterfaceDecl,
	MethodDecl,
	Param,
	PropertyDecl,
	Stmt,
	TypeHint,
	Visibility,
} from '../core/ast.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import type { SourceLocation } from '../core/location.ts'
import { BUILTIN_CONSTANTS, BUILTIN_FUNCTIONS } from './builtins.ts'
import {
	type ClassConstSymbol,
	type ClassSymbol,
	type ForeignBinding,
	type FunctionSymbol,
	type MethodSymbol,
	mangleMethod,
	type ParamSymbol,
	type PropertySymbol,
	type SymbolTable,
	type VtableEntry,
} from './symbols.ts'
import {
	ANY_ARRAY,
	BOOL,
	FLOAT,
	INT,
	isAssignable,
	isSubtype,
	MIXED,
	NULL,
	objectOf,
	type PhpType,
	sameType,
	STRING,
	typeToString,
	VOID,
} from './types.ts'
import {
	boolConst,
	type ConstEntry,
	type ConstValue,
	constToString,
	constType,
	floatConst,
	intConst,
	NULL_CONST,
	stringConst,
} from './values.ts'

/**
 * Name resolution context for type hints and constant expressions.
 */
export interface DeclScope {
	readonly symbols: SymbolTable
	/** Every class declared in the unit, lower-case name to declared name */
	readonly unitClasses: ReadonlyMap<string, string>
	readonly selfClass: string | null
	readonly parentClass: string | null
	/** Constants of the class being declared, visible to later constants */
	readonly pendingConstants?: ReadonlyMap<string, ClassConstSymbol>
	report(code: DiagnosticCode, loc: SourceLocation, args?: DiagnosticArgs): void
}

export const CONSTRUCTOR = '__construct'

const FFI_ATTRIBUTE = 'ffi'

// ============================================================================
// Names and Type Hints
// ============================================================================

/**
 * Resolve a class reference, including `self`, `static` and `parent`.
 * Reports and returns `null` when nothing is declared under that name.
 */
export function resolveClassName(name: string, scope: DeclScope, loc: SourceLocation): string | null {
	const key = name.toLowerCase()
	if (key === 'self' || key === 'static') {
		if (scope.selfClass === null) scope.report('KLRES001', loc, { name, what: 'class' })
		return scope.selfClass
	}
	if (key === 'parent') {
		if (scope.parentClass === null) scope.report('KLRES001', loc, { name, what: 'class' })
		return scope.parentClass
	}
	const found = scope.symbols.lookupClass(name)?.name ?? scope.unitClasses.get(key)
	if (found === undefined) {
		scope.report('KLRES001', loc, { name, what: 'class' })
		return null
	}
	return found
}

function resolveNamedType(name: string, scope: DeclScope, loc: SourceLocation): PhpType {
	switch (name.toLowerCase()) {
		case 'int':
			return INT
		case 'float':
			return FLOAT
		case 'bool':
		case 'true':
		case 'false':
			return BOOL
		case 'string':
			return STRING
		case 'array':
		case 'iterable':
			return ANY_ARRAY
		case 'void':
			return VOID
		case 'null':
			return NULL
		case 'mixed':
		case 'object':
		case 'never':
			return MIXED
		case 'callable':
			scope.report('KLRES006', loc, { construct: 'callable types' })
			return MIXED
		default: {
			const className = resolveClassName(name, scope, loc)
			return className === null ? MIXED : objectOf(className)
		}
	}
}

/**
 * Static type of a declared hint. Untyped declarations, nullable types and
 * unions are `mixed`: their values are boxed.
 */
export function resolveTypeHint(hint: TypeHint | null, scope: DeclScope): PhpType {
	if (hint === null) return MIXED
	const resolved = hint.names.map((name) => resolveNamedType(name, scope, hint.loc))
	const [single] = resolved
	if (hint.nullable || resolved.length !== 1 || single === undefined) return MIXED
	return single
}

// ============================================================================
// Constant Expressions
// ============================================================================

/**
 * Normalize an array key the way the runtime does: numeric strings, bools
 * and floats become ints, null becomes the empty string.
 */
export function normalizeKey(key: ConstValue): ConstValue | null {
	switch (key.kind) {
		case 'int':
			return key
		case 'string':
			return /^(0|-?[1-9][0-9]*)$/.test(key.value) && BigInt.asIntN(64, BigInt(key.value)).toString() === key.value
				? intConst(BigInt(key.value))
				: key
		case 'bool':
			return intConst(key.value ? 1n : 0n)
		case 'float':
			return Number.isFinite(key.value) ? intConst(BigInt(Math.trunc(key.value))) : null
		case 'null':
			return stringConst('')
		case 'array':
			return null
	}
}

function foldArray(items: readonly { key: Expr | null; value: Expr }[], scope: DeclScope): ConstValue | null {
	const entries: ConstEntry[] = []
	let nextIndex = 0n
	for (const item of items) {
		const value = fold(item.value, scope)
		if (value === null) return null
		let key: ConstValue | null = intConst(nextIndex)
		if (item.key !== null) {
			const raw = fold(item.key, scope)
			key = raw === null ? null : normalizeKey(raw)
		}
		if (key === null) return null
		if (key.kind === 'int' && key.value >= nextIndex) nextIndex = key.value + 1n
		const existing = entries.findIndex((entry) => constKeyEquals(entry.key, key))
		if (existing >= 0) entries[existing] = { key, value }
		else entries.push({ key, value })
	}
	return { entries, kind: 'array' }
}

function constKeyEquals(a: ConstValue, b: ConstValue): boolean {
	if (a.kind === 'int' && b.kind === 'int') return a.value === b.value
	if (a.kind === 'string' && b.kind === 'string') return a.value === b.value
	return false
}

function asNumber(value: ConstValue): number | null {
	if (value.kind === 'int') return Number(value.value)
	if (value.kind === 'float') return value.value
	return null
}

/** Integer power with 64-bit wraparound at every step */
export function wrappingPow(base: bigint, exponent: bigint): bigint {
	let result = 1n
	let factor = BigInt.asIntN(64, base)
	let remaining = exponent
	while (remaining > 0n) {
		if (remaining & 1n) result = BigInt.asIntN(64, result * factor)
		factor = BigInt.asIntN(64, factor * factor)
		remaining >>= 1n
	}
	return result
}

function foldBinary(op: string, left: ConstValue, right: ConstValue): ConstValue | null {
	if (op === '.') {
		const l = constToString(left)
		const r = constToString(right)
		return l === null || r === null ? null : stringConst(l + r)
	}
	if (left.kind === 'int' && right.kind === 'int') {
		const a = left.value
		const b = right.value
		switch (op) {
			case '+':
				return intConst(a + b)
			case '-':
				return intConst(a - b)
			case '*':
				return intConst(a * b)
			case '%':
				return b === 0n ? null : intConst(a % b)
			case '/':
				return b === 0n ? null : intConst(a / b)
			case '**':
				return b < 0n ? floatConst(Number(a) ** Number(b)) : intConst(wrappingPow(a, b))
			case '|':
				return intConst(a | b)
			case '&':
				return intConst(a & b)
			case '^':
				return intConst(a ^ b)
			case '<<':
				return b < 0n ? null : intConst(b >= 64n ? 0n : a << b)
			case '>>':
				return b < 0n ? null : intConst(a >> (b >= 64n ? 63n : b))
		}
		return null
	}
	const a = asNumber(left)
	const b = asNumber(right)
	if (a === null || b === null) return null
	switch (op) {
		case '+':
			return floatConst(a + b)
		case '-':
			return floatConst(a - b)
		case '*':
			return floatConst(a * b)
		case '/':
			return b === 0 ? null : floatConst(a / b)
		case '**':
			return floatConst(a ** b)
	}
	return null
}

function fold(expr: Expr, scope: DeclScope): ConstValue | null {
	switch (expr.kind) {
		case 'IntLiteral':
			return intConst(expr.value)
		case 'FloatLiteral':
			return floatConst(expr.value)
		case 'StringLiteral':
			return stringConst(expr.value)
		case 'BoolLiteral':
			return boolConst(expr.value)
		case 'NullLiteral':
			return NULL_CONST
		case 'ArrayLiteral':
			return foldArray(expr.items, scope)
		case 'ConstFetch': {
			const builtin = BUILTIN_CONSTANTS.get(expr.name)
			if (builtin === undefined) scope.report('KLRES001', expr.loc, { name: expr.name, what: 'constant' })
			return builtin ?? null
		}
		case 'ClassConstFetch': {
			const key = expr.className.toLowerCase()
			if ((key === 'self' || key === 'static') && scope.pendingConstants?.has(expr.name)) {
				return scope.pendingConstants.get(expr.name)?.value ?? null
			}
			const className = resolveClassName(expr.className, scope, expr.loc)
			if (className === null) return null
			const constant = scope.symbols.findConstant(className, expr.name)
			if (constant === undefined) {
				scope.report('KLRES001', expr.loc, { name: `${className}::${expr.name}`, what: 'constant' })
			}
			return constant?.value ?? null
		}
		case 'Unary': {
			const operand = fold(expr.operand, scope)
			if (operand === null) return null
			if (expr.op === '!') return operand.kind === 'bool' ? boolConst(!operand.value) : null
			if (expr.op === '~') return operand.kind === 'int' ? intConst(~operand.value) : null
			if (operand.kind === 'int') return expr.op === '-' ? intConst(-operand.value) : operand
			if (operand.kind === 'float') return expr.op === '-' ? floatConst(-operand.value) : operand
			return null
		}
		case 'Binary': {
			const left = fold(expr.left, scope)
			const right = fold(expr.right, scope)
			return left === null || right === null ? null : foldBinary(expr.op, left, right)
		}
		default:
			return null
	}
}

/**
 * Evaluate a compile-time constant. Reports KLRES015 naming `what`
 * when the expression is not constant.
 */
export function foldConstant(expr: Expr, scope: DeclScope, what: string): ConstValue | null {
	const value = fold(expr, scope)
	if (value === null) scope.report('KLRES015', expr.loc, { what })
	return value
}

/**
 * Fit a constant to a declared type: ints widen to floats, anything else
 * must already be assignable.
 */
function fitConstant(
	value: ConstValue,
	type: PhpType,
	scope: DeclScope,
	loc: SourceLocation,
	context: string
): ConstValue {
	if (type.kind === 'float' && value.kind === 'int') return floatConst(Number(value.value))
	const found = constType(value)
	if (!isAssignable(type, found, scope.symbols)) {
		scope.report('KLRES002', loc, { context, expected: typeToString(type), found: typeToString(found) })
	}
	return value
}

// ============================================================================
// Functions and Parameters
// ============================================================================

function declareParams(params: readonly Param[], scope: DeclScope): ParamSymbol[] {
	const seen = new Set<string>()
	return params.map((param) => {
		if (seen.has(param.name)) scope.report('KLRES007', param.loc, { name: `$${param.name}`, what: 'parameter' })
		seen.add(param.name)
		if (param.byRef) scope.report('KLRES006', param.loc, { construct: 'by-reference parameters' })
		if (param.variadic) scope.report('KLRES006', param.loc, { construct: 'variadic parameters' })
		const type = resolveTypeHint(param.type, scope)
		if (type.kind === 'void') {
			scope.report('KLRES002', param.loc, { context: `parameter $${param.name}`, expected: 'a value type', found: 'void' })
		}
		let value: ConstValue | null = null
		if (param.default !== null) {
			const folded = foldConstant(param.default, scope, `default of $${param.name}`)
			if (folded !== null) value = fitConstant(folded, type, scope, param.default.loc, `default of $${param.name}`)
		}
		return { default: value, name: param.name, type }
	})
}

function foreignBinding(attribute: Attribute, scope: DeclScope): ForeignBinding | null {
	const values = attribute.args.map((arg) => fold(arg, scope))
	const [library, signature] = values
	if (values.length !== 2 || library?.kind !== 'string' || signature?.kind !== 'string') {
		scope.report('KLRES002', attribute.loc, {
			context: 'ffi attribute',
			expected: 'a library and a signature string',
			found: `${attribute.args.length} argument(s)`,
		})
		return null
	}
	const symbol = /([A-Za-z_][A-Za-z0-9_]*)\s*\(/.exec(signature.value)?.[1] ?? signature.value
	return { library: library.value, signature: signature.value, symbol }
}

function checkAttributes(attributes: readonly Attribute[], scope: DeclScope, allowFfi: boolean): Attribute | null {
	let ffi: Attribute | null = null
	for (const attribute of attributes) {
		if (allowFfi && attribute.name.toLowerCase() === FFI_ATTRIBUTE) ffi = attribute
		else scope.report('KLRES050', attribute.loc, { name: attribute.name })
	}
	return ffi
}

const FOREIGN_TYPES = new Set(['int', 'float', 'bool', 'void'])

function declareFunction(decl: FunctionDecl, scope: DeclScope): FunctionSymbol {
	const ffi = checkAttributes(decl.attributes, scope, true)
	const params = declareParams(decl.params, scope)
	const returnType = resolveTypeHint(decl.returnType, scope)
	const foreign = ffi === null ? null : foreignBinding(ffi, scope)
	if (ffi !== null) {
		if (decl.body !== null && decl.body.length > 0) {
			scope.report('KLRES006', decl.loc, { construct: 'foreign functions with a body' })
		}
		for (const param of params) {
			if (!FOREIGN_TYPES.has(param.type.kind) || param.type.kind === 'void') {
				scope.report('KLRES002', decl.loc, {
					context: `foreign parameter $${param.name}`,
					expected: 'int, float or bool',
					found: typeToString(param.type),
				})
			}
		}
		if (!FOREIGN_TYPES.has(returnType.kind)) {
			scope.report('KLRES002', decl.loc, {
				context: `foreign return of ${decl.name}`,
				expected: 'int, float, bool or void',
				found: typeToString(returnType),
			})
		}
	} else if (decl.body === null) {
		scope.report('KLRES006', decl.loc, { construct: 'functions without a body' })
	}
	return {
		foreign,
		kind: 'function',
		loc: decl.loc,
		mangled: decl.name,
		name: decl.name,
		params,
		returnType,
		unit: scope.symbols.unit,
	}
}

// ============================================================================
// Overrides
// ============================================================================

const VISIBILITY_RANK: Record<Visibility, number> = { private: 2, protected: 1, public: 0 }

function describe(method: MethodSymbol): string {
	return `${method.owner}::${method.name}`
}

/**
 * Check that `child` may replace `parent`: not final, no narrower
 * visibility, contravariant parameters and a covariant return type.
 */
function checkOverride(child: MethodSymbol, parent: MethodSymbol, scope: DeclScope): void {
	if (parent.isFinal) {
		scope.report('KLRES012', child.loc, { action: 'override', name: describe(parent), what: 'method' })
	}
	if (VISIBILITY_RANK[child.visibility] > VISIBILITY_RANK[parent.visibility]) {
		scope.report('KLRES005', child.loc, {
			method: describe(child),
			parent: describe(parent),
			visibility: parent.visibility,
		})
	}
	if (child.name.toLowerCase() === CONSTRUCTOR && !parent.isAbstract) return
	const incompatible = (reason: string) =>
		scope.report('KLRES003', child.loc, { method: describe(child), parent: describe(parent), reason })
	if (child.isStatic !== parent.isStatic) {
		incompatible('static and instance methods cannot override each other')
		return
	}
	if (child.params.length < parent.params.length) {
		incompatible(`takes ${child.params.length} parameter(s), the parent takes ${parent.params.length}`)
		return
	}
	for (const [i, param] of child.params.entries()) {
		const inherited = parent.params[i]
		if (inherited === undefined) {
			if (param.default === null) incompatible(`extra parameter $${param.name} needs a default`)
			continue
		}
		if (!isSubtype(inherited.type, param.type, scope.symbols)) {
			incompatible(`parameter $${param.name} of type ${typeToString(param.type)} does not accept ${typeToString(inherited.type)}`)
		}
		if (inherited.default !== null && param.default === null) {
			incompatible(`parameter $${param.name} must stay optional`)
		}
	}
	if (parent.returnType.kind === 'void' ? child.returnType.kind !== 'void' : !isSubtype(child.returnType, parent.returnType, scope.symbols)) {
		incompatible(`return type ${typeToString(child.returnType)} is not compatible with ${typeToString(parent.returnType)}`)
	}
}

// ============================================================================
// Classes
// ============================================================================

interface ClassDeclaration {
	readonly decl: ClassDecl | InterfaceDecl
	state: 'pending' | 'visiting' | 'done'
}

function declareConstants(
	decls: readonly ConstDecl[],
	scope: DeclScope,
	owner: string
): Map<string, ClassConstSymbol> {
	const constants = new Map<string, ClassConstSymbol>()
	const constScope: DeclScope = { ...scope, pendingConstants: constants }
	for (const decl of decls) {
		if (constants.has(decl.name)) {
			scope.report('KLRES007', decl.loc, { name: `${owner}::${decl.name}`, what: 'constant' })
			continue
		}
		const value = foldConstant(decl.value, constScope, `constant ${owner}::${decl.name}`)
		if (value === null) continue
		constants.set(decl.name, { kind: 'constant', name: decl.name, owner, value, visibility: decl.visibility })
	}
	return constants
}

function declareProperties(
	decls: readonly PropertyDecl[],
	scope: DeclScope,
	owner: string,
	inherited: readonly PropertySymbol[]
): { own: Map<string, PropertySymbol>; slots: PropertySymbol[] } {
	const own = new Map<string, PropertySymbol>()
	const slots = [...inherited]
	for (const decl of decls) {
		if (own.has(decl.name)) {
			scope.report('KLRES007', decl.loc, { name: `${owner}::$${decl.name}`, what: 'property' })
			continue
		}
		if (decl.isStatic) {
			scope.report('KLRES006', decl.loc, { construct: 'static properties' })
			continue
		}
		const type = resolveTypeHint(decl.type, scope)
		let initial: ConstValue | null = decl.type === null ? NULL_CONST : null
		if (decl.default !== null) {
			const folded = foldConstant(decl.default, scope, `default of ${owner}::$${decl.name}`)
			if (folded !== null) initial = fitConstant(folded, type, scope, decl.default.loc, `default of ${owner}::$${decl.name}`)
		}
		const redeclared = slots.findIndex((slot) => slot.name === decl.name)
		const previous = slots[redeclared]
		if (previous !== undefined && previous.visibility !== 'private') {
			if (!sameType(previous.type, type)) {
				scope.report('KLRES002', decl.loc, {
					context: `redeclaration of $${decl.name}`,
					expected: typeToString(previous.type),
					found: typeToString(type),
				})
			}
			if (VISIBILITY_RANK[decl.visibility] > VISIBILITY_RANK[previous.visibility]) {
				scope.report('KLRES005', decl.loc, {
					method: `${owner}::$${decl.name}`,
					parent: `${previous.owner}::$${previous.name}`,
					visibility: previous.visibility,
				})
			}
		}
		const slot = previous !== undefined && previous.visibility !== 'private' ? redeclared : slots.length
		const symbol: PropertySymbol = {
			default: initial,
			isReadonly: decl.isReadonly,
			kind: 'property',
			loc: decl.loc,
			name: decl.name,
			owner,
			slot,
			type,
			visibility: decl.visibility,
		}
		slots[slot] = symbol
		own.set(decl.name, symbol)
	}
	return { own, slots }
}

function declareMethods(
	decls: readonly MethodDecl[],
	scope: DeclScope,
	owner: string,
	isInterface: boolean
): Map<string, MethodSymbol> {
	const methods = new Map<string, MethodSymbol>()
	for (const decl of decls) {
		const key = decl.name.toLowerCase()
		if (methods.has(key)) {
			scope.report('KLRES007', decl.loc, { name: `${owner}::${decl.name}`, what: 'method' })
			continue
		}
		checkAttributes(decl.attributes, scope, false)
		const isAbstract = isInterface || decl.isAbstract
		if (!isAbstract && decl.body === null) {
			scope.report('KLRES006', decl.loc, { construct: 'methods without a body' })
		}
		const returnType = key === CONSTRUCTOR ? VOID : resolveTypeHint(decl.returnType, scope)
		methods.set(key, {
			isAbstract,
			isFinal: decl.isFinal,
			isStatic: decl.isStatic,
			kind: 'method',
			loc: decl.loc,
			mangled: mangleMethod(owner, decl.name),
			name: decl.name,
			overrides: null,
			owner,
			params: declareParams(decl.params, scope),
			returnType,
			unit: scope.symbols.unit,
			visibility: isInterface ? 'public' : decl.visibility,
		})
	}
	return methods
}

/** Methods dispatched through the vtable: instance methods other than constructors and private ones */
export function isVirtual(method: MethodSymbol): boolean {
	return !method.isStatic && method.visibility !== 'private' && method.name.toLowerCase() !== CONSTRUCTOR
}

function buildVtable(parent: ClassSymbol | undefined, methods: ReadonlyMap<string, MethodSymbol>): VtableEntry[] {
	const vtable = [...(parent?.layout.vtable ?? [])]
	for (const [key, method] of methods) {
		if (!isVirtual(method)) continue
		const entry = { implementation: method.mangled, method: key }
		const slot = vtable.findIndex((existing) => existing.method === key)
		if (slot >= 0) vtable[slot] = entry
		else vtable.push(entry)
	}
	return vtable
}

/**
 * Link own methods to the parent methods they override and validate each
 * override. Private parent methods are not overridden, only shadowed.
 */
function linkOverrides(
	methods: Map<string, MethodSymbol>,
	parent: string | null,
	scope: DeclScope
): void {
	if (parent === null) return
	for (const [key, method] of methods) {
		const inherited = scope.symbols.findMethod(parent, key)
		if (inherited === undefined || inherited.visibility === 'private') continue
		if (scope.symbols.lookupClass(inherited.owner)?.isInterface) continue
		checkOverride(method, inherited, scope)
		methods.set(key, { ...method, overrides: inherited.owner })
	}
}

function checkInterfaceMethods(symbol: ClassSymbol, scope: DeclScope): void {
	for (const iface of scope.symbols.allInterfaces(symbol.name)) {
		for (const [key, required] of scope.symbols.lookupClass(iface)?.methods ?? []) {
			let implementation: MethodSymbol | undefined
			for (const name of scope.symbols.ancestry(symbol.name)) {
				const candidate = scope.symbols.lookupClass(name)?.methods.get(key)
				if (candidate && !candidate.isAbstract) {
					implementation = candidate
					break
				}
			}
			if (implementation === undefined) {
				if (!symbol.isAbstract && !symbol.isInterface) {
					scope.report('KLRES009', symbol.loc, { class: symbol.name, method: describe(required) })
				}
				continue
			}
			if (implementation.owner.toLowerCase() === symbol.name.toLowerCase()) {
				checkOverride(implementation, required, scope)
			}
		}
	}
}

function checkAbstractMethods(symbol: ClassSymbol, scope: DeclScope): void {
	if (symbol.isAbstract || symbol.isInterface) return
	for (const entry of symbol.layout.vtable) {
		const method = scope.symbols.findMethod(symbol.name, entry.method)
		if (method?.isAbstract) {
			scope.report('KLRES009', symbol.loc, { class: symbol.name, method: describe(method) })
		}
	}
	for (const method of symbol.methods.values()) {
		if (method.isAbstract && !isVirtual(method)) {
			scope.report('KLRES009', symbol.loc, { class: symbol.name, method: describe(method) })
		}
	}
}

function resolveInterfaces(
	names: readonly string[],
	owner: string,
	relation: 'implement' | 'extend',
	scope: DeclScope,
	loc: SourceLocation
): string[] {
	const resolved: string[] = []
	for (const name of names) {
		const target = resolveClassName(name, scope, loc)
		if (target === null) continue
		if (!scope.symbols.lookupClass(target)?.isInterface) {
			scope.report('KLRES016', loc, { name: owner, reason: 'it is not an interface', relation, target })
			continue
		}
		resolved.push(target)
	}
	return resolved
}

function declareInterface(decl: InterfaceDecl, scope: DeclScope): ClassSymbol {
	const ifaceScope: DeclScope = { ...scope, parentClass: null, selfClass: decl.name }
	const interfaces = resolveInterfaces(decl.parents, decl.name, 'extend', ifaceScope, decl.loc)
	const methods = declareMethods(decl.methods, ifaceScope, decl.name, true)
	return {
		constants: declareConstants(decl.constants, ifaceScope, decl.name),
		interfaces,
		isAbstract: true,
		isFinal: false,
		isInterface: true,
		kind: 'class',
		layout: { slots: [], vtable: [] },
		loc: decl.loc,
		methods,
		name: decl.name,
		parent: null,
		properties: new Map(),
		unit: scope.symbols.unit,
	}
}

function resolveParent(decl: ClassDecl, scope: DeclScope): ClassSymbol | undefined {
	if (decl.parent === null) return undefined
	const name = resolveClassName(decl.parent, { ...scope, parentClass: null, selfClass: null }, decl.loc)
	if (name === null) return undefined
	const parent = scope.symbols.lookupClass(name)
	if (parent === undefined) return undefined
	if (parent.isInterface) {
		scope.report('KLRES016', decl.loc, { name: decl.name, reason: 'it is an interface', relation: 'extend', target: name })
		return undefined
	}
	if (parent.isFinal) {
		scope.report('KLRES012', decl.loc, { action: 'extend', name: parent.name, what: 'class' })
	}
	return parent
}

function declareClass(decl: ClassDecl, scope: DeclScope): ClassSymbol {
	for (const trait of decl.traits) {
		scope.report('KLRES006', decl.loc, { construct: `traits (\`use ${trait}\`)` })
	}
	checkAttributes(decl.attributes, scope, false)
	const parent = resolveParent(decl, scope)
	const classScope: DeclScope = { ...scope, parentClass: parent?.name ?? null, selfClass: decl.name }
	const interfaces = resolveInterfaces(decl.interfaces, decl.name, 'implement', classScope, decl.loc)
	const constants = declareConstants(decl.constants, classScope, decl.name)
	const { own, slots } = declareProperties(decl.properties, classScope, decl.name, parent?.layout.slots ?? [])
	const methods = declareMethods(decl.methods, classScope, decl.name, false)
	linkOverrides(methods, parent?.name ?? null, classScope)
	for (const method of methods.values()) {
		if (method.isAbstract && !decl.isAbstract) {
			scope.report('KLRES009', method.loc, { class: decl.name, method: describe(method) })
		}
	}
	return {
		constants,
		interfaces,
		isAbstract: decl.isAbstract,
		isFinal: decl.isFinal,
		isInterface: false,
		kind: 'class',
		layout: { slots, vtable: buildVtable(parent, methods) },
		loc: decl.loc,
		methods,
		name: decl.name,
		parent: parent?.name ?? null,
		properties: own,
		unit: scope.symbols.unit,
	}
}

// ============================================================================
// Unit
// ============================================================================

/**
 * Declare every top-level function and class of a unit into `symbols`.
 * Nested declarations are left to the statement pass, which rejects them.
 */
export function declareUnit(
	statements: readonly Stmt[],
	symbols: SymbolTable,
	report: DeclScope['report']
): void {
	const classes = new Map<string, ClassDeclaration>()
	const unitClasses = new Map<string, string>()
	for (const stmt of statements) {
		if (stmt.kind !== 'ClassDecl' && stmt.kind !== 'InterfaceDecl') continue
		const key = stmt.name.toLowerCase()
		if (classes.has(key) || symbols.lookupClass(stmt.name)) {
			report('KLRES007', stmt.loc, { name: stmt.name, what: stmt.kind === 'ClassDecl' ? 'class' : 'interface' })
			continue
		}
		classes.set(key, { decl: stmt, state: 'pending' })
		unitClasses.set(key, stmt.name)
	}

	const scope: DeclScope = { parentClass: null, report, selfClass: null, symbols, unitClasses }

	const visit = (entry: ClassDeclaration): void => {
		if (entry.state === 'done') return
		if (entry.state === 'visiting') return
		entry.state = 'visiting'
		const { decl } = entry
		const supers = decl.kind === 'ClassDecl' ? [...(decl.parent ? [decl.parent] : []), ...decl.interfaces] : decl.parents
		for (const name of supers) {
			const dependency = classes.get(name.toLowerCase())
			if (dependency?.state === 'visiting') {
				report('KLRES016', decl.loc, { name: decl.name, reason: 'inheritance cycle', relation: 'extend', target: name })
				entry.state = 'done'
				return
			}
			if (dependency) visit(dependency)
		}
		const symbol = decl.kind === 'ClassDecl' ? declareClass(decl, scope) : declareInterface(decl, scope)
		symbols.declareClass(symbol)
		checkInterfaceMethods(symbol, { ...scope, selfClass: symbol.name })
		checkAbstractMethods(symbol, { ...scope, selfClass: symbol.name })
		entry.state = 'done'
	}
	for (const entry of classes.values()) visit(entry)

	for (const stmt of statements) {
		if (stmt.kind !== 'FunctionDecl') continue
		if (
			symbols.lookupFunction(stmt.name) ||
			BUILTIN_FUNCTIONS.has(stmt.name.toLowerCase()) ||
			stmt.name.toLowerCase().startsWith('rt_')
		) {
			report('KLRES007', stmt.loc, { name: stmt.name, what: 'function' })
			continue
		}
		symbols.declareFunction(declareFunction(stmt, scope))
	}
}

/** Scope for checking the bodies of `className`'s methods, or of functions */
export function bodyScope(
	symbols: SymbolTable,
	className: string | null,
	report: DeclScope['report']
): DeclScope {
	const parent = className === null ? null : (symbols.lookupClass(className)?.parent ?? null)
	return { parentClass: parent, report, selfClass: className, symbols, unitClasses: new Map() }
}
