/**
 * Static types of the compiled subset.
 *
 * `mixed` is the dynamic fallback: values of that type live in boxes and
 * every operation on them goes through the runtime. `never` only appears
 * as the element type of an empty array literal before inference widens it.
 */

export const TypeKind = {
	Array: 'array',
	Bool: 'bool',
	Float: 'float',
	Int: 'int',
	Mixed: 'mixed',
	Never: 'never',
	Null: 'null',
	Object: 'object',
	String: 'string',
	Void: 'void',
} as const

export type TypeKind = (typeof TypeKind)[keyof typeof TypeKind]

export type ScalarType =
	| { readonly kind: 'int' }
	| { readonly kind: 'float' }
	| { readonly kind: 'bool' }
	| { readonly kind: 'string' }
	| { readonly kind: 'null' }
	| { readonly kind: 'void' }
	| { readonly kind: 'mixed' }
	| { readonly kind: 'never' }

export interface ArrayType {
	readonly kind: 'array'
	/** `int`, `string` or `mixed` */
	readonly key: PhpType
	readonly element: PhpType
}

export interface ObjectType {
	readonly kind: 'object'
	readonly className: string
	/** The runtime class is known to be exactly `className` (fresh `new`) */
	readonly exact: boolean
}

export type PhpType = ScalarType | ArrayType | ObjectType

export const INT: PhpType = { kind: 'int' }
export const FLOAT: PhpType = { kind: 'float' }
export const BOOL: PhpType = { kind: 'bool' }
export const STRING: PhpType = { kind: 'string' }
export const NULL: PhpType = { kind: 'null' }
export const VOID: PhpType = { kind: 'void' }
export const MIXED: PhpType = { kind: 'mixed' }
export const NEVER: PhpType = { kind: 'never' }

/** Arrays nest at most this deep before inference gives up and uses mixed */
const MAX_ARRAY_DEPTH = 4

export function arrayOf(element: PhpType, key: PhpType = MIXED): ArrayType {
	return { element, key, kind: 'array' }
}

export function objectOf(className: string, exact = false): ObjectType {
	return { className, exact, kind: 'object' }
}

/** `array` in a type hint: any keys, any values */
export const ANY_ARRAY: ArrayType = arrayOf(MIXED, MIXED)

export function typeToString(type: PhpType): string {
	switch (type.kind) {
		case 'array':
			if (type.element.kind === 'mixed' && type.key.kind === 'mixed') return 'array'
			if (type.key.kind === 'mixed') return `array<${typeToString(type.element)}>`
			return `array<${typeToString(type.key)}, ${typeToString(type.element)}>`
		case 'object':
			return type.className
		default:
			return type.kind
	}
}

export function sameType(a: PhpType, b: PhpType): boolean {
	if (a.kind === 'array' && b.kind === 'array') {
		return sameType(a.key, b.key) && sameType(a.element, b.element)
	}
	if (a.kind === 'object' && b.kind === 'object') {
		return a.className.toLowerCase() === b.className.toLowerCase() && a.exact === b.exact
	}
	return a.kind === b.kind
}

/** Values of these types are heap handles under reference counting. */
export function isRefCounted(type: PhpType): boolean {
	return (
		type.kind === 'string' ||
		type.kind === 'array' ||
		type.kind === 'object' ||
		type.kind === 'mixed' ||
		type.kind === 'null'
	)
}

export function isNumeric(type: PhpType): boolean {
	return type.kind === 'int' || type.kind === 'float'
}

/**
 * Class hierarchy queries the type lattice needs. Implemented by the
 * symbol table.
 */
export interface ClassHierarchy {
	/** `child` is `ancestor` or extends/implements it, transitively */
	isSubclassOf(child: string, ancestor: string): boolean
	/** Class chain from `className` up to its root, most derived first */
	ancestry(className: string): string[]
}

/**
 * Whether a value of type `source` may be stored where `target` is
 * declared, possibly after an implicit conversion (`int` to `float`,
 * anything to `mixed`, `mixed` to anything with a runtime check).
 */
export function isAssignable(target: PhpType, source: PhpType, classes: ClassHierarchy): boolean {
	if (source.kind === 'never') return true
	if (target.kind === 'mixed') return source.kind !== 'void'
	if (source.kind === 'mixed') return target.kind !== 'void'
	switch (target.kind) {
		case 'float':
			return source.kind === 'float' || source.kind === 'int'
		case 'array':
			if (source.kind !== 'array') return false
			return (
				(target.element.kind === 'mixed' || isAssignable(target.element, source.element, classes)) &&
				(target.key.kind === 'mixed' || source.key.kind === 'never' || sameType(target.key, source.key))
			)
		case 'object':
			return source.kind === 'object' && classes.isSubclassOf(source.className, target.className)
		default:
			return source.kind === target.kind
	}
}

/**
 * Strict subtyping for signature variance: no implicit conversions.
 */
export function isSubtype(sub: PhpType, sup: PhpType, classes: ClassHierarchy): boolean {
	if (sub.kind === 'never') return true
	if (sup.kind === 'mixed') return sub.kind !== 'void'
	if (sub.kind === 'array' && sup.kind === 'array') {
		return (
			isSubtype(sub.element, sup.element, classes) &&
			(sup.key.kind === 'mixed' || sameType(sub.key, sup.key))
		)
	}
	if (sub.kind === 'object' && sup.kind === 'object') {
		return classes.isSubclassOf(sub.className, sup.className)
	}
	return sub.kind === sup.kind
}

function commonAncestor(a: string, b: string, classes: ClassHierarchy): string | null {
	const chain = classes.ancestry(a)
	for (const candidate of chain) {
		if (classes.isSubclassOf(b, candidate)) return candidate
	}
	return null
}

function depth(type: PhpType): number {
	return type.kind === 'array' ? 1 + depth(type.element) : 0
}

/**
 * Least upper bound used by local type inference.
 */
export function join(a: PhpType, b: PhpType, classes: ClassHierarchy): PhpType {
	if (a.kind === 'never') return b
	if (b.kind === 'never') return a
	if (a.kind === 'array' && b.kind === 'array') {
		const joined = arrayOf(join(a.element, b.element, classes), join(a.key, b.key, classes))
		return depth(joined) > MAX_ARRAY_DEPTH ? MIXED : joined
	}
	if (a.kind === 'object' && b.kind === 'object') {
		if (a.className.toLowerCase() === b.className.toLowerCase()) {
			return objectOf(a.className, a.exact && b.exact)
		}
		const ancestor = commonAncestor(a.className, b.className, classes)
		return ancestor === null ? MIXED : objectOf(ancestor)
	}
	if (a.kind === b.kind) return a
	if (isNumeric(a) && isNumeric(b)) return FLOAT
	return MIXED
}

/** Replace leftover `never` element types with `mixed`. */
export function settle(type: PhpType): PhpType {
	if (type.kind === 'never') return MIXED
	if (type.kind === 'array') return arrayOf(settle(type.element), settle(type.key))
	return type
}
