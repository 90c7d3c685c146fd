/**
 * Symbol table for one translation unit.
 *
 * A table owns the declarations of its unit and reads through to the
 * finalized tables of the units it depends on. Function, method and class
 * names are case-insensitive; property and constant names are not.
 */

import type { Visibility } from '../core/ast.ts'
import type { SourceLocation } from '../core/location.ts'
import type { ClassHierarchy, PhpType } from './types.ts'
import type { ConstValue } from './values.ts'

export interface ParamSymbol {
	readonly name: string
	readonly type: PhpType
	/** Default value; `null` for required parameters */
	readonly default: ConstValue | null
}

export interface ForeignBinding {
	readonly library: string
	/** C declaration as written, e.g. `double cos(double)` */
	readonly signature: string
	readonly symbol: string
}

export interface FunctionSymbol {
	readonly kind: 'function'
	readonly name: string
	readonly unit: string
	readonly loc: SourceLocation
	readonly params: readonly ParamSymbol[]
	readonly returnType: PhpType
	/** Set for `#[ffi(...)]` declarations */
	readonly foreign: ForeignBinding | null
	/** Name of the lowered function */
	readonly mangled: string
}

export interface MethodSymbol {
	readonly kind: 'method'
	readonly name: string
	/** Declaring class */
	readonly owner: string
	readonly unit: string
	readonly loc: SourceLocation
	readonly params: readonly ParamSymbol[]
	readonly returnType: PhpType
	readonly visibility: Visibility
	readonly isStatic: boolean
	readonly isFinal: boolean
	readonly isAbstract: boolean
	/** Class declaring the method this one overrides */
	readonly overrides: string | null
	readonly mangled: string
}

export interface PropertySymbol {
	readonly kind: 'property'
	readonly name: string
	readonly owner: string
	readonly loc: SourceLocation
	readonly type: PhpType
	readonly visibility: Visibility
	readonly isReadonly: boolean
	/** Initial value stored by `new`; `null` when the slot starts unset */
	readonly default: ConstValue | null
	/** Position in the instance layout, inherited slots first */
	readonly slot: number
}

export interface ClassConstSymbol {
	readonly kind: 'constant'
	readonly name: string
	readonly owner: string
	readonly value: ConstValue
	readonly visibility: Visibility
}

export interface VtableEntry {
	/** Lower-case method name */
	readonly method: string
	/** Mangled name of the implementation the slot dispatches to */
	readonly implementation: string
}

/**
 * Instance layout: typed property slots and the virtual dispatch table.
 * Built once when the class is declared.
 */
export interface ClassLayout {
	readonly slots: readonly PropertySymbol[]
	readonly vtable: readonly VtableEntry[]
}

export interface ClassSymbol {
	readonly kind: 'class'
	readonly name: string
	readonly unit: string
	readonly loc: SourceLocation
	readonly parent: string | null
	readonly interfaces: readonly string[]
	readonly isInterface: boolean
	readonly isAbstract: boolean
	readonly isFinal: boolean
	readonly constants: ReadonlyMap<string, ClassConstSymbol>
	/** Properties declared by this class, in declaration order */
	readonly properties: ReadonlyMap<string, PropertySymbol>
	/** Methods declared by this class, keyed by lower-case name */
	readonly methods: ReadonlyMap<string, MethodSymbol>
	readonly layout: ClassLayout
}

export function mangleMethod(className: string, method: string): string {
	return `${className}::${method}`
}

export class SymbolTable implements ClassHierarchy {
	private readonly functions = new Map<string, FunctionSymbol>()
	private readonly classes = new Map<string, ClassSymbol>()

	constructor(
		readonly unit: string,
		readonly dependencies: readonly SymbolTable[] = []
	) {}

	// ===========================================================================
	// DECLARATION
	// ===========================================================================

	declareFunction(symbol: FunctionSymbol): void {
		this.functions.set(symbol.name.toLowerCase(), symbol)
	}

	declareClass(symbol: ClassSymbol): void {
		this.classes.set(symbol.name.toLowerCase(), symbol)
	}

	/** Functions declared by this unit, in declaration order */
	ownFunctions(): FunctionSymbol[] {
		return [...this.functions.values()]
	}

	/** Classes declared by this unit, in declaration order */
	ownClasses(): ClassSymbol[] {
		return [...this.classes.values()]
	}

	// ===========================================================================
	// LOOKUP
	// ===========================================================================

	lookupFunction(name: string): FunctionSymbol | undefined {
		const own = this.functions.get(name.toLowerCase())
		if (own) return own
		for (const dep of this.dependencies) {
			const found = dep.lookupFunction(name)
			if (found) return found
		}
		return undefined
	}

	lookupClass(name: string): ClassSymbol | undefined {
		const own = this.classes.get(name.toLowerCase())
		if (own) return own
		for (const dep of this.dependencies) {
			const found = dep.lookupClass(name)
			if (found) return found
		}
		return undefined
	}

	/** Like `lookupClass` but only through dependencies */
	lookupInDependencies(name: string): ClassSymbol | FunctionSymbol | undefined {
		for (const dep of this.dependencies) {
			const found = dep.lookupClass(name) ?? dep.lookupFunction(name)
			if (found) return found
		}
		return undefined
	}

	/**
	 * Finds the implementation of `method` visible on `className`: the
	 * class itself, then its parents, then (for abstract signatures) its
	 * interfaces.
	 */
	findMethod(className: string, method: string): MethodSymbol | undefined {
		const key = method.toLowerCase()
		for (const name of this.ancestry(className)) {
			const found = this.lookupClass(name)?.methods.get(key)
			if (found) return found
		}
		for (const iface of this.allInterfaces(className)) {
			const found = this.lookupClass(iface)?.methods.get(key)
			if (found) return found
		}
		return undefined
	}

	/** Most derived declaration of `property` on `className` or its parents */
	findProperty(className: string, property: string): PropertySymbol | undefined {
		for (const name of this.ancestry(className)) {
			const found = this.lookupClass(name)?.properties.get(property)
			if (found) return found
		}
		return undefined
	}

	findConstant(className: string, name: string): ClassConstSymbol | undefined {
		for (const owner of [...this.ancestry(className), ...this.allInterfaces(className)]) {
			const found = this.lookupClass(owner)?.constants.get(name)
			if (found) return found
		}
		return undefined
	}

	vtableSlot(className: string, method: string): number {
		const key = method.toLowerCase()
		return this.lookupClass(className)?.layout.vtable.findIndex((entry) => entry.method === key) ?? -1
	}

	// ===========================================================================
	// HIERARCHY
	// ===========================================================================

	ancestry(className: string): string[] {
		const chain: string[] = []
		const seen = new Set<string>()
		let current = this.lookupClass(className)
		while (current && !seen.has(current.name.toLowerCase())) {
			seen.add(current.name.toLowerCase())
			chain.push(current.name)
			current = current.parent === null ? undefined : this.lookupClass(current.parent)
		}
		return chain
	}

	/** Every interface `className` implements, directly or through parents */
	allInterfaces(className: string): string[] {
		const result: string[] = []
		const seen = new Set<string>()
		const visit = (name: string) => {
			const symbol = this.lookupClass(name)
			if (!symbol || seen.has(symbol.name.toLowerCase())) return
			seen.add(symbol.name.toLowerCase())
			if (symbol.isInterface) result.push(symbol.name)
			for (const iface of symbol.interfaces) visit(iface)
			if (symbol.parent !== null) visit(symbol.parent)
		}
		const root = this.lookupClass(className)
		if (!root) return result
		seen.add(root.name.toLowerCase())
		for (const iface of root.interfaces) visit(iface)
		if (root.parent !== null) visit(root.parent)
		return result
	}

	isSubclassOf(child: string, ancestor: string): boolean {
		const target = ancestor.toLowerCase()
		if (child.toLowerCase() === target) return true
		if (this.ancestry(child).some((name) => name.toLowerCase() === target)) return true
		return this.allInterfaces(child).some((name) => name.toLowerCase() === target)
	}

	/** Length of the parent chain; 0 for interfaces */
	inheritanceDepth(className: string): number {
		const symbol = this.lookupClass(className)
		if (!symbol || symbol.isInterface) return 0
		return this.ancestry(className).length
	}
}
