import type { FailedMatchResult, Node } from 'ohm-js'
import type {
	ArrayItem,
	AssignOperator,
	Attribute,
	BinaryOperator,
	CatchClause,
	ConstDecl,
	ElseIf,
	Expr,
	MatchArm,
	MethodDecl,
	Param,
	Program,
	PropertyDecl,
	Stmt,
	SwitchCase,
	TypeHint,
	Visibility,
} from '../core/ast.ts'
import type { CompilationContext } from '../core/context.ts'
import { createLocator, type SourceLocation } from '../core/location.ts'
import { KeelGrammar } from '../grammar/index.ts'

export interface ParseResult {
	succeeded: boolean
	program?: Program
}

const ASSIGN_OPERATORS: readonly AssignOperator[] = [
	'=',
	'+=',
	'-=',
	'*=',
	'/=',
	'.=',
	'%=',
	'**=',
	'??=',
	'|=',
	'&=',
	'^=',
	'<<=',
	'>>=',
]

const BINARY_OPERATORS: readonly BinaryOperator[] = [
	'+',
	'-',
	'*',
	'/',
	'%',
	'**',
	'.',
	'==',
	'!=',
	'===',
	'!==',
	'<',
	'<=',
	'>',
	'>=',
	'<=>',
	'&&',
	'||',
	'??',
	'&',
	'|',
	'^',
	'<<',
	'>>',
]

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
	$: '$',
	'"': '"',
	'\\': '\\',
	e: '\x1b',
	f: '\f',
	n: '\n',
	r: '\r',
	t: '\t',
	v: '\v',
}

type ClassMemberNode =
	| MethodDecl
	| ConstDecl
	| PropertyDecl
	| { readonly kind: 'TraitUse'; readonly names: readonly string[]; readonly loc: SourceLocation }

interface ForeachVar {
	name: string
	byRef: boolean
}

interface ParseSession {
	readonly context: CompilationContext
	readonly locate: (offset: number) => SourceLocation
	/** Offset of the text being matched within the unit source */
	base: number
}

function toBinaryOperator(text: string): BinaryOperator {
	const normalized = text === '<>' ? '!=' : text
	const op = BINARY_OPERATORS.find((candidate) => candidate === normalized)
	if (op === undefined) throw new Error(`unknown binary operator ${text}`)
	return op
}

function toAssignOperator(text: string): AssignOperator {
	const op = ASSIGN_OPERATORS.find((candidate) => candidate === text)
	if (op === undefined) throw new Error(`unknown assignment operator ${text}`)
	return op
}

function decodeEscape(sequence: string): string {
	if (sequence.length > 1 && sequence.startsWith('x')) {
		return String.fromCharCode(Number.parseInt(sequence.slice(1), 16))
	}
	if (sequence.startsWith('u{')) {
		return String.fromCodePoint(Number.parseInt(sequence.slice(2, -1), 16))
	}
	if (/^[0-7]+$/.test(sequence)) {
		return String.fromCharCode(Number.parseInt(sequence, 8) & 0xff)
	}
	return SIMPLE_ESCAPES[sequence] ?? `\\${sequence}`
}

function nameText(node: Node): string {
	return node.sourceString.replace(/^\\/, '')
}

function reportMatchFailure(session: ParseSession, result: FailedMatchResult, offset: number): void {
	const message = result.shortMessage ?? 'unexpected input'
	const position = /Line (\d+), col (\d+)/.exec(message)
	const detail = message.replace(/^Line \d+, col \d+: /, '')
	if (offset === 0 && position) {
		session.context.emit('KLPARSE001', Number(position[1]), Number(position[2]), { detail })
		return
	}
	session.context.emitAt('KLPARSE001', session.locate(offset), { detail })
}

function createAstSemantics(session: ParseSession) {
	const semantics = KeelGrammar.createSemantics()

	function loc(node: Node): SourceLocation {
		return session.locate(session.base + node.source.startIdx)
	}

	function listOf(node: Node): Node[] {
		return node.asIteration().children
	}

	function optional(node: Node): Node | undefined {
		return node.children[0]
	}

	function expr(node: Node): Expr {
		return node['toExpr']()
	}

	function exprOrNull(node: Node): Expr | null {
		const child = optional(node)
		return child === undefined ? null : expr(child)
	}

	function typeOrNull(node: Node): TypeHint | null {
		const child = optional(node)
		return child === undefined ? null : child['toType']()
	}

	function bodyOf(node: Node): Stmt[] {
		const stmt: Stmt = node['toStmt']()
		return stmt.kind === 'Block' ? [...stmt.body] : [stmt]
	}

	function stmts(node: Node): Stmt[] {
		return node.children.map((child) => child['toStmt']())
	}

	function attributes(node: Node): Attribute[] {
		return node.children.flatMap((group) => group['toAttributes']())
	}

	function args(node: Node): Expr[] {
		const child = optional(node)
		return child === undefined ? [] : child['toArgs']()
	}

	function modifiers(node: Node): Set<string> {
		return new Set(node.children.map((m) => m.sourceString.trim()))
	}

	function visibility(mods: Set<string>): Visibility {
		if (mods.has('private')) return 'private'
		if (mods.has('protected')) return 'protected'
		return 'public'
	}

	function unsupported(node: Node, construct: string): Expr {
		return { construct, kind: 'UnsupportedExpr', loc: loc(node) }
	}

	function unsupportedStmt(node: Node, construct: string): Stmt {
		return { construct, kind: 'UnsupportedStatement', loc: loc(node) }
	}

	function binary(node: Node, op: string, left: Node, right: Node): Expr {
		return {
			kind: 'Binary',
			left: expr(left),
			loc: loc(node),
			op: toBinaryOperator(op),
			right: expr(right),
		}
	}

	function checkAssignable(target: Expr, node: Node): void {
		if (target.kind === 'Variable' || target.kind === 'Index' || target.kind === 'PropertyFetch') return
		session.context.emitAt('KLPARSE002', target.loc, { target: node.sourceString })
	}

	function loopDepth(node: Node): number {
		const child = optional(node)
		return child === undefined ? 1 : Number(child.sourceString.replaceAll('_', ''))
	}

	function embeddedExpr(text: string, offset: number): Expr {
		const result = KeelGrammar.match(text, 'Expr')
		if (result.failed()) {
			reportMatchFailure(session, result, offset)
			return { kind: 'StringLiteral', loc: session.locate(offset), value: '' }
		}
		const saved = session.base
		session.base = offset
		try {
			return semantics(result)['toExpr']()
		} finally {
			session.base = saved
		}
	}

	// =========================================================================
	// PROGRAM AND DECLARATIONS
	// =========================================================================

	semantics.addOperation<Program>('toProgram', {
		Program(_open: Node, statements: Node, _close: Node): Program {
			return {
				file: session.context.filename,
				kind: 'Program',
				loc: loc(this),
				statements: stmts(statements),
			}
		},
	})

	semantics.addOperation<Attribute[]>('toAttributes', {
		AttributeGroup(_open: Node, list: Node, _comma: Node, _close: Node): Attribute[] {
			return listOf(list).map((attr) => attr['toAttributes']()[0])
		},
		Attribute(name: Node, argList: Node): Attribute[] {
			return [{ args: args(argList), kind: 'Attribute', loc: loc(this), name: nameText(name) }]
		},
	})

	semantics.addOperation<TypeHint>('toType', {
		ReturnType(_colon: Node, hint: Node): TypeHint {
			return hint['toType']()
		},
		TypeHint_nullable(_question: Node, name: Node): TypeHint {
			return { kind: 'TypeHint', loc: loc(this), names: [nameText(name)], nullable: true }
		},
		TypeHint_union(list: Node): TypeHint {
			const names = listOf(list).map(nameText)
			const nullable = names.some((n) => n.toLowerCase() === 'null') && names.length > 1
			return {
				kind: 'TypeHint',
				loc: loc(this),
				names: nullable ? names.filter((n) => n.toLowerCase() !== 'null') : names,
				nullable,
			}
		},
	})

	semantics.addOperation<Param[]>('toParams', {
		Params(list: Node, _comma: Node): Param[] {
			return listOf(list).map((param) => param['toParams']()[0])
		},
		Param(hint: Node, ref: Node, dots: Node, variable: Node, defaultValue: Node): Param[] {
			return [
				{
					byRef: ref.children.length > 0,
					default: exprOrNull(defaultValue),
					loc: loc(this),
					name: variable.children[1].sourceString,
					type: typeOrNull(hint),
					variadic: dots.children.length > 0,
				},
			]
		},
	})

	semantics.addOperation<Stmt[] | null>('toBody', {
		FunctionBody_block(block: Node): Stmt[] {
			return bodyOf(block)
		},
		FunctionBody_none(_semi: Node): null {
			return null
		},
	})

	semantics.addOperation<ClassMemberNode>('toMember', {
		ConstDecl(mods: Node, _kw: Node, name: Node, _eq: Node, value: Node, _semi: Node): ConstDecl {
			return {
				kind: 'ConstDecl',
				loc: loc(this),
				name: name.sourceString,
				value: expr(value),
				visibility: visibility(modifiers(mods)),
			}
		},
		MethodDecl(
			attrs: Node,
			mods: Node,
			_kw: Node,
			_ref: Node,
			name: Node,
			_lp: Node,
			params: Node,
			_rp: Node,
			ret: Node,
			body: Node
		): MethodDecl {
			const set = modifiers(mods)
			return {
				attributes: attributes(attrs),
				body: body['toBody'](),
				isAbstract: set.has('abstract'),
				isFinal: set.has('final'),
				isStatic: set.has('static'),
				kind: 'MethodDecl',
				loc: loc(this),
				name: name.sourceString,
				params: params['toParams'](),
				returnType: typeOrNull(ret),
				visibility: visibility(set),
			}
		},
		PropertyDecl(
			_attrs: Node,
			mods: Node,
			hint: Node,
			variable: Node,
			defaultValue: Node,
			_semi: Node
		): PropertyDecl {
			const set = modifiers(mods)
			return {
				default: exprOrNull(defaultValue),
				isReadonly: set.has('readonly'),
				isStatic: set.has('static'),
				kind: 'PropertyDecl',
				loc: loc(this),
				name: variable.children[1].sourceString,
				type: typeOrNull(hint),
				visibility: visibility(set),
			}
		},
		TraitUse(_kw: Node, list: Node, _semi: Node): ClassMemberNode {
			return { kind: 'TraitUse', loc: loc(this), names: listOf(list).map(nameText) }
		},
	})

	function members(node: Node): ClassMemberNode[] {
		return node.children.map((member) => member['toMember']())
	}

	// =========================================================================
	// STATEMENTS
	// =========================================================================

	semantics.addOperation<Stmt>('toStmt', {
		FunctionDecl(
			attrs: Node,
			_kw: Node,
			_ref: Node,
			name: Node,
			_lp: Node,
			params: Node,
			_rp: Node,
			ret: Node,
			body: Node
		): Stmt {
			return {
				attributes: attributes(attrs),
				body: body['toBody'](),
				kind: 'FunctionDecl',
				loc: loc(this),
				name: name.sourceString,
				params: params['toParams'](),
				returnType: typeOrNull(ret),
			}
		},
		ClassDecl(
			attrs: Node,
			mods: Node,
			_kw: Node,
			name: Node,
			extendsClause: Node,
			implementsClause: Node,
			_lb: Node,
			body: Node,
			_rb: Node
		): Stmt {
			const set = modifiers(mods)
			const parent = optional(extendsClause)
			const implemented = optional(implementsClause)
			const all = members(body)
			const constants: ConstDecl[] = []
			const properties: PropertyDecl[] = []
			const methods: MethodDecl[] = []
			const traits: string[] = []
			for (const member of all) {
				if (member.kind === 'ConstDecl') constants.push(member)
				else if (member.kind === 'PropertyDecl') properties.push(member)
				else if (member.kind === 'MethodDecl') methods.push(member)
				else traits.push(...member.names)
			}
			return {
				attributes: attributes(attrs),
				constants,
				interfaces: implemented === undefined ? [] : listOf(implemented.children[1]).map(nameText),
				isAbstract: set.has('abstract'),
				isFinal: set.has('final'),
				kind: 'ClassDecl',
				loc: loc(this),
				methods,
				name: name.sourceString,
				parent: parent === undefined ? null : nameText(parent.children[1]),
				properties,
				traits,
			}
		},
		InterfaceDecl(
			_kw: Node,
			name: Node,
			extendsClause: Node,
			_lb: Node,
			body: Node,
			_rb: Node
		): Stmt {
			const parents = optional(extendsClause)
			const constants: ConstDecl[] = []
			const methods: MethodDecl[] = []
			for (const member of members(body)) {
				if (member.kind === 'ConstDecl') constants.push(member)
				else if (member.kind === 'MethodDecl') methods.push({ ...member, isAbstract: true })
				else {
					session.context.emitAt('KLPARSE001', member.loc, {
						detail: 'interfaces may only declare constants and methods',
					})
				}
			}
			return {
				constants,
				kind: 'InterfaceDecl',
				loc: loc(this),
				methods,
				name: name.sourceString,
				parents: parents === undefined ? [] : listOf(parents.children[1]).map(nameText),
			}
		},
		Block(_lb: Node, body: Node, _rb: Node): Stmt {
			return { body: stmts(body), kind: 'Block', loc: loc(this) }
		},
		IfStmt(_kw: Node, _lp: Node, cond: Node, _rp: Node, then: Node, elseIfs: Node, elseClause: Node): Stmt {
			const otherwise = optional(elseClause)
			return {
				cond: expr(cond),
				else: otherwise === undefined ? null : bodyOf(otherwise.children[1]),
				elseIfs: elseIfs.children.map((clause) => clause['toElseIf']()),
				kind: 'If',
				loc: loc(this),
				then: bodyOf(then),
			}
		},
		WhileStmt(_kw: Node, _lp: Node, cond: Node, _rp: Node, body: Node): Stmt {
			return { body: bodyOf(body), cond: expr(cond), kind: 'While', loc: loc(this) }
		},
		DoWhileStmt(_do: Node, body: Node, _while: Node, _lp: Node, cond: Node, _rp: Node, _semi: Node): Stmt {
			return { body: bodyOf(body), cond: expr(cond), kind: 'DoWhile', loc: loc(this) }
		},
		ForStmt(
			_kw: Node,
			_lp: Node,
			init: Node,
			_s1: Node,
			cond: Node,
			_s2: Node,
			update: Node,
			_rp: Node,
			body: Node
		): Stmt {
			return {
				body: bodyOf(body),
				cond: listOf(cond).map(expr),
				init: listOf(init).map(expr),
				kind: 'For',
				loc: loc(this),
				update: listOf(update).map(expr),
			}
		},
		ForeachStmt(_kw: Node, _lp: Node, subject: Node, _as: Node, target: Node, _rp: Node, body: Node): Stmt {
			const vars: ForeachVar[] = target['toForeachVars']()
			const value = vars[vars.length - 1]
			const key = vars.length > 1 ? vars[0] : undefined
			return {
				body: bodyOf(body),
				byRef: value?.byRef ?? false,
				key: key?.name ?? null,
				kind: 'Foreach',
				loc: loc(this),
				subject: expr(subject),
				value: value?.name ?? '',
			}
		},
		SwitchStmt(_kw: Node, _lp: Node, subject: Node, _rp: Node, _lb: Node, cases: Node, _rb: Node): Stmt {
			return {
				cases: cases.children.map((c) => c['toCase']()),
				kind: 'Switch',
				loc: loc(this),
				subject: expr(subject),
			}
		},
		TryStmt(_kw: Node, block: Node, catches: Node, finallyClause: Node): Stmt {
			const fin = optional(finallyClause)
			return {
				body: bodyOf(block),
				catches: catches.children.map((c) => c['toCatch']()),
				finally: fin === undefined ? null : bodyOf(fin.children[1]),
				kind: 'Try',
				loc: loc(this),
			}
		},
		ReturnStmt(_kw: Node, value: Node, _semi: Node): Stmt {
			return { kind: 'Return', loc: loc(this), value: exprOrNull(value) }
		},
		BreakStmt(_kw: Node, depth: Node, _semi: Node): Stmt {
			return { depth: loopDepth(depth), kind: 'Break', loc: loc(this) }
		},
		ContinueStmt(_kw: Node, depth: Node, _semi: Node): Stmt {
			return { depth: loopDepth(depth), kind: 'Continue', loc: loc(this) }
		},
		ThrowStmt(_kw: Node, value: Node, _semi: Node): Stmt {
			return { kind: 'Throw', loc: loc(this), value: expr(value) }
		},
		EchoStmt(_kw: Node, list: Node, _semi: Node): Stmt {
			return { exprs: listOf(list).map(expr), kind: 'Echo', loc: loc(this) }
		},
		UnsetStmt(_kw: Node, _lp: Node, list: Node, _comma: Node, _rp: Node, _semi: Node): Stmt {
			return { kind: 'Unset', loc: loc(this), targets: listOf(list).map(expr) }
		},
		GlobalStmt(_kw: Node, _list: Node, _semi: Node): Stmt {
			return unsupportedStmt(this, 'global variables')
		},
		StaticVarStmt(_kw: Node, _list: Node, _semi: Node): Stmt {
			return unsupportedStmt(this, 'static variables')
		},
		DeclareStmt(_kw: Node, _lp: Node, _name: Node, _eq: Node, _value: Node, _rp: Node, _semi: Node): Stmt {
			return { kind: 'Nop', loc: loc(this) }
		},
		RequireStmt_paren(_kw: Node, _lp: Node, path: Node, _rp: Node, _semi: Node): Stmt {
			return requireOf(this, path)
		},
		RequireStmt_bare(_kw: Node, path: Node, _semi: Node): Stmt {
			return requireOf(this, path)
		},
		NamespaceStmt(_kw: Node, _name: Node, _semi: Node): Stmt {
			return unsupportedStmt(this, 'namespaces')
		},
		UseStmt(_kw: Node, _list: Node, _semi: Node): Stmt {
			return unsupportedStmt(this, 'use imports')
		},
		ExprStmt(value: Node, _semi: Node): Stmt {
			return { expr: expr(value), kind: 'ExpressionStatement', loc: loc(this) }
		},
		EmptyStmt(_semi: Node): Stmt {
			return { kind: 'Nop', loc: loc(this) }
		},
	})

	function requireOf(node: Node, pathNode: Node): Stmt {
		const path = expr(pathNode)
		if (path.kind !== 'StringLiteral') return unsupportedStmt(node, 'dynamic require paths')
		return { kind: 'Require', loc: loc(node), path: path.value }
	}

	semantics.addOperation<ElseIf>('toElseIf', {
		ElseIfClause(_kw: Node, _lp: Node, cond: Node, _rp: Node, body: Node): ElseIf {
			return { body: bodyOf(body), cond: expr(cond), loc: loc(this) }
		},
	})

	semantics.addOperation<ForeachVar[]>('toForeachVars', {
		ForeachTarget_pair(key: Node, _arrow: Node, value: Node): ForeachVar[] {
			return [...key['toForeachVars'](), ...value['toForeachVars']()]
		},
		ForeachVar(ref: Node, variable: Node): ForeachVar[] {
			return [{ byRef: ref.children.length > 0, name: variable.children[1].sourceString }]
		},
	})

	semantics.addOperation<SwitchCase>('toCase', {
		SwitchCase_case(_kw: Node, test: Node, _sep: Node, body: Node): SwitchCase {
			return { body: stmts(body), loc: loc(this), test: expr(test) }
		},
		SwitchCase_default(_kw: Node, _sep: Node, body: Node): SwitchCase {
			return { body: stmts(body), loc: loc(this), test: null }
		},
	})

	semantics.addOperation<CatchClause>('toCatch', {
		CatchClause(_kw: Node, _lp: Node, types: Node, variable: Node, _rp: Node, block: Node): CatchClause {
			const bound = optional(variable)
			return {
				body: bodyOf(block),
				loc: loc(this),
				types: listOf(types).map(nameText),
				variable: bound === undefined ? null : bound.children[1].sourceString,
			}
		},
	})

	// =========================================================================
	// EXPRESSIONS
	// =========================================================================

	semantics.addOperation<ArrayItem>('toArrayItem', {
		ArrayItem_spread(_dots: Node, _value: Node): ArrayItem {
			return { key: null, loc: loc(this), value: unsupported(this, 'array unpacking') }
		},
		ArrayItem_pair(key: Node, _arrow: Node, ref: Node, value: Node): ArrayItem {
			return {
				key: expr(key),
				loc: loc(this),
				value: ref.children.length > 0 ? unsupported(this, 'references') : expr(value),
			}
		},
		ArrayItem_reference(_amp: Node, _value: Node): ArrayItem {
			return { key: null, loc: loc(this), value: unsupported(this, 'references') }
		},
		ArrayItem_value(value: Node): ArrayItem {
			return { key: null, loc: loc(this), value: expr(value) }
		},
	})

	semantics.addOperation<MatchArm>('toMatchArm', {
		MatchArm_conditions(list: Node, _comma: Node, _arrow: Node, body: Node): MatchArm {
			return { body: expr(body), conditions: listOf(list).map(expr), loc: loc(this) }
		},
		MatchArm_default(_kw: Node, _arrow: Node, body: Node): MatchArm {
			return { body: expr(body), conditions: null, loc: loc(this) }
		},
	})

	semantics.addOperation<Expr[]>('toArgs', {
		Arguments(_lp: Node, list: Node, _comma: Node, _rp: Node): Expr[] {
			return listOf(list).map(expr)
		},
	})

	semantics.addOperation<string | Expr>('toPart', {
		doubleQuotedPart_escape(_backslash: Node, sequence: Node): string {
			return decodeEscape(sequence.sourceString)
		},
		doubleQuotedPart_braced(_open: Node, _dollar: Node, body: Node, _close: Node): Expr {
			return embeddedExpr(body.sourceString, session.base + body.source.startIdx)
		},
		doubleQuotedPart_variable(_dollar: Node, name: Node, tail: Node): Expr {
			const variable: Expr = { kind: 'Variable', loc: loc(this), name: name.sourceString }
			const suffix = optional(tail)?.children[0]
			if (suffix === undefined) return variable
			if (suffix.ctorName === 'simpleTail_property') {
				return {
					kind: 'PropertyFetch',
					loc: loc(this),
					name: suffix.children[1].sourceString,
					object: variable,
				}
			}
			const index = suffix.children[1]
			return { array: variable, index: simpleIndex(index), kind: 'Index', loc: loc(this) }
		},
		doubleQuotedPart_char(char: Node): string {
			return char.sourceString
		},
	})

	function simpleIndex(node: Node): Expr {
		const text = node.sourceString
		if (text.startsWith('$')) return { kind: 'Variable', loc: loc(node), name: text.slice(1) }
		if (/^-?\d+$/.test(text)) return { kind: 'IntLiteral', loc: loc(node), value: BigInt(text) }
		return { kind: 'StringLiteral', loc: loc(node), value: text }
	}

	semantics.addOperation<Expr>('toExpr', {
		AssignExpr_assign(target: Node, op: Node, value: Node): Expr {
			const assigned = expr(target)
			checkAssignable(assigned, target)
			return {
				kind: 'Assign',
				loc: loc(this),
				op: toAssignOperator(op.sourceString),
				target: assigned,
				value: expr(value),
			}
		},
		TernaryExpr_full(cond: Node, _q: Node, then: Node, _colon: Node, otherwise: Node): Expr {
			return { cond: expr(cond), else: expr(otherwise), kind: 'Ternary', loc: loc(this), then: expr(then) }
		},
		TernaryExpr_short(cond: Node, _op: Node, otherwise: Node): Expr {
			return { cond: expr(cond), else: expr(otherwise), kind: 'Ternary', loc: loc(this), then: null }
		},
		CoalesceExpr_coalesce(left: Node, _op: Node, right: Node): Expr {
			return binary(this, '??', left, right)
		},
		OrExpr_or(left: Node, _op: Node, right: Node): Expr {
			return binary(this, '||', left, right)
		},
		AndExpr_and(left: Node, _op: Node, right: Node): Expr {
			return binary(this, '&&', left, right)
		},
		BitOrExpr_bitOr(left: Node, _op: Node, right: Node): Expr {
			return binary(this, '|', left, right)
		},
		BitXorExpr_bitXor(left: Node, _op: Node, right: Node): Expr {
			return binary(this, '^', left, right)
		},
		BitAndExpr_bitAnd(left: Node, _op: Node, right: Node): Expr {
			return binary(this, '&', left, right)
		},
		EqualityExpr_op(left: Node, op: Node, right: Node): Expr {
			return binary(this, op.sourceString, left, right)
		},
		RelationalExpr_op(left: Node, op: Node, right: Node): Expr {
			return binary(this, op.sourceString, left, right)
		},
		ConcatExpr_concat(left: Node, _op: Node, right: Node): Expr {
			return binary(this, '.', left, right)
		},
		ShiftExpr_op(left: Node, op: Node, right: Node): Expr {
			return binary(this, op.sourceString, left, right)
		},
		AddExpr_op(left: Node, op: Node, right: Node): Expr {
			return binary(this, op.sourceString, left, right)
		},
		MulExpr_op(left: Node, op: Node, right: Node): Expr {
			return binary(this, op.sourceString, left, right)
		},
		InstanceofExpr_instanceof(value: Node, _kw: Node, className: Node): Expr {
			return { className: nameText(className), expr: expr(value), kind: 'InstanceOf', loc: loc(this) }
		},
		UnaryExpr_not(_op: Node, operand: Node): Expr {
			return { kind: 'Unary', loc: loc(this), op: '!', operand: expr(operand) }
		},
		UnaryExpr_neg(_op: Node, operand: Node): Expr {
			return { kind: 'Unary', loc: loc(this), op: '-', operand: expr(operand) }
		},
		UnaryExpr_plus(_op: Node, operand: Node): Expr {
			return { kind: 'Unary', loc: loc(this), op: '+', operand: expr(operand) }
		},
		UnaryExpr_bitNot(_op: Node, operand: Node): Expr {
			return { kind: 'Unary', loc: loc(this), op: '~', operand: expr(operand) }
		},
		UnaryExpr_silence(_op: Node, operand: Node): Expr {
			return expr(operand)
		},
		UnaryExpr_cast(op: Node, operand: Node): Expr {
			const target = op.sourceString.slice(1, -1).trim()
			const value = expr(operand)
			switch (target) {
				case 'int':
				case 'integer':
					return { expr: value, kind: 'Cast', loc: loc(this), to: 'int' }
				case 'float':
				case 'double':
					return { expr: value, kind: 'Cast', loc: loc(this), to: 'float' }
				case 'bool':
				case 'boolean':
					return { expr: value, kind: 'Cast', loc: loc(this), to: 'bool' }
				case 'string':
					return { expr: value, kind: 'Cast', loc: loc(this), to: 'string' }
				case 'array':
					return { expr: value, kind: 'Cast', loc: loc(this), to: 'array' }
				default:
					return unsupported(this, `(${target}) casts`)
			}
		},
		UnaryExpr_preInc(_op: Node, target: Node): Expr {
			return incDec(this, '++', true, target)
		},
		UnaryExpr_preDec(_op: Node, target: Node): Expr {
			return incDec(this, '--', true, target)
		},
		UnaryExpr_clone(_kw: Node, _operand: Node): Expr {
			return unsupported(this, 'clone')
		},
		PowExpr_pow(base: Node, _op: Node, exponent: Node): Expr {
			return binary(this, '**', base, exponent)
		},
		IncDecExpr_postInc(target: Node, _op: Node): Expr {
			return incDec(this, '++', false, target)
		},
		IncDecExpr_postDec(target: Node, _op: Node): Expr {
			return incDec(this, '--', false, target)
		},
		PostfixExpr_index(array: Node, _lb: Node, index: Node, _rb: Node): Expr {
			return { array: expr(array), index: exprOrNull(index), kind: 'Index', loc: loc(this) }
		},
		PostfixExpr_methodCall(object: Node, _arrow: Node, method: Node, argList: Node): Expr {
			return {
				args: argList['toArgs'](),
				kind: 'MethodCall',
				loc: loc(this),
				method: method.sourceString,
				object: expr(object),
			}
		},
		PostfixExpr_property(object: Node, _arrow: Node, name: Node): Expr {
			return { kind: 'PropertyFetch', loc: loc(this), name: name.sourceString, object: expr(object) }
		},
		PostfixExpr_nullsafe(_object: Node, _arrow: Node, _name: Node, _args: Node): Expr {
			return unsupported(this, 'the nullsafe operator')
		},
		PostfixExpr_dynamicMember(_object: Node, _arrow: Node, _name: Node, _args: Node): Expr {
			return unsupported(this, 'dynamic member access')
		},
		PostfixExpr_call(callee: Node, argList: Node): Expr {
			const target = expr(callee)
			if (target.kind !== 'ConstFetch') return unsupported(this, 'dynamic function calls')
			return { args: argList['toArgs'](), kind: 'Call', loc: loc(this), name: target.name }
		},
		PostfixExpr_staticCall(className: Node, _sep: Node, method: Node, argList: Node): Expr {
			return {
				args: argList['toArgs'](),
				className: nameText(className),
				kind: 'StaticCall',
				loc: loc(this),
				method: method.sourceString,
			}
		},
		PostfixExpr_staticProperty(_className: Node, _sep: Node, _name: Node): Expr {
			return unsupported(this, 'static properties')
		},
		PostfixExpr_classConstant(className: Node, _sep: Node, name: Node): Expr {
			return {
				className: nameText(className),
				kind: 'ClassConstFetch',
				loc: loc(this),
				name: name.sourceString,
			}
		},
		PrimaryExpr_paren(_lp: Node, inner: Node, _rp: Node): Expr {
			return expr(inner)
		},
		PrimaryExpr_isset(_kw: Node, _lp: Node, list: Node, _comma: Node, _rp: Node): Expr {
			return { kind: 'Isset', loc: loc(this), targets: listOf(list).map(expr) }
		},
		PrimaryExpr_empty(_kw: Node, _lp: Node, value: Node, _rp: Node): Expr {
			return { expr: expr(value), kind: 'Empty', loc: loc(this) }
		},
		PrimaryExpr_print(_kw: Node, value: Node): Expr {
			return { expr: expr(value), kind: 'Print', loc: loc(this) }
		},
		PrimaryExpr_eval(_kw: Node, _lp: Node, _value: Node, _rp: Node): Expr {
			return unsupported(this, 'eval')
		},
		PrimaryExpr_include(_kw: Node, _path: Node): Expr {
			return unsupported(this, 'include as an expression')
		},
		PrimaryExpr_exit(_kw: Node, _lp: Node, _value: Node, _rp: Node): Expr {
			return unsupported(this, 'exit')
		},
		PrimaryExpr_list(_kw: Node, _lp: Node, _items: Node, _rp: Node): Expr {
			return unsupported(this, 'list() destructuring')
		},
		PrimaryExpr_staticClosure(
			_static: Node,
			_kw: Node,
			_lp: Node,
			_params: Node,
			_rp: Node,
			_use: Node,
			_ret: Node,
			_body: Node
		): Expr {
			return unsupported(this, 'closures')
		},
		PrimaryExpr_closure(
			_kw: Node,
			_lp: Node,
			_params: Node,
			_rp: Node,
			_use: Node,
			_ret: Node,
			_body: Node
		): Expr {
			return unsupported(this, 'closures')
		},
		PrimaryExpr_arrowFunction(
			_kw: Node,
			_lp: Node,
			_params: Node,
			_rp: Node,
			_ret: Node,
			_arrow: Node,
			_body: Node
		): Expr {
			return unsupported(this, 'arrow functions')
		},
		PrimaryExpr_constant(name: Node): Expr {
			const text = nameText(name)
			switch (text.toLowerCase()) {
				case 'true':
					return { kind: 'BoolLiteral', loc: loc(this), value: true }
				case 'false':
					return { kind: 'BoolLiteral', loc: loc(this), value: false }
				case 'null':
					return { kind: 'NullLiteral', loc: loc(this) }
				default:
					return { kind: 'ConstFetch', loc: loc(this), name: text }
			}
		},
		NewExpr_dynamic(_kw: Node, _variable: Node, _args: Node): Expr {
			return unsupported(this, 'dynamic class instantiation')
		},
		NewExpr_anonymous(_kw: Node, _class: Node): Expr {
			return unsupported(this, 'anonymous classes')
		},
		NewExpr_named(_kw: Node, className: Node, argList: Node): Expr {
			return { args: args(argList), className: nameText(className), kind: 'New', loc: loc(this) }
		},
		MatchExpr(
			_kw: Node,
			_lp: Node,
			subject: Node,
			_rp: Node,
			_lb: Node,
			arms: Node,
			_comma: Node,
			_rb: Node
		): Expr {
			return {
				arms: listOf(arms).map((arm) => arm['toMatchArm']()),
				kind: 'Match',
				loc: loc(this),
				subject: expr(subject),
			}
		},
		ArrayLiteral_short(_lb: Node, items: Node, _comma: Node, _rb: Node): Expr {
			return { items: listOf(items).map((item) => item['toArrayItem']()), kind: 'ArrayLiteral', loc: loc(this) }
		},
		ArrayLiteral_long(_kw: Node, _lp: Node, items: Node, _comma: Node, _rp: Node): Expr {
			return { items: listOf(items).map((item) => item['toArrayItem']()), kind: 'ArrayLiteral', loc: loc(this) }
		},
		Argument_spread(_dots: Node, _value: Node): Expr {
			return unsupported(this, 'argument unpacking')
		},
		Argument_named(_name: Node, _colon: Node, _value: Node): Expr {
			return unsupported(this, 'named arguments')
		},
		ParamDefault(_eq: Node, value: Node): Expr {
			return expr(value)
		},
		variable(_dollar: Node, name: Node): Expr {
			return { kind: 'Variable', loc: loc(this), name: name.sourceString }
		},
		variableVariable_nested(_dollar: Node, _more: Node, _name: Node): Expr {
			return unsupported(this, 'variable variables')
		},
		variableVariable_braced(_dollar: Node, _lb: Node, _body: Node, _rb: Node): Expr {
			return unsupported(this, 'variable variables')
		},
		floatLiteral_dotted(_whole: Node, _dot: Node, _fraction: Node, _exponent: Node): Expr {
			return { kind: 'FloatLiteral', loc: loc(this), value: Number(this.sourceString.replaceAll('_', '')) }
		},
		floatLiteral_exponent(_whole: Node, _exponent: Node): Expr {
			return { kind: 'FloatLiteral', loc: loc(this), value: Number(this.sourceString.replaceAll('_', '')) }
		},
		intLiteral_hex(_prefix: Node, _digits: Node): Expr {
			return { kind: 'IntLiteral', loc: loc(this), value: BigInt.asIntN(64, BigInt(this.sourceString)) }
		},
		intLiteral_binary(_prefix: Node, _digits: Node): Expr {
			return { kind: 'IntLiteral', loc: loc(this), value: BigInt.asIntN(64, BigInt(this.sourceString)) }
		},
		intLiteral_decimal(_digits: Node): Expr {
			const digits = this.sourceString.replaceAll('_', '')
			const value = BigInt(digits)
			if (value > 0x7fffffffffffffffn) {
				return { kind: 'FloatLiteral', loc: loc(this), value: Number(digits) }
			}
			return { kind: 'IntLiteral', loc: loc(this), value }
		},
		singleQuoted(_open: Node, chars: Node, _close: Node): Expr {
			const value = chars.children
				.map((c) => {
					const text = c.sourceString
					return text === "\\'" || text === '\\\\' ? text.slice(1) : text
				})
				.join('')
			return { kind: 'StringLiteral', loc: loc(this), value }
		},
		doubleQuoted(_open: Node, parts: Node, _close: Node): Expr {
			const merged: (string | Expr)[] = []
			for (const child of parts.children) {
				const part: string | Expr = child['toPart']()
				const last = merged[merged.length - 1]
				if (typeof part === 'string' && typeof last === 'string') {
					merged[merged.length - 1] = last + part
				} else {
					merged.push(part)
				}
			}
			const [first] = merged
			if (first === undefined) return { kind: 'StringLiteral', loc: loc(this), value: '' }
			if (merged.length === 1 && typeof first === 'string') {
				return { kind: 'StringLiteral', loc: loc(this), value: first }
			}
			return { kind: 'InterpolatedString', loc: loc(this), parts: merged }
		},
	})

	function incDec(node: Node, op: '++' | '--', prefix: boolean, targetNode: Node): Expr {
		const target = expr(targetNode)
		checkAssignable(target, targetNode)
		return { kind: 'IncDec', loc: loc(node), op, prefix, target }
	}

	return semantics
}

/**
 * Parses the unit source held by the context into a syntax tree.
 * Syntax errors are reported as KLPARSE001 diagnostics.
 */
export function parse(context: CompilationContext): ParseResult {
	const session: ParseSession = { base: 0, context, locate: createLocator(context.source) }
	const matchResult = KeelGrammar.match(context.source)

	if (matchResult.failed()) {
		reportMatchFailure(session, matchResult, 0)
		return { succeeded: false }
	}

	const semantics = createAstSemantics(session)
	const errorsBefore = context.getErrorCount()
	const program = semantics(matchResult)['toProgram']() as Program

	return {
		program,
		succeeded: context.getErrorCount() === errorsBefore,
	}
}

/** Whether the source matches the grammar, without building a tree. */
export function matchOnly(source: string): boolean {
	return KeelGrammar.match(source).succeeded()
}
