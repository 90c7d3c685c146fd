/**
 * Runtime library of the reference interpreter: one implementation per
 * runtime ABI entry.
 *
 * Arguments arrive borrowed except the array an array update consumes;
 * every handle returned is a fresh reference owned by the caller.
 * Exceptions visible to the program go through `Host.raise`.
 */

import type { IrClass, IrType } from '../ir/types.ts'
import {
	type ArrayKey,
	type ArrCell,
	type BoxCell,
	type Heap,
	keyId,
	NULL_PAYLOAD,
	type ObjCell,
	type Payload,
	type RtValue,
	RuntimeFault,
	type StrCell,
} from './heap.ts'
import {
	arrayKey,
	cellPayload,
	compare,
	compareStrings,
	debugRepr,
	floatToInt,
	identical,
	leadingNumber,
	looseEquals,
	type Numeric,
	payloadOf,
	toBool,
	toFloat,
	toInt,
	toNumeric,
	toStr,
	typeName,
	wrap,
} from './values.ts'

export const BuiltinClass = {
	ArithmeticError: 'ArithmeticError',
	DivisionByZeroError: 'DivisionByZeroError',
	Error: 'Error',
	TypeError: 'TypeError',
} as const

/** What the library needs from the machine running it */
export interface Host {
	readonly heap: Heap
	/** Construct a built-in exception and throw it into the program */
	raise(className: string, message: string): never
	echo(text: string): void
	require(unit: string): void
	call(name: string, args: readonly RtValue[]): RtValue | undefined
	/** Parameter types of a program function, receiver included */
	signature(name: string): readonly IrType[]
	isInstance(cls: IrClass, className: string): boolean
}

export type RuntimeEntry = (host: Host, args: readonly RtValue[]) => RtValue | undefined

// ============================================================================
// Arguments
// ============================================================================

function arg(args: readonly RtValue[], i: number): RtValue {
	const value = args[i]
	if (value === undefined) throw new RuntimeFault(`missing argument ${i}`)
	return value
}

function int(args: readonly RtValue[], i: number): bigint {
	const value = arg(args, i)
	if (typeof value !== 'bigint') throw new RuntimeFault(`argument ${i} is not an i64`)
	return value
}

function float(args: readonly RtValue[], i: number): number {
	const value = arg(args, i)
	if (typeof value !== 'number') throw new RuntimeFault(`argument ${i} is not an f64`)
	return value
}

function bool(args: readonly RtValue[], i: number): boolean {
	const value = arg(args, i)
	if (typeof value !== 'boolean') throw new RuntimeFault(`argument ${i} is not an i1`)
	return value
}

function str(args: readonly RtValue[], i: number): StrCell {
	const value = arg(args, i)
	if (typeof value !== 'object' || value.kind !== 'str') throw new RuntimeFault(`argument ${i} is not a str`)
	return value
}

function arr(args: readonly RtValue[], i: number): ArrCell {
	const value = arg(args, i)
	if (typeof value !== 'object' || value.kind !== 'arr') throw new RuntimeFault(`argument ${i} is not an arr`)
	return value
}

function box(args: readonly RtValue[], i: number): BoxCell {
	const value = arg(args, i)
	if (typeof value !== 'object' || value.kind !== 'box') throw new RuntimeFault(`argument ${i} is not a box`)
	return value
}

function obj(args: readonly RtValue[], i: number): ObjCell {
	const value = arg(args, i)
	if (typeof value !== 'object' || value.kind !== 'obj') throw new RuntimeFault(`argument ${i} is not an obj`)
	return value
}

// ============================================================================
// Values
// ============================================================================

/** Owned register value of `type` holding `payload`, coercing scalars */
export function toRegister(heap: Heap, payload: Payload, type: IrType): RtValue {
	switch (type) {
		case 'i64':
			return toInt(payload)
		case 'f64':
			return toFloat(payload)
		case 'i1':
			return toBool(payload)
		case 'box':
			return heap.box(payload)
		case 'str': {
			if (payload.t === 'str') {
				heap.retain(payload.ref)
				return payload.ref
			}
			const text = toStr(payload)
			if (text === null) throw new RuntimeFault(`${typeName(payload)} held where a string is expected`)
			return heap.str(text)
		}
		case 'arr':
		case 'obj':
			if (payload.t !== type) throw new RuntimeFault(`${typeName(payload)} held where ${type} is expected`)
			heap.retain(payload.ref)
			return payload.ref
		case 'fn':
		case 'void':
			throw new RuntimeFault(`no register of type ${type}`)
	}
}

/** Owned box of a register value */
export function boxValue(heap: Heap, value: RtValue | undefined): BoxCell {
	if (value === undefined) return heap.box(NULL_PAYLOAD)
	if (typeof value === 'object' && value.kind === 'box') {
		heap.retain(value)
		return value
	}
	return heap.box(payloadOf(value))
}

function zeroValue(host: Host, type: IrType, key: ArrayKey): RtValue {
	switch (type) {
		case 'i64':
			return 0n
		case 'f64':
			return 0
		case 'i1':
			return false
		case 'str':
			return host.heap.str('')
		case 'arr':
			return host.heap.arr()
		case 'box':
			return host.heap.box(NULL_PAYLOAD)
		default:
			return host.raise(BuiltinClass.Error, `Undefined array key ${typeof key === 'string' ? `"${key}"` : key}`)
	}
}

const UNBOX_TYPES: Partial<Record<IrType, string>> = {
	arr: 'array',
	f64: 'float',
	i1: 'bool',
	i64: 'int',
	str: 'string',
}

/** Strict conversion of a boxed value to a typed register */
function unbox(host: Host, payload: Payload, type: IrType): RtValue {
	if (payload.t === 'null') {
		if (type === 'arr') return host.raise(BuiltinClass.TypeError, 'array expected, null given')
		return zeroValue(host, type, '')
	}
	const accepted =
		(type === 'i64' && payload.t === 'int') ||
		(type === 'f64' && (payload.t === 'float' || payload.t === 'int')) ||
		(type === 'i1' && payload.t === 'bool') ||
		(type === 'str' && payload.t === 'str') ||
		(type === 'arr' && payload.t === 'arr') ||
		type === 'box'
	if (!accepted) {
		return host.raise(BuiltinClass.TypeError, `${UNBOX_TYPES[type] ?? type} expected, ${typeName(payload)} given`)
	}
	return toRegister(host.heap, payload, type)
}

/** Strict conversion to an object, of `className` unless it is `null` */
function unboxObject(host: Host, payload: Payload, className: string | null): ObjCell {
	if (payload.t !== 'obj' || (className !== null && !host.isInstance(payload.ref.cls, className))) {
		return host.raise(BuiltinClass.TypeError, `${className ?? 'object'} expected, ${typeName(payload)} given`)
	}
	host.heap.retain(payload.ref)
	return payload.ref
}

function stringOf(host: Host, payload: Payload): string {
	const text = toStr(payload)
	if (text === null) {
		return host.raise(BuiltinClass.Error, `Object of class ${typeName(payload)} could not be converted to string`)
	}
	return text
}

function releaseRegister(heap: Heap, value: RtValue | undefined): void {
	if (typeof value === 'object') heap.release(value)
}

// ============================================================================
// Arrays
// ============================================================================

const orderCache = new WeakMap<ArrCell, { readonly version: number; readonly keys: readonly string[] }>()

function entryAt(array: ArrCell, index: bigint): { readonly key: ArrayKey; readonly value: Payload } {
	let cached = orderCache.get(array)
	if (cached === undefined || cached.version !== array.version) {
		cached = { keys: [...array.entries.keys()], version: array.version }
		orderCache.set(array, cached)
	}
	const id = cached.keys[Number(index)]
	const entry = id === undefined ? undefined : array.entries.get(id)
	if (entry === undefined) throw new RuntimeFault(`array position ${index} out of range`)
	return entry
}

/** An array the caller may mutate: `array` itself when unshared, else a copy */
function separate(heap: Heap, array: ArrCell): ArrCell {
	if (array.rc === 1) return array
	const copy = heap.arr()
	for (const [id, entry] of array.entries) {
		heap.retainPayload(entry.value)
		copy.entries.set(id, { key: entry.key, value: entry.value })
	}
	copy.nextIndex = array.nextIndex
	heap.release(array)
	return copy
}

function store(heap: Heap, array: ArrCell, key: ArrayKey, value: Payload): void {
	heap.retainPayload(value)
	const id = keyId(key)
	const existing = array.entries.get(id)
	if (existing !== undefined) {
		const previous = existing.value
		existing.value = value
		heap.releasePayload(previous)
		return
	}
	array.entries.set(id, { key, value })
	array.version++
	if (typeof key === 'bigint' && key >= array.nextIndex) array.nextIndex = key + 1n
}

function remove(heap: Heap, array: ArrCell, key: ArrayKey): void {
	const id = keyId(key)
	const existing = array.entries.get(id)
	if (existing === undefined) return
	array.entries.delete(id)
	array.version++
	heap.releasePayload(existing.value)
}

function keyPayload(heap: Heap, key: ArrayKey): Payload {
	return typeof key === 'bigint' ? { t: 'int', v: key } : { ref: heap.str(key), t: 'str' }
}

function lookupKey(host: Host, key: BoxCell): ArrayKey {
	const payload = key.value
	if (payload.t === 'arr' || payload.t === 'obj') return host.raise(BuiltinClass.TypeError, 'Illegal offset type')
	return arrayKey(payload)
}

function arrayGet(type: IrType): RuntimeEntry {
	return (host, args) => {
		const key = arrayKey(box(args, 1).value)
		const entry = arr(args, 0).entries.get(keyId(key))
		if (entry === undefined) return zeroValue(host, type, key)
		return toRegister(host.heap, entry.value, type)
	}
}

function keyAt(type: IrType): RuntimeEntry {
	return (host, args) => {
		const { key } = entryAt(arr(args, 0), int(args, 1))
		if (type === 'i64') {
			if (typeof key !== 'bigint') throw new RuntimeFault('string key read as i64')
			return key
		}
		if (type === 'str') return host.heap.str(String(key))
		const payload = keyPayload(host.heap, key)
		const boxed = host.heap.box(payload)
		host.heap.releasePayload(payload)
		return boxed
	}
}

function valueAt(type: IrType): RuntimeEntry {
	return (host, args) => toRegister(host.heap, entryAt(arr(args, 0), int(args, 1)).value, type)
}

function stringKeyOf(heap: Heap, text: string): Payload {
	return { ref: heap.str(text), t: 'str' }
}

/** Array form of a value, as `(array)` produces it */
function castToArray(host: Host, payload: Payload): ArrCell {
	const { heap } = host
	if (payload.t === 'arr') {
		heap.retain(payload.ref)
		return payload.ref
	}
	const result = heap.arr()
	if (payload.t === 'null') return result
	if (payload.t !== 'obj') {
		store(heap, result, 0n, payload)
		return result
	}
	payload.ref.cls.slots.forEach((slot, i) => {
		const value = payload.ref.slots[i]
		if (value === undefined) return
		const name = stringKeyOf(heap, slot.name)
		store(heap, result, arrayKey(name), payloadOf(value))
		heap.releasePayload(name)
	})
	return result
}

// ============================================================================
// Arithmetic
// ============================================================================

const INT_MIN = -(2n ** 63n)

export function intPow(base: bigint, exponent: bigint): bigint {
	if (exponent < 0n) {
		if (base === 1n) return 1n
		if (base === -1n) return exponent % 2n === 0n ? 1n : -1n
		return 0n
	}
	let result = 1n
	let factor = base
	let rest = exponent
	while (rest > 0n) {
		if (rest & 1n) result = wrap(result * factor)
		factor = wrap(factor * factor)
		rest >>= 1n
	}
	return result
}

type MixedOp = '+' | '-' | '*' | '/' | '**'

function numericOperand(host: Host, op: MixedOp, a: Payload, b: Payload, side: Payload): Numeric {
	const n = toNumeric(side)
	if (n === null) {
		return host.raise(BuiltinClass.TypeError, `Unsupported operand types: ${typeName(a)} ${op} ${typeName(b)}`)
	}
	return n
}

function mixedArithmetic(host: Host, op: MixedOp, a: Payload, b: Payload): Payload {
	if (op === '+' && a.t === 'arr' && b.t === 'arr') {
		return { ref: union2(host.heap, a.ref, b.ref), t: 'arr' }
	}
	const x = numericOperand(host, op, a, b, a)
	const y = numericOperand(host, op, a, b, b)
	if (op === '/' && Number(y.v) === 0) return host.raise(BuiltinClass.DivisionByZeroError, 'Division by zero')
	if (x.t === 'int' && y.t === 'int') {
		switch (op) {
			case '+':
				return { t: 'int', v: wrap(x.v + y.v) }
			case '-':
				return { t: 'int', v: wrap(x.v - y.v) }
			case '*':
				return { t: 'int', v: wrap(x.v * y.v) }
			case '/':
				return { t: 'int', v: wrap(x.v / y.v) }
			case '**':
				if (y.v >= 0n) return { t: 'int', v: intPow(x.v, y.v) }
				return { t: 'float', v: Number(x.v) ** Number(y.v) }
		}
	}
	const l = Number(x.v)
	const r = Number(y.v)
	switch (op) {
		case '+':
			return { t: 'float', v: l + r }
		case '-':
			return { t: 'float', v: l - r }
		case '*':
			return { t: 'float', v: l * r }
		case '/':
			return { t: 'float', v: l / r }
		case '**':
			return { t: 'float', v: l ** r }
	}
}

function union2(heap: Heap, left: ArrCell, right: ArrCell): ArrCell {
	const result = heap.arr()
	for (const entry of left.entries.values()) store(heap, result, entry.key, entry.value)
	for (const [id, entry] of right.entries) {
		if (!result.entries.has(id)) store(heap, result, entry.key, entry.value)
	}
	return result
}

function mixed(op: MixedOp): RuntimeEntry {
	return (host, args) => {
		const result = mixedArithmetic(host, op, box(args, 0).value, box(args, 1).value)
		const boxed = host.heap.box(result)
		host.heap.releasePayload(result)
		return boxed
	}
}

/** Round half away from zero, after trimming representation error */
export function roundHalfAway(value: number, precision: number): number {
	if (!Number.isFinite(value)) return value
	const factor = 10 ** precision
	const scaled = Number((Math.abs(value) * factor).toPrecision(15))
	const rounded = Math.round(scaled) / factor
	return value < 0 ? -rounded : rounded
}

export function numberFormat(value: number, decimals: number): string {
	const places = Math.max(decimals, 0)
	const rounded = roundHalfAway(value, places)
	const [whole = '0', fraction] = Math.abs(rounded).toFixed(places).split('.')
	const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')
	const negative = rounded < 0 && /[1-9]/.test(`${whole}${fraction ?? ''}`)
	return `${negative ? '-' : ''}${grouped}${fraction === undefined ? '' : `.${fraction}`}`
}

function pick(choose: (order: bigint) => boolean): RuntimeEntry {
	return (host, args) => {
		const a = box(args, 0)
		const b = box(args, 1)
		const chosen = choose(compare(b.value, a.value)) ? b : a
		host.heap.retain(chosen)
		return chosen
	}
}

// ============================================================================
// Objects
// ============================================================================

function slotIndex(object: ObjCell, name: string): number {
	return object.cls.slots.findIndex((slot) => slot.name === name)
}

function dynamicCall(host: Host, args: readonly RtValue[]): RtValue {
	const receiver = box(args, 0).value
	const method = str(args, 1).value
	if (receiver.t !== 'obj') {
		return host.raise(BuiltinClass.Error, `Call to a member function ${method}() on ${typeName(receiver)}`)
	}
	const object = receiver.ref
	const target = object.cls.methods.get(method.toLowerCase())
	if (target === undefined) {
		return host.raise(BuiltinClass.Error, `Call to undefined method ${object.cls.name}::${method}()`)
	}
	const params = host.signature(target).slice(1)
	const given = args.slice(2)
	if (given.length < params.length) {
		return host.raise(
			BuiltinClass.Error,
			`Too few arguments to function ${object.cls.name}::${method}(), ${given.length} passed and ${params.length} expected`
		)
	}
	const converted: RtValue[] = []
	try {
		params.forEach((type, i) => {
			const value = box(given, i)
			if (type === 'box') converted.push(boxValue(host.heap, value))
			else if (type === 'obj') converted.push(unboxObject(host, value.value, null))
			else converted.push(unbox(host, value.value, type))
		})
		const result = host.call(target, [object, ...converted])
		const boxed = boxValue(host.heap, result)
		releaseRegister(host.heap, result)
		return boxed
	} finally {
		for (const value of converted) releaseRegister(host.heap, value)
	}
}

function propertyGet(host: Host, args: readonly RtValue[]): RtValue {
	const target = box(args, 0).value
	const name = str(args, 1).value
	if (target.t !== 'obj') return host.heap.box(NULL_PAYLOAD)
	const index = slotIndex(target.ref, name)
	if (index < 0) return host.heap.box(NULL_PAYLOAD)
	const value = target.ref.slots[index]
	if (value === undefined) {
		return host.raise(
			BuiltinClass.Error,
			`Typed property ${target.ref.cls.name}::$${name} must not be accessed before initialization`
		)
	}
	return boxValue(host.heap, value)
}

function propertySet(host: Host, args: readonly RtValue[]): undefined {
	const target = box(args, 0).value
	const name = str(args, 1).value
	const value = box(args, 2).value
	if (target.t !== 'obj') {
		return host.raise(BuiltinClass.Error, `Attempt to assign property "${name}" on ${typeName(target)}`)
	}
	const object = target.ref
	const index = slotIndex(object, name)
	const slot = object.cls.slots[index]
	if (slot === undefined) {
		return host.raise(BuiltinClass.Error, `Cannot create dynamic property ${object.cls.name}::$${name}`)
	}
	const stored = slot.type === 'obj' ? unboxObject(host, value, null) : unbox(host, value, slot.type)
	const previous = object.slots[index]
	object.slots[index] = stored
	releaseRegister(host.heap, previous)
	return undefined
}

function propertyIsset(args: readonly RtValue[]): boolean {
	const target = box(args, 0).value
	if (target.t !== 'obj') return false
	const value = target.ref.slots[slotIndex(target.ref, str(args, 1).value)]
	if (value === undefined) return false
	return typeof value !== 'object' || value.kind !== 'box' || value.value.t !== 'null'
}

// ============================================================================
// Mixed containers
// ============================================================================

function mixedIndex(host: Host, args: readonly RtValue[]): RtValue {
	const container = box(args, 0).value
	const key = box(args, 1)
	switch (container.t) {
		case 'arr': {
			const entry = container.ref.entries.get(keyId(lookupKey(host, key)))
			return host.heap.box(entry === undefined ? NULL_PAYLOAD : entry.value)
		}
		case 'str': {
			const text = container.ref.value
			const offset = Number(toInt(key.value))
			const at = offset < 0 ? text.length + offset : offset
			const char = text.charAt(at)
			const payload = stringKeyOf(host.heap, at >= 0 ? char : '')
			const boxed = host.heap.box(payload)
			host.heap.releasePayload(payload)
			return boxed
		}
		case 'obj':
			return host.raise(BuiltinClass.Error, `Cannot use object of type ${container.ref.cls.name} as array`)
		default:
			return host.heap.box(NULL_PAYLOAD)
	}
}

function mixedIsset(args: readonly RtValue[]): boolean {
	const container = box(args, 0).value
	const key = box(args, 1).value
	if (container.t === 'arr') {
		if (key.t === 'arr' || key.t === 'obj') return false
		const entry = container.ref.entries.get(keyId(arrayKey(key)))
		return entry !== undefined && entry.value.t !== 'null'
	}
	if (container.t === 'str') {
		const length = container.ref.value.length
		const offset = toInt(key)
		return offset < BigInt(length) && offset >= -BigInt(length)
	}
	return false
}

function mixedUnset(host: Host, args: readonly RtValue[]): RtValue {
	const container = box(args, 0).value
	const key = box(args, 1)
	switch (container.t) {
		case 'arr': {
			const id = lookupKey(host, key)
			host.heap.retain(container.ref)
			const updated = separate(host.heap, container.ref)
			remove(host.heap, updated, id)
			const payload: Payload = { ref: updated, t: 'arr' }
			const boxed = host.heap.box(payload)
			host.heap.release(updated)
			return boxed
		}
		case 'null':
			return host.heap.box(NULL_PAYLOAD)
		case 'str':
			return host.raise(BuiltinClass.Error, 'Cannot unset string offsets')
		default:
			return host.raise(BuiltinClass.Error, 'Cannot unset offset in a non-array variable')
	}
}

// ============================================================================
// Table
// ============================================================================

function strResult(host: Host, text: string): StrCell {
	return host.heap.str(text)
}

const ENTRIES: Record<string, RuntimeEntry> = {
	rt_abs_float: (_, args) => Math.abs(float(args, 0)),
	rt_abs_int: (_, args) => {
		const value = int(args, 0)
		return value === INT_MIN ? value : value < 0n ? -value : value
	},
	rt_abs_mixed: (host, args) => {
		const payload = box(args, 0).value
		const n = toNumeric(payload)
		if (n === null) {
			return host.raise(BuiltinClass.TypeError, `abs(): Argument #1 ($num) must be of type int|float, ${typeName(payload)} given`)
		}
		const result: Payload =
			n.t === 'int' ? { t: 'int', v: n.v === INT_MIN ? n.v : n.v < 0n ? -n.v : n.v } : { t: 'float', v: Math.abs(n.v) }
		return host.heap.box(result)
	},
	rt_array_count: (_, args) => BigInt(arr(args, 0).entries.size),
	rt_array_get_arr: arrayGet('arr'),
	rt_array_get_box: arrayGet('box'),
	rt_array_get_f64: arrayGet('f64'),
	rt_array_get_i1: arrayGet('i1'),
	rt_array_get_i64: arrayGet('i64'),
	rt_array_get_obj: arrayGet('obj'),
	rt_array_get_str: arrayGet('str'),
	rt_array_has: (_, args) => {
		const entry = arr(args, 0).entries.get(keyId(arrayKey(box(args, 1).value)))
		return entry !== undefined && entry.value.t !== 'null'
	},
	rt_array_key_at_box: keyAt('box'),
	rt_array_key_at_i64: keyAt('i64'),
	rt_array_key_at_str: keyAt('str'),
	rt_array_keys: (host, args) => {
		const result = host.heap.arr()
		let index = 0n
		for (const entry of arr(args, 0).entries.values()) {
			const key = keyPayload(host.heap, entry.key)
			store(host.heap, result, index++, key)
			host.heap.releasePayload(key)
		}
		return result
	},
	rt_array_new: (host) => host.heap.arr(),
	rt_array_push: (host, args) => {
		const array = separate(host.heap, arr(args, 0))
		store(host.heap, array, array.nextIndex, box(args, 1).value)
		return array
	},
	rt_array_set: (host, args) => {
		const key = arrayKey(box(args, 1).value)
		const array = separate(host.heap, arr(args, 0))
		store(host.heap, array, key, box(args, 2).value)
		return array
	},
	rt_array_union: (host, args) => union2(host.heap, arr(args, 0), arr(args, 1)),
	rt_array_unset: (host, args) => {
		const key = arrayKey(box(args, 1).value)
		const array = separate(host.heap, arr(args, 0))
		remove(host.heap, array, key)
		return array
	},
	rt_array_value_at_arr: valueAt('arr'),
	rt_array_value_at_box: valueAt('box'),
	rt_array_value_at_f64: valueAt('f64'),
	rt_array_value_at_i1: valueAt('i1'),
	rt_array_value_at_i64: valueAt('i64'),
	rt_array_value_at_obj: valueAt('obj'),
	rt_array_value_at_str: valueAt('str'),
	rt_autovivify: (host, args) => {
		const payload = box(args, 0).value
		if (payload.t === 'null') return host.heap.arr()
		if (payload.t === 'arr') {
			host.heap.retain(payload.ref)
			return payload.ref
		}
		return host.raise(BuiltinClass.Error, 'Cannot use a scalar value as an array')
	},
	rt_bool_to_str: (host, args) => strResult(host, bool(args, 0) ? '1' : ''),
	rt_box_arr: (host, args) => host.heap.box(cellPayload(arr(args, 0))),
	rt_box_bool: (host, args) => host.heap.box({ t: 'bool', v: bool(args, 0) }),
	rt_box_float: (host, args) => host.heap.box({ t: 'float', v: float(args, 0) }),
	rt_box_instance_of: (host, args) => {
		const payload = box(args, 0).value
		return payload.t === 'obj' && host.isInstance(payload.ref.cls, str(args, 1).value)
	},
	rt_box_int: (host, args) => host.heap.box({ t: 'int', v: int(args, 0) }),
	rt_box_null: (host) => host.heap.box(NULL_PAYLOAD),
	rt_box_obj: (host, args) => host.heap.box(cellPayload(obj(args, 0))),
	rt_box_str: (host, args) => host.heap.box(cellPayload(str(args, 0))),
	rt_ceil: (_, args) => Math.ceil(float(args, 0)),
	rt_concat: (host, args) => strResult(host, str(args, 0).value + str(args, 1).value),
	rt_cos: (_, args) => Math.cos(float(args, 0)),
	rt_count: (_, args) => BigInt(arr(args, 0).entries.size),
	rt_debug_repr: (host, args) => strResult(host, debugRepr(box(args, 0).value)),
	rt_dyn_call: dynamicCall,
	rt_dyn_prop_get: propertyGet,
	rt_dyn_prop_isset: (_, args) => propertyIsset(args),
	rt_dyn_prop_set: propertySet,
	rt_echo: (host, args) => {
		host.echo(str(args, 0).value)
		return undefined
	},
	rt_float_cmp: (_, args) => {
		const a = float(args, 0)
		const b = float(args, 1)
		return a < b ? -1n : a > b ? 1n : a === b ? 0n : 1n
	},
	rt_float_to_int: (_, args) => floatToInt(float(args, 0)),
	rt_float_to_str: (host, args) => strResult(host, toStr({ t: 'float', v: float(args, 0) }) ?? ''),
	rt_floor: (_, args) => Math.floor(float(args, 0)),
	rt_fpow: (_, args) => float(args, 0) ** float(args, 1),
	rt_identical: (_, args) => identical(box(args, 0).value, box(args, 1).value),
	rt_implode: (host, args) => {
		const parts = [...arr(args, 1).entries.values()].map((entry) => stringOf(host, entry.value))
		return strResult(host, parts.join(str(args, 0).value))
	},
	rt_in_array: (_, args) => {
		const needle = box(args, 0).value
		return [...arr(args, 1).entries.values()].some((entry) => looseEquals(entry.value, needle))
	},
	rt_int_cmp: (_, args) => {
		const a = int(args, 0)
		const b = int(args, 1)
		return a < b ? -1n : a > b ? 1n : 0n
	},
	rt_int_to_str: (host, args) => strResult(host, int(args, 0).toString()),
	rt_intdiv: (host, args) => {
		const a = int(args, 0)
		const b = int(args, 1)
		if (b === 0n) return host.raise(BuiltinClass.DivisionByZeroError, 'Division by zero')
		if (a === INT_MIN && b === -1n) {
			return host.raise(BuiltinClass.ArithmeticError, 'Division of PHP_INT_MIN by -1 is not an integer')
		}
		return a / b
	},
	rt_ipow: (_, args) => intPow(int(args, 0), int(args, 1)),
	rt_is_null: (_, args) => box(args, 0).value.t === 'null',
	rt_loose_eq: (_, args) => looseEquals(box(args, 0).value, box(args, 1).value),
	rt_max_float: (_, args) => Math.max(float(args, 0), float(args, 1)),
	rt_max_int: (_, args) => {
		const a = int(args, 0)
		const b = int(args, 1)
		return b > a ? b : a
	},
	rt_max_mixed: pick((order) => order > 0n),
	rt_min_float: (_, args) => Math.min(float(args, 0), float(args, 1)),
	rt_min_int: (_, args) => {
		const a = int(args, 0)
		const b = int(args, 1)
		return b < a ? b : a
	},
	rt_min_mixed: pick((order) => order < 0n),
	rt_mixed_add: mixed('+'),
	rt_mixed_cmp: (_, args) => compare(box(args, 0).value, box(args, 1).value),
	rt_mixed_div: mixed('/'),
	rt_mixed_index: mixedIndex,
	rt_mixed_isset_index: (_, args) => mixedIsset(args),
	rt_mixed_mul: mixed('*'),
	rt_mixed_pow: mixed('**'),
	rt_mixed_sub: mixed('-'),
	rt_mixed_unset: mixedUnset,
	rt_number_format: (host, args) => strResult(host, numberFormat(float(args, 0), Number(int(args, 1)))),
	rt_obj_identical: (_, args) => obj(args, 0) === obj(args, 1),
	rt_require: (host, args) => {
		host.require(str(args, 0).value)
		return undefined
	},
	rt_round: (_, args) => roundHalfAway(float(args, 0), Number(int(args, 1))),
	rt_shl: (host, args) => {
		const shift = int(args, 1)
		if (shift < 0n) return host.raise(BuiltinClass.ArithmeticError, 'Bit shift by negative number')
		return shift >= 64n ? 0n : wrap(int(args, 0) << shift)
	},
	rt_shr: (host, args) => {
		const value = int(args, 0)
		const shift = int(args, 1)
		if (shift < 0n) return host.raise(BuiltinClass.ArithmeticError, 'Bit shift by negative number')
		if (shift >= 64n) return value < 0n ? -1n : 0n
		return value >> shift
	},
	rt_sin: (_, args) => Math.sin(float(args, 0)),
	rt_sqrt: (_, args) => Math.sqrt(float(args, 0)),
	rt_str_cmp: (_, args) => compareStrings(str(args, 0).value, str(args, 1).value),
	rt_str_eq: (_, args) => str(args, 0).value === str(args, 1).value,
	rt_str_isset_offset: (_, args) => {
		const length = BigInt(str(args, 0).value.length)
		const offset = int(args, 1)
		return offset < length && offset >= -length
	},
	rt_str_offset: (host, args) => {
		const text = str(args, 0).value
		const offset = Number(int(args, 1))
		const at = offset < 0 ? text.length + offset : offset
		return strResult(host, at >= 0 ? text.charAt(at) : '')
	},
	rt_str_repeat: (host, args) => {
		const times = int(args, 1)
		if (times < 0n) {
			return host.raise(BuiltinClass.Error, 'str_repeat(): Argument #2 ($times) must be greater than or equal to 0')
		}
		return strResult(host, str(args, 0).value.repeat(Number(times)))
	},
	rt_str_to_bool: (_, args) => toBool(cellPayload(str(args, 0))),
	rt_str_to_float: (_, args) => Number(leadingNumber(str(args, 0).value).v),
	rt_str_to_int: (_, args) => toInt(cellPayload(str(args, 0))),
	rt_strlen: (_, args) => BigInt(str(args, 0).value.length),
	rt_strtolower: (host, args) => strResult(host, str(args, 0).value.replace(/[A-Z]/g, (c) => c.toLowerCase())),
	rt_strtoupper: (host, args) => strResult(host, str(args, 0).value.replace(/[a-z]/g, (c) => c.toUpperCase())),
	rt_to_arr: (host, args) => castToArray(host, box(args, 0).value),
	rt_to_bool: (_, args) => toBool(box(args, 0).value),
	rt_to_float: (_, args) => toFloat(box(args, 0).value),
	rt_to_int: (_, args) => toInt(box(args, 0).value),
	rt_to_str: (host, args) => strResult(host, stringOf(host, box(args, 0).value)),
	rt_unbox_arr: (host, args) => unbox(host, box(args, 0).value, 'arr'),
	rt_unbox_bool: (host, args) => unbox(host, box(args, 0).value, 'i1'),
	rt_unbox_float: (host, args) => unbox(host, box(args, 0).value, 'f64'),
	rt_unbox_int: (host, args) => unbox(host, box(args, 0).value, 'i64'),
	rt_unbox_obj: (host, args) => unboxObject(host, box(args, 0).value, str(args, 1).value),
	rt_unbox_str: (host, args) => unbox(host, box(args, 0).value, 'str'),
}

export const RUNTIME_LIBRARY: ReadonlyMap<string, RuntimeEntry> = new Map(Object.entries(ENTRIES))
