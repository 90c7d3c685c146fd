/**
 * Reference-counted heap of the reference runtime.
 *
 * Strings, arrays, boxes and objects live in cells carrying a count. The
 * heap keeps every live cell, so a finished program can be checked for
 * leaks; touching a freed cell is a fault.
 */

import type { IrClass } from '../ir/types.ts'

export type ArrayKey = bigint | string

/** Unboxed payload of a box or an array element */
export type Payload =
	| { readonly t: 'null' }
	| { readonly t: 'int'; readonly v: bigint }
	| { readonly t: 'float'; readonly v: number }
	| { readonly t: 'bool'; readonly v: boolean }
	| { readonly t: 'str'; readonly ref: StrCell }
	| { readonly t: 'arr'; readonly ref: ArrCell }
	| { readonly t: 'obj'; readonly ref: ObjCell }

interface CellBase {
	readonly id: number
	rc: number
	freed: boolean
}

export interface StrCell extends CellBase {
	readonly kind: 'str'
	readonly value: string
}

export interface ArrEntry {
	readonly key: ArrayKey
	value: Payload
}

export interface ArrCell extends CellBase {
	readonly kind: 'arr'
	/** Insertion order; keyed by `keyId` */
	readonly entries: Map<string, ArrEntry>
	nextIndex: bigint
	/** Bumped whenever a key is added or removed */
	version: number
}

export interface BoxCell extends CellBase {
	readonly kind: 'box'
	readonly value: Payload
}

export interface ObjCell extends CellBase {
	readonly kind: 'obj'
	readonly cls: IrClass
	/** `undefined` for a slot never written */
	readonly slots: (RtValue | undefined)[]
}

export type Cell = StrCell | ArrCell | BoxCell | ObjCell

/** A register value: scalars by value, handles by cell */
export type RtValue = bigint | number | boolean | string | Cell

export const NULL_PAYLOAD: Payload = { t: 'null' }

/**
 * Broken heap discipline or machine state. Never visible to the running
 * program as an exception.
 */
export class RuntimeFault extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'RuntimeFault'
	}
}

export function isCell(value: RtValue | undefined): value is Cell {
	return typeof value === 'object'
}

export function keyId(key: ArrayKey): string {
	return typeof key === 'bigint' ? `i:${key}` : `s:${key}`
}

function payloadRef(payload: Payload): Cell | null {
	return payload.t === 'str' || payload.t === 'arr' || payload.t === 'obj' ? payload.ref : null
}

export class Heap {
	private readonly live = new Map<number, Cell>()
	private nextId = 0
	/** Cells ever allocated */
	allocated = 0

	private track<T extends Cell>(cell: T): T {
		this.live.set(cell.id, cell)
		this.allocated++
		return cell
	}

	private base(): CellBase {
		return { freed: false, id: this.nextId++, rc: 1 }
	}

	str(value: string): StrCell {
		return this.track({ ...this.base(), kind: 'str', value })
	}

	arr(): ArrCell {
		return this.track({ ...this.base(), entries: new Map(), kind: 'arr', nextIndex: 0n, version: 0 })
	}

	/** Box `payload`, taking a new reference to the cell it points at */
	box(payload: Payload): BoxCell {
		this.retainPayload(payload)
		return this.track({ ...this.base(), kind: 'box', value: payload })
	}

	obj(cls: IrClass): ObjCell {
		return this.track({ ...this.base(), cls, kind: 'obj', slots: cls.slots.map(() => undefined) })
	}

	// ==========================================================================
	// Counting
	// ==========================================================================

	private check(cell: Cell, action: string): void {
		if (cell.freed) throw new RuntimeFault(`${action} of freed ${cell.kind} #${cell.id}`)
	}

	retain(cell: Cell): void {
		this.check(cell, 'rc_inc')
		cell.rc++
	}

	release(cell: Cell): void {
		this.check(cell, 'rc_dec')
		cell.rc--
		if (cell.rc > 0) return
		cell.freed = true
		this.live.delete(cell.id)
		switch (cell.kind) {
			case 'arr':
				for (const entry of cell.entries.values()) this.releasePayload(entry.value)
				break
			case 'box':
				this.releasePayload(cell.value)
				break
			case 'obj':
				for (const slot of cell.slots) if (isCell(slot)) this.release(slot)
				break
		}
	}

	retainPayload(payload: Payload): void {
		const ref = payloadRef(payload)
		if (ref !== null) this.retain(ref)
	}

	releasePayload(payload: Payload): void {
		const ref = payloadRef(payload)
		if (ref !== null) this.release(ref)
	}

	/** Fault unless `cell` is still allocated */
	touch(cell: Cell): void {
		this.check(cell, 'use')
	}

	/** Cells still allocated */
	leaks(): Cell[] {
		return [...this.live.values()]
	}
}
