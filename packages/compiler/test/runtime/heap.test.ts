import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Heap, RuntimeFault } from '../../src/runtime/heap.ts'

describe('runtime/heap', () => {
	it('should free a cell when its count reaches zero', () => {
		const heap = new Heap()
		const cell = heap.str('hello')
		heap.retain(cell)
		heap.release(cell)
		assert.deepStrictEqual(heap.leaks(), [cell])
		heap.release(cell)
		assert.deepStrictEqual(heap.leaks(), [])
		assert.strictEqual(cell.freed, true)
		assert.strictEqual(heap.allocated, 1)
	})

	it('should release what a box holds along with the box', () => {
		const heap = new Heap()
		const text = heap.str('inner')
		const box = heap.box({ ref: text, t: 'str' })
		heap.release(text)
		assert.strictEqual(text.rc, 1)
		heap.release(box)
		assert.deepStrictEqual(heap.leaks(), [])
	})

	it('should fault on a double free', () => {
		const heap = new Heap()
		const cell = heap.arr()
		heap.release(cell)
		assert.throws(() => heap.release(cell), RuntimeFault)
		assert.throws(() => heap.touch(cell), /use of freed arr #0/)
	})
})
