import assert from 'node:assert'
import { readFile } from 'node:fs/promises'
import { describe, it } from 'node:test'
import { compileAndRun } from '../src/pipeline/units.ts'

async function runFixture(name: string): Promise<string> {
	const source = await readFile(new URL(`./fixtures/${name}`, import.meta.url), 'utf8')
	const result = await compileAndRun([{ filename: name, source }])
	assert.strictEqual(result.uncaught, null, result.uncaught?.message)
	assert.deepStrictEqual(result.leaks, [])
	return result.output
}

describe('fixtures', () => {
	it('basic_arithmetic.php', async () => {
		assert.strictEqual(
			await runFixture('basic_arithmetic.php'),
			[
				'Basic arithmetic test results:',
				'10 + 5 = 15',
				'10 - 5 = 5',
				'10 * 5 = 50',
				'10 / 5 = 2',
				'10 % 3 = 1',
				'2 ^ 3 = 8',
				'',
			].join('\n')
		)
	})

	it('control_flow.php', async () => {
		assert.strictEqual(
			await runFixture('control_flow.php'),
			[
				'Control flow test results:',
				'test_if_else(5): positive',
				'test_if_else(-3): negative',
				'test_if_else(0): zero',
				'test_switch(2): two',
				'test_switch(5): other',
				'test_while_loop(5): [0, 1, 2, 3, 4]',
				'test_for_loop(5): [0, 2, 4, 6, 8]',
				'test_foreach_loop([1,2,3,4,5]): [2, 4, 6, 8, 10]',
				'test_match(3): three',
				'test_match(7): other',
				'',
			].join('\n')
		)
	})

	it('hello.php', async () => {
		assert.strictEqual(
			await runFixture('hello.php'),
			[
				'Hello, World!',
				'The answer is: 42',
				"That's a big number!",
				'Count: 1',
				'Count: 2',
				'Count: 3',
				'',
			].join('\n')
		)
	})

	it('oop.php', async () => {
		assert.strictEqual(
			await runFixture('oop.php'),
			[
				"Hello, I'm Alice and I'm 25 years old.",
				"Hello, I'm Bob and I'm 16 years old. I study at High School.",
				'Is Alice an adult? Yes',
				'Is Bob an adult? No',
				"Bob's school: High School",
				'',
			].join('\n')
		)
	})
})
