import assert from 'node:assert'
import { describe, it } from 'node:test'
import { DIAGNOSTICS, getDiagnostic, interpolateMessage, isValidDiagnosticCode } from '../src/index.ts'

describe('interpolateMessage', () => {
	it('should replace every placeholder', () => {
		assert.strictEqual(
			interpolateMessage('unit `{unit}` depends on unknown unit `{dependency}`', { dependency: 'util', unit: 'main' }),
			'unit `main` depends on unknown unit `util`'
		)
	})

	it('should leave unknown placeholders in place', () => {
		assert.strictEqual(interpolateMessage('file not found: {path}', {}), 'file not found: {path}')
	})

	it('should render integer arguments of any width', () => {
		assert.strictEqual(
			interpolateMessage('{count} of {limit}', { count: 3, limit: 9223372036854775807n }),
			'3 of 9223372036854775807'
		)
	})

	it('should return the message unchanged without arguments', () => {
		assert.strictEqual(interpolateMessage('dependency cycle: {cycle}'), 'dependency cycle: {cycle}')
	})
})

describe('catalog', () => {
	it('should key every definition by its own code', () => {
		for (const [code, def] of Object.entries(DIAGNOSTICS)) assert.strictEqual(def.code, code)
	})

	it('should tell known codes from unknown ones', () => {
		assert.strictEqual(isValidDiagnosticCode('KLUNIT002'), true)
		assert.strictEqual(isValidDiagnosticCode('KLUNIT999'), false)
		assert.strictEqual(getDiagnostic('KLCLI001').message, 'file not found: {path}')
	})
})
