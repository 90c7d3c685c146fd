import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill the `{name}` placeholders of a catalog message. A placeholder with
 * no matching argument is kept as written.
 */
export function interpolateMessage(template: string, args: DiagnosticArgs = {}): string {
	return template.replace(PLACEHOLDER, (placeholder: string, name: string) => {
		const value = args[name]
		return value === undefined ? placeholder : value.toString()
	})
}
