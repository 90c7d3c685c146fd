/**
 * A position in a source file (1-indexed line and column).
 */
export interface SourceLocation {
	readonly line: number
	readonly column: number
}

/**
 * Build a function mapping character offsets to line/column positions.
 * Line starts are computed once so lookups are a binary search.
 */
export function createLocator(source: string): (offset: number) => SourceLocation {
	const lineStarts = [0]
	for (let i = 0; i < source.length; i++) {
		if (source[i] === '\n') lineStarts.push(i + 1)
	}

	return (offset: number) => {
		let low = 0
		let high = lineStarts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			const start = lineStarts[mid] ?? 0
			if (start <= offset) low = mid
			else high = mid - 1
		}
		const lineStart = lineStarts[low] ?? 0
		return { column: offset - lineStart + 1, line: low + 1 }
	}
}
