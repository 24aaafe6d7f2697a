import type { DiagnosticPath, PathSegment } from "@/types/diagnostic"

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

/**
 * `$` is the root of the validation request.
 *
 * @example
 * formatPath([{ type: "field", name: "tags" }, { type: "index", index: 2 }]) // "$.tags[2]"
 */
export function formatPath(path: DiagnosticPath): string {
	return `$${path.map(formatSegment).join("")}`
}

function formatSegment(segment: Readonly<PathSegment>): string {
	switch (segment.type) {
		case "field":
			return IDENTIFIER.test(segment.name)
				? `.${segment.name}`
				: `[${JSON.stringify(segment.name)}]`
		case "index":
			return `[${segment.index}]`
		case "entry":
			return `[${segment.key}]`
		case "key":
			return `<key ${segment.key}>`
		case "alternative":
			return `<alt ${segment.index}>`
	}
}

export function appendPath(path: DiagnosticPath, segment: PathSegment): DiagnosticPath {
	return [...path, Object.freeze(segment)]
}
