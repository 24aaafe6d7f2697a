import { formatDescriptor } from "@/descriptor/format"
import { formatPath } from "@/diagnostic/path"
import { renderValue } from "@/diagnostic/render"
import type { TypeDescriptor } from "@/types/descriptor"
import type {
	Diagnostic,
	DiagnosticPath,
	PathSegment,
	RejectionReason,
	RenderLimits,
} from "@/types/diagnostic"
import { runtimeTypeName } from "@/types/guards"

export interface DiagnosticDetails {
	reason: RejectionReason
	limits: RenderLimits
	message?: string
	alternatives?: ReadonlyArray<Diagnostic>
}

/**
 * Builds an immutable diagnostic. The offending value is rendered right away;
 * the diagnostic keeps only that text.
 */
export function buildDiagnostic(
	path: DiagnosticPath,
	expected: TypeDescriptor,
	received: unknown,
	details: DiagnosticDetails,
): Diagnostic {
	const expectedText = formatDescriptor(expected)
	const receivedType = runtimeTypeName(received)
	const value = renderValue(received, details.limits)

	return freezeDiagnostic({
		alternatives: details.alternatives ?? [],
		expected,
		expectedText,
		message: details.message ?? defaultMessage(details.reason, expectedText, receivedType, value),
		path,
		reason: details.reason,
		received: receivedType,
		value,
	})
}

function defaultMessage(
	reason: RejectionReason,
	expectedText: string,
	receivedType: string,
	value: string,
): string {
	switch (reason) {
		case "parse_failure":
			return `cannot convert ${receivedType} ${value} to ${expectedText}`
		case "arity_mismatch":
			return `wrong number of elements for ${expectedText}`
		case "depth_limit":
			return `${expectedText} nests too deeply`
		case "type_mismatch":
			return `expected ${expectedText}, received ${receivedType}`
	}
}

/**
 * Returns a copy of `diagnostic` whose path (and the paths of its union
 * alternatives) starts with `prefix`. Collaborators use it to root a
 * diagnostic at the field or parameter they validated.
 */
export function prependPath(
	diagnostic: Diagnostic,
	prefix: ReadonlyArray<PathSegment>,
): Diagnostic {
	if (prefix.length === 0) return diagnostic
	return freezeDiagnostic({
		...diagnostic,
		alternatives: diagnostic.alternatives.map((alternative) =>
			prependPath(alternative, prefix),
		),
		path: [...prefix, ...diagnostic.path],
	})
}

export function formatDiagnostic(diagnostic: Diagnostic, indent = ""): string {
	const lines = [
		`${indent}${formatPath(diagnostic.path)}: ${diagnostic.message} (value: ${diagnostic.value})`,
	]
	for (const alternative of diagnostic.alternatives) {
		lines.push(formatDiagnostic(alternative, `${indent}  `))
	}
	return lines.join("\n")
}

function freezeDiagnostic(diagnostic: Diagnostic): Diagnostic {
	return Object.freeze({
		...diagnostic,
		alternatives: Object.freeze([...diagnostic.alternatives]),
		path: Object.freeze(diagnostic.path.map((segment) => Object.freeze({ ...segment }))),
	})
}
