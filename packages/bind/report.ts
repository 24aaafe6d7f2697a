import { formatDiagnostic, formatPath } from "@conform/core"
import type { CallIssue, CallPhase, ModelIssue } from "./errors"

const INDENT = "  "

export function formatModelIssues(model: string, issues: ReadonlyArray<ModelIssue>): string {
	const lines = issues.map((issue) => {
		switch (issue.kind) {
			case "invalid":
				return formatDiagnostic(issue.diagnostic, INDENT)
			case "missing":
				return `${INDENT}${fieldPath(issue.field)}: missing required field`
			case "unknown":
				return `${INDENT}${fieldPath(issue.field)}: unknown field`
			case "unexpected":
				return `${INDENT}argument ${issue.position}: no field left for this value`
			case "frozen":
				return `${INDENT}${fieldPath(issue.field)}: ${model} is frozen`
		}
	})
	return [`Invalid ${model}:`, ...lines].join("\n")
}

export function formatCallIssues(
	target: string,
	phase: CallPhase,
	issues: ReadonlyArray<CallIssue>,
): string {
	const lines = issues.map((issue) => {
		switch (issue.kind) {
			case "invalid":
				return `${INDENT}argument ${issue.position} (${issue.name}):\n${formatDiagnostic(issue.diagnostic, INDENT.repeat(2))}`
			case "missing":
				return `${INDENT}argument ${issue.position} (${issue.name}): missing`
			case "unexpected":
				return `${INDENT}argument ${issue.position}: unexpected`
			case "return":
				return formatDiagnostic(issue.diagnostic, INDENT)
		}
	})
	const header =
		phase === "arguments" ? `Invalid arguments for ${target}:` : `Invalid return value from ${target}:`
	return [header, ...lines].join("\n")
}

function fieldPath(field: string): string {
	return formatPath([{ name: field, type: "field" }])
}
