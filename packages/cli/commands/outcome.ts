import { type BaseError, formatDiagnostic } from "@conform/core"
import { consola } from "consola"
import type { ZodError } from "zod"
import type { CliError } from "../types/errors"

/**
 * Renders a CLI error as a `[type] message` header followed by what explains
 * it: the diagnostic tree for validation errors, zod issues for bad options,
 * the parser's message for bad JSON, then any cause.
 */
export function formatCliError(error: CliError): string {
	return [...errorLines(error), ...causeLines(error.cause, "  ")].join("\n")
}

export function printError(error: CliError): void {
	consola.error(formatCliError(error))
	process.exitCode = 1
}

function errorLines(error: CliError): string[] {
	switch (error.type) {
		case "validation": {
			const heading = error.fatal ? "Descriptor rejected" : "Value does not conform"
			return [`[validation] ${heading}:`, formatDiagnostic(error.diagnostic, "  ")]
		}
		case "io":
			return [`[io] ${error.message} (${error.operation} ${error.path})`]
		case "parse":
			return error.rawError
				? [`[parse] ${error.message}`, `  ${error.rawError.message}`]
				: [`[parse] ${error.message}`]
		case "options":
			return [`[options] ${error.message}`, ...issueLines(error.zodError)]
		case "descriptor":
		case "usage":
			return [`[${error.type}] ${error.message}`]
	}
}

function issueLines(zodError: ZodError): string[] {
	return zodError.issues.map((issue) => {
		const label = issue.path.length > 0 ? issue.path.join(".") : "<root>"
		return `  - ${label}: ${issue.message}`
	})
}

function causeLines(cause: BaseError | undefined, indent: string): string[] {
	if (!cause) return []
	return [
		`${indent}Caused by: [${cause.type}] ${cause.message}`,
		...causeLines(cause.cause, `${indent}  `),
	]
}
