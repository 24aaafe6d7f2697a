import { formatDiagnostic } from "@/diagnostic/build"
import type { Diagnostic } from "@/types/diagnostic"

export class ContractFailure extends Error {
	readonly diagnostic: Diagnostic
	readonly fatal: boolean

	constructor(diagnostic: Diagnostic, options: { cause?: unknown } = {}) {
		super(formatDiagnostic(diagnostic), { cause: options.cause })
		this.name = "ContractFailure"
		this.diagnostic = diagnostic
		this.fatal = diagnostic.reason === "depth_limit"
	}
}

export class ValidationFailure extends ContractFailure {
	constructor(diagnostic: Diagnostic, options: { cause?: unknown } = {}) {
		super(diagnostic, options)
		this.name = "ValidationFailure"
	}
}

export class CoercionFailure extends ContractFailure {
	constructor(diagnostic: Diagnostic, options: { cause?: unknown } = {}) {
		super(diagnostic, options)
		this.name = "CoercionFailure"
	}
}
