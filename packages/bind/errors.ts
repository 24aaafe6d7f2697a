import type { Diagnostic } from "@conform/core"
import { formatCallIssues, formatModelIssues } from "./report"

export type ModelIssue =
	| { kind: "invalid"; field: string; diagnostic: Diagnostic }
	| { kind: "missing"; field: string; diagnostic: Diagnostic }
	| { kind: "unknown"; field: string }
	| { kind: "unexpected"; position: number }
	| { kind: "frozen"; field: string }

export type CallPhase = "arguments" | "return"

export type CallIssue =
	| { kind: "invalid"; name: string; position: number; diagnostic: Diagnostic }
	| { kind: "missing"; name: string; position: number; diagnostic: Diagnostic }
	| { kind: "unexpected"; position: number }
	| { kind: "return"; diagnostic: Diagnostic }

export class ModelError extends Error {
	readonly model: string
	readonly issues: ReadonlyArray<ModelIssue>

	constructor(model: string, issues: ReadonlyArray<ModelIssue>) {
		super(formatModelIssues(model, issues))
		this.name = "ModelError"
		this.model = model
		this.issues = Object.freeze([...issues])
	}
}

export class CallError extends Error {
	readonly target: string
	readonly phase: CallPhase
	readonly issues: ReadonlyArray<CallIssue>

	constructor(target: string, phase: CallPhase, issues: ReadonlyArray<CallIssue>) {
		super(formatCallIssues(target, phase, issues))
		this.name = "CallError"
		this.target = target
		this.phase = phase
		this.issues = Object.freeze([...issues])
	}
}

export class SignatureError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "SignatureError"
	}
}
