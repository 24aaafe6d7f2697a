import {
	type Contract,
	type ContractOptionsInput,
	createContract,
	prependPath,
	type TypeDescriptor,
} from "@conform/core"
import { type CallIssue, CallError, SignatureError } from "./errors"

export interface Parameter {
	name: string
	type: TypeDescriptor
}

export interface Signature {
	/** Reported in errors; defaults to the function's own name. */
	name?: string
	params: ReadonlyArray<Parameter>
	returns?: TypeDescriptor
	/** Render limits and depth bound. Call checks never convert values. */
	options?: Omit<ContractOptionsInput, "coerce">
}

interface BoundSignature {
	target: string
	params: ReadonlyArray<Parameter>
	returns: TypeDescriptor | undefined
	contract: Contract
}

/**
 * Wraps `fn` so every call checks its positional arguments against
 * `signature.params` and its result against `signature.returns`. Arguments are
 * forwarded as they are: a value that would need converting is reported, not
 * converted. Missing, unexpected and invalid arguments are reported together.
 *
 * @example
 * const area = validateCall((w: number, h: number) => w * h, {
 *   params: [{ name: "w", type: t.float }, { name: "h", type: t.float }],
 *   returns: t.float,
 * })
 */
export function validateCall<A extends unknown[], R>(
	fn: (...args: A) => R,
	signature: Signature,
): (...args: A) => R {
	const bound = bindSignature(fn, signature)
	return function (this: unknown, ...args: A): R {
		checkArguments(bound, args)
		const result = fn.apply(this, args)
		checkReturn(bound, result)
		return result
	}
}

/**
 * Async counterpart of `validateCall`: argument failures reject the returned
 * promise, and the awaited value is checked against `signature.returns`.
 */
export function validateAsyncCall<A extends unknown[], R>(
	fn: (...args: A) => Promise<R>,
	signature: Signature,
): (...args: A) => Promise<R> {
	const bound = bindSignature(fn, signature)
	return async function (this: unknown, ...args: A): Promise<R> {
		checkArguments(bound, args)
		const result = await fn.apply(this, args)
		checkReturn(bound, result)
		return result
	}
}

/**
 * Returns a copy of `signature` with the named parameters retyped.
 */
export function overrideTypes(
	signature: Signature,
	overrides: Readonly<Record<string, TypeDescriptor>>,
): Signature {
	const names = new Set(signature.params.map((param) => param.name))
	const unknown = Object.keys(overrides).filter((name) => !names.has(name))
	if (unknown.length > 0) {
		throw new SignatureError(`cannot override unknown parameter(s): ${unknown.join(", ")}`)
	}

	return {
		...signature,
		params: signature.params.map((param) => ({
			name: param.name,
			type: overrides[param.name] ?? param.type,
		})),
	}
}

function bindSignature(fn: { name: string }, signature: Signature): BoundSignature {
	const seen = new Set<string>()
	for (const param of signature.params) {
		if (seen.has(param.name)) {
			throw new SignatureError(`duplicate parameter name: ${param.name}`)
		}
		seen.add(param.name)
	}

	return {
		contract: createContract({ ...signature.options, coerce: false }),
		params: signature.params,
		returns: signature.returns,
		target: signature.name ?? (fn.name || "anonymous"),
	}
}

function checkArguments(bound: BoundSignature, args: ReadonlyArray<unknown>): void {
	const issues: CallIssue[] = []
	for (const [position, param] of bound.params.entries()) {
		const value = args[position]
		const verdict = bound.contract.classify(value, param.type)
		if (verdict.status !== "rejected") continue

		const diagnostic = prependPath(verdict.diagnostic, [{ name: param.name, type: "field" }])
		issues.push(
			position >= args.length
				? { diagnostic, kind: "missing", name: param.name, position }
				: { diagnostic, kind: "invalid", name: param.name, position },
		)
	}
	for (let position = bound.params.length; position < args.length; position++) {
		issues.push({ kind: "unexpected", position })
	}

	if (issues.length > 0) throw new CallError(bound.target, "arguments", issues)
}

function checkReturn(bound: BoundSignature, result: unknown): void {
	if (!bound.returns) return
	const verdict = bound.contract.classify(result, bound.returns)
	if (verdict.status === "rejected") {
		throw new CallError(bound.target, "return", [
			{ diagnostic: verdict.diagnostic, kind: "return" },
		])
	}
}
