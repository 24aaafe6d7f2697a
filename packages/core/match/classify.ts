import type { ContractOptions } from "@/config"
import { buildDiagnostic } from "@/diagnostic/build"
import { appendPath } from "@/diagnostic/path"
import { renderValue } from "@/diagnostic/render"
import { applyScalarRule, isExactScalar, resolveScalarRule } from "@/scalar/rules"
import type {
	MappingDescriptor,
	ScalarDescriptor,
	SequenceDescriptor,
	SetDescriptor,
	TupleDescriptor,
	TypeDescriptor,
	UnionDescriptor,
} from "@/types/descriptor"
import type { Diagnostic, DiagnosticPath, PathSegment, RejectionReason } from "@/types/diagnostic"
import { isCollection, isPair, isRecord, runtimeTypeName } from "@/types/guards"
import type {
	CoercionPlan,
	ExactVerdict,
	MappingShape,
	PlanEntry,
	PlanStep,
	RejectedVerdict,
	Verdict,
} from "@/types/verdict"

export interface MatchContext {
	readonly options: ContractOptions
	readonly path: DiagnosticPath
}

const EXACT: ExactVerdict = Object.freeze({ status: "exact" })

/**
 * Classifies `value` against `descriptor`. Assumes the descriptor depth was
 * already checked against `options.maxDepth`.
 */
export function classifyValue(
	value: unknown,
	descriptor: TypeDescriptor,
	context: MatchContext,
): Verdict {
	switch (descriptor.kind) {
		case "any":
			return EXACT
		case "scalar":
			return classifyScalar(value, descriptor, context)
		case "sequence":
			return classifySequence(value, descriptor, context)
		case "tuple":
			return classifyTuple(value, descriptor, context)
		case "set":
			return classifySet(value, descriptor, context)
		case "mapping":
			return classifyMapping(value, descriptor, context)
		case "union":
			return classifyUnion(value, descriptor, context)
	}
}

function classifyScalar(
	value: unknown,
	descriptor: ScalarDescriptor,
	context: MatchContext,
): Verdict {
	if (isExactScalar(value, descriptor.scalar)) return EXACT
	if (!context.options.coerce) return reject(context, descriptor, value, "type_mismatch")

	const rule = resolveScalarRule(value, descriptor.scalar, context.options.coerceBooleans)
	if (!rule) return reject(context, descriptor, value, "type_mismatch")

	const trial = applyScalarRule(rule, value)
	if (!trial.ok) return reject(context, descriptor, value, "parse_failure")

	return coercible({
		expected: descriptor,
		input: value,
		kind: "scalar",
		path: context.path,
		rule,
	})
}

function classifySequence(
	value: unknown,
	descriptor: SequenceDescriptor,
	context: MatchContext,
): Verdict {
	const converted = !Array.isArray(value)
	if (converted && !context.options.coerce) {
		return reject(context, descriptor, value, "type_mismatch")
	}

	const items = classifyItems(materialize(value), () => descriptor.element, context)
	if (!items.ok) return items.verdict
	if (!converted && items.exact) return EXACT

	return coercible({ items: items.steps, kind: "sequence", path: context.path })
}

function classifyTuple(
	value: unknown,
	descriptor: TupleDescriptor,
	context: MatchContext,
): Verdict {
	const converted = !Array.isArray(value)
	if (converted && !context.options.coerce) {
		return reject(context, descriptor, value, "type_mismatch")
	}

	const source = materialize(value)
	const arity = descriptor.elements.length
	if (source.length !== arity) {
		return reject(context, descriptor, value, "arity_mismatch", {
			message: `expected ${arity} element(s), received ${source.length}`,
		})
	}

	const items = classifyItems(source, (index) => descriptor.elements[index], context)
	if (!items.ok) return items.verdict
	if (!converted && items.exact) return EXACT

	return coercible({ items: items.steps, kind: "tuple", path: context.path })
}

function classifySet(value: unknown, descriptor: SetDescriptor, context: MatchContext): Verdict {
	const converted = !(value instanceof Set)
	if (converted && !context.options.coerce) {
		return reject(context, descriptor, value, "type_mismatch")
	}

	const items = classifyItems(materialize(value), () => descriptor.element, context)
	if (!items.ok) return items.verdict
	if (!converted && items.exact) return EXACT

	return coercible({ items: items.steps, kind: "set", path: context.path })
}

interface MappingCandidate {
	shape: MappingShape
	entries: ReadonlyArray<readonly [unknown, unknown]>
}

function classifyMapping(
	value: unknown,
	descriptor: MappingDescriptor,
	context: MatchContext,
): Verdict {
	const native = value instanceof Map
	if (!native && !context.options.coerce) {
		return reject(context, descriptor, value, "type_mismatch")
	}

	const candidates = mappingCandidates(value)
	let firstFailure: RejectedVerdict | undefined
	for (const candidate of candidates) {
		const outcome = classifyEntries(candidate.entries, descriptor, context)
		if (!outcome.ok) {
			firstFailure ??= outcome.verdict
			continue
		}
		if (native && outcome.exact) return EXACT
		return coercible({
			entries: outcome.entries,
			kind: "mapping",
			path: context.path,
			shape: candidate.shape,
		})
	}

	return (
		firstFailure ??
		reject(context, descriptor, value, "type_mismatch", {
			message: `cannot build a mapping from ${runtimeTypeName(value)}`,
		})
	)
}

/**
 * Source shapes a mapping can be built from, in the order they are tried:
 * an existing mapping, an iterable of two-element pairs, then a flat iterable
 * of even length read as key, value, key, value.
 */
function mappingCandidates(value: unknown): MappingCandidate[] {
	if (value instanceof Map) {
		return [{ entries: Array.from(value.entries()), shape: "mapping" }]
	}
	if (isRecord(value)) {
		return [{ entries: Object.entries(value), shape: "mapping" }]
	}
	if (!isCollection(value)) return []

	const items = Array.from(value)
	const candidates: MappingCandidate[] = []
	if (items.every(isPair)) {
		candidates.push({ entries: items.map((pair) => [pair[0], pair[1]] as const), shape: "pairs" })
	}
	if (items.length % 2 === 0) {
		const entries: Array<readonly [unknown, unknown]> = []
		for (let index = 0; index < items.length; index += 2) {
			entries.push([items[index], items[index + 1]])
		}
		candidates.push({ entries, shape: "flat" })
	}
	return candidates
}

function classifyUnion(
	value: unknown,
	descriptor: UnionDescriptor,
	context: MatchContext,
): Verdict {
	const failures: Diagnostic[] = []
	let selected: { alternative: number; plan: CoercionPlan } | undefined

	// Every alternative is tried before settling for a coercible one: an exact
	// match further down the list still wins.
	for (const [index, alternative] of descriptor.alternatives.entries()) {
		const verdict = classifyValue(
			value,
			alternative,
			descend(context, { index, type: "alternative" }),
		)
		if (verdict.status === "exact") return EXACT
		if (verdict.status === "coercible") {
			selected ??= { alternative: index, plan: verdict.plan }
		} else {
			failures.push(verdict.diagnostic)
		}
	}

	if (selected) {
		return coercible({
			alternative: selected.alternative,
			kind: "union",
			path: context.path,
			plan: selected.plan,
		})
	}

	return reject(context, descriptor, value, "type_mismatch", {
		alternatives: failures,
		message:
			descriptor.alternatives.length === 0
				? "no value matches an empty union"
				: `no alternative of ${descriptor.alternatives.length} matched`,
	})
}

type ItemsOutcome =
	| { ok: true; exact: boolean; steps: PlanStep[] }
	| { ok: false; verdict: RejectedVerdict }

function classifyItems(
	items: ReadonlyArray<unknown>,
	descriptorAt: (index: number) => TypeDescriptor,
	context: MatchContext,
): ItemsOutcome {
	const steps: PlanStep[] = []
	let exact = true
	for (const [index, item] of items.entries()) {
		const verdict = classifyValue(
			item,
			descriptorAt(index),
			descend(context, { index, type: "index" }),
		)
		if (verdict.status === "rejected") return { ok: false, verdict }
		if (verdict.status === "coercible") exact = false
		steps.push(toStep(item, verdict))
	}
	return { exact, ok: true, steps }
}

type EntriesOutcome =
	| { ok: true; exact: boolean; entries: PlanEntry[] }
	| { ok: false; verdict: RejectedVerdict }

function classifyEntries(
	entries: ReadonlyArray<readonly [unknown, unknown]>,
	descriptor: MappingDescriptor,
	context: MatchContext,
): EntriesOutcome {
	const planned: PlanEntry[] = []
	let exact = true
	for (const [key, item] of entries) {
		const label = renderValue(key, context.options.render)

		const keyVerdict = classifyValue(
			key,
			descriptor.key,
			descend(context, { key: label, type: "key" }),
		)
		if (keyVerdict.status === "rejected") return { ok: false, verdict: keyVerdict }

		const valueVerdict = classifyValue(
			item,
			descriptor.value,
			descend(context, { key: label, type: "entry" }),
		)
		if (valueVerdict.status === "rejected") return { ok: false, verdict: valueVerdict }

		if (keyVerdict.status === "coercible" || valueVerdict.status === "coercible") {
			exact = false
		}
		planned.push({ key: toStep(key, keyVerdict), value: toStep(item, valueVerdict) })
	}
	return { entries: planned, exact, ok: true }
}

// Arrays are read as they are; other iterables are copied once, so a
// one-shot iterator is never consumed twice. Anything else is a lone value.
function materialize(value: unknown): ReadonlyArray<unknown> {
	if (Array.isArray(value)) return value
	return isCollection(value) ? Array.from(value) : [value]
}

function toStep(value: unknown, verdict: Exclude<Verdict, RejectedVerdict>): PlanStep {
	return verdict.status === "exact"
		? { status: "exact", value }
		: { plan: verdict.plan, status: "coercible" }
}

function descend(context: MatchContext, segment: PathSegment): MatchContext {
	return { options: context.options, path: appendPath(context.path, segment) }
}

function coercible(plan: CoercionPlan): Verdict {
	return { plan, status: "coercible" }
}

function reject(
	context: MatchContext,
	descriptor: TypeDescriptor,
	value: unknown,
	reason: RejectionReason,
	details: { message?: string; alternatives?: ReadonlyArray<Diagnostic> } = {},
): RejectedVerdict {
	return {
		diagnostic: buildDiagnostic(context.path, descriptor, value, {
			alternatives: details.alternatives,
			limits: context.options.render,
			message: details.message,
			reason,
		}),
		status: "rejected",
	}
}
