import { collectEntries, dedupeValues } from "@/coerce/equality"
import type { ContractOptions } from "@/config"
import { buildDiagnostic } from "@/diagnostic/build"
import { formatPath } from "@/diagnostic/path"
import { CoercionFailure } from "@/errors/failure"
import { logger } from "@/log"
import { applyScalarRule } from "@/scalar/rules"
import type { CoercionPlan, PlanStep } from "@/types/verdict"

/**
 * Produces the converted value a coercible verdict describes. Nothing is
 * decided here: shapes, union branches and scalar rules all come from the
 * plan. The result is always a fresh container.
 */
export function executePlan(plan: CoercionPlan, options: ContractOptions): unknown {
	switch (plan.kind) {
		case "scalar": {
			const outcome = applyScalarRule(plan.rule, plan.input)
			if (!outcome.ok) {
				throw new CoercionFailure(
					buildDiagnostic(plan.path, plan.expected, plan.input, {
						limits: options.render,
						reason: "parse_failure",
					}),
				)
			}
			logger.debug(`${formatPath(plan.path)}: ${plan.rule}`)
			return outcome.value
		}
		case "sequence":
		case "tuple":
			return plan.items.map((step) => runStep(step, options))
		case "set":
			return dedupeValues(plan.items.map((step) => runStep(step, options)))
		case "mapping":
			return collectEntries(
				plan.entries.map(
					(entry) => [runStep(entry.key, options), runStep(entry.value, options)] as const,
				),
			)
		case "union":
			return executePlan(plan.plan, options)
	}
}

function runStep(step: PlanStep, options: ContractOptions): unknown {
	return step.status === "exact" ? step.value : executePlan(step.plan, options)
}
