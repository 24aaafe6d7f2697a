import { z } from "zod"
import {
	DEFAULT_MAX_DEPTH,
	DEFAULT_RENDER_MAX_DEPTH,
	DEFAULT_RENDER_MAX_ITEMS,
	DEFAULT_RENDER_MAX_STRING,
	MAX_DEPTH_CEILING,
} from "@/constants"

const positiveInt = () => z.number().int().positive()

const RenderLimitsSchema = z
	.object({
		maxDepth: positiveInt().default(DEFAULT_RENDER_MAX_DEPTH),
		maxItems: positiveInt().default(DEFAULT_RENDER_MAX_ITEMS),
		maxStringLength: positiveInt().default(DEFAULT_RENDER_MAX_STRING),
	})
	.strict()

export const ContractOptionsSchema = z
	.object({
		// Off: only exact values pass.
		coerce: z.boolean().default(true),
		// Off by default: numbers and strings never become booleans.
		coerceBooleans: z.boolean().default(false),
		maxDepth: positiveInt().max(MAX_DEPTH_CEILING).default(DEFAULT_MAX_DEPTH),
		render: RenderLimitsSchema.default({}),
	})
	.strict()

export type ContractOptionsInput = z.input<typeof ContractOptionsSchema>
export type ContractOptions = z.output<typeof ContractOptionsSchema>

export const DEFAULT_OPTIONS: ContractOptions = Object.freeze(ContractOptionsSchema.parse({}))

/**
 * Fills in defaults. Throws the ZodError for options of the wrong shape.
 */
export function resolveOptions(input?: ContractOptionsInput): ContractOptions {
	if (input === undefined) return DEFAULT_OPTIONS
	return ContractOptionsSchema.parse(input)
}

const flag = () =>
	z
		.enum(["true", "false", "1", "0"])
		.transform((value) => value === "true" || value === "1")
const envInt = () => z.coerce.number().int().positive()

const EnvSchema = z.object({
	CONFORM_COERCE: flag().optional(),
	CONFORM_COERCE_BOOLEANS: flag().optional(),
	CONFORM_MAX_DEPTH: envInt().optional(),
	CONFORM_RENDER_MAX_DEPTH: envInt().optional(),
	CONFORM_RENDER_MAX_ITEMS: envInt().optional(),
	CONFORM_RENDER_MAX_STRING: envInt().optional(),
})

export function optionsFromEnv(
	env: Record<string, string | undefined> = process.env,
): ContractOptions {
	const parsed = EnvSchema.parse(env)
	return resolveOptions({
		coerce: parsed.CONFORM_COERCE,
		coerceBooleans: parsed.CONFORM_COERCE_BOOLEANS,
		maxDepth: parsed.CONFORM_MAX_DEPTH,
		render: {
			maxDepth: parsed.CONFORM_RENDER_MAX_DEPTH,
			maxItems: parsed.CONFORM_RENDER_MAX_ITEMS,
			maxStringLength: parsed.CONFORM_RENDER_MAX_STRING,
		},
	})
}
