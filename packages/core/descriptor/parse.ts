import { z } from "zod"
import { MAX_DEPTH_CEILING } from "@/constants"
import { freezeDescriptor } from "@/descriptor/build"
import { descriptorDepth } from "@/descriptor/depth"
import type { TypeDescriptor } from "@/types/descriptor"
import type { DescriptorError, Result } from "@/types/error"

const ScalarKindSchema = z.enum(["integer", "float", "string", "boolean", "object", "null"])

const DescriptorSchema: z.ZodType<TypeDescriptor> = z.lazy(() =>
	z.discriminatedUnion("kind", [
		z.object({ kind: z.literal("any") }).strict(),
		z.object({ kind: z.literal("scalar"), scalar: ScalarKindSchema }).strict(),
		z.object({ element: DescriptorSchema, kind: z.literal("sequence") }).strict(),
		z.object({ element: DescriptorSchema, kind: z.literal("set") }).strict(),
		z.object({ elements: z.array(DescriptorSchema), kind: z.literal("tuple") }).strict(),
		z
			.object({ key: DescriptorSchema, kind: z.literal("mapping"), value: DescriptorSchema })
			.strict(),
		z.object({ alternatives: z.array(DescriptorSchema), kind: z.literal("union") }).strict(),
	]),
)

export interface ParseDescriptorOptions {
	maxDepth?: number
}

/**
 * Decodes the JSON form of a descriptor, e.g.
 * `{"kind":"sequence","element":{"kind":"scalar","scalar":"integer"}}`.
 * The result is frozen and safe to share.
 */
export function parseDescriptor(
	input: unknown,
	options: ParseDescriptorOptions = {},
): Result<TypeDescriptor, DescriptorError> {
	const maxDepth = Math.min(options.maxDepth ?? MAX_DEPTH_CEILING, MAX_DEPTH_CEILING)

	// A descriptor level is at most an object holding an array, so anything
	// nested past twice the ceiling cannot be a valid descriptor.
	if (jsonDepth(input, maxDepth * 2 + 1) > maxDepth * 2 + 1) {
		return tooDeep(maxDepth)
	}

	const parsed = DescriptorSchema.safeParse(input)
	if (!parsed.success) {
		return {
			error: {
				message: `Invalid descriptor: ${formatIssues(parsed.error)}`,
				rawError: parsed.error,
				source: "zod",
				type: "descriptor",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	if (descriptorDepth(parsed.data, maxDepth) > maxDepth) {
		return tooDeep(maxDepth)
	}

	return { ok: true, value: freezeDescriptor(parsed.data) }
}

function tooDeep(maxDepth: number): Result<TypeDescriptor, DescriptorError> {
	return {
		error: {
			message: `Invalid descriptor: nesting exceeds ${maxDepth} levels`,
			source: "manual",
			type: "descriptor",
		},
		ok: false,
	}
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join(".") : "(root)"
			return `${path}: ${issue.message}`
		})
		.join("; ")
}

function jsonDepth(input: unknown, limit: number): number {
	let deepest = 0
	const stack: Array<{ value: unknown; depth: number }> = [{ depth: 0, value: input }]
	for (let frame = stack.pop(); frame; frame = stack.pop()) {
		const { value, depth } = frame
		if (typeof value !== "object" || value === null) continue

		const next = depth + 1
		if (next > deepest) {
			deepest = next
			if (deepest > limit) return deepest
		}
		const children: unknown[] = Array.isArray(value) ? value : Object.values(value)
		for (const child of children) {
			stack.push({ depth: next, value: child })
		}
	}
	return deepest
}
