import {
	ContractOptionsSchema,
	createContract,
	formatDescriptor,
	parseDescriptor,
	type Result,
} from "@conform/core"
import { consola } from "consola"
import { loadEnvOptions } from "../env"
import { parseJson, readJsonFile } from "../io"
import { formatJson } from "../output"
import type { CliError } from "../types/errors"
import { printError } from "./outcome"

export interface CheckOptions {
	inline?: string
	strict: boolean
	coerceBooleans: boolean
	maxDepth?: string
	envPath?: string
	env?: Record<string, string | undefined>
}

export interface CheckOutcome {
	status: "exact" | "coercible"
	expected: string
	output: string
}

export async function runCheck(
	descriptorPath: string,
	valuePath: string | undefined,
	options: CheckOptions,
): Promise<Result<CheckOutcome, CliError>> {
	const base = loadEnvOptions(options.envPath, options.env)
	if (!base.ok) return base

	const resolved = ContractOptionsSchema.safeParse({
		...base.value,
		coerce: options.strict ? false : base.value.coerce,
		coerceBooleans: options.coerceBooleans || base.value.coerceBooleans,
		maxDepth: options.maxDepth === undefined ? base.value.maxDepth : Number(options.maxDepth),
	})
	if (!resolved.success) {
		return {
			error: {
				message: "Invalid check options.",
				rawError: resolved.error,
				source: "zod",
				type: "options",
				zodError: resolved.error,
			},
			ok: false,
		}
	}

	const descriptorJson = await readJsonFile(descriptorPath)
	if (!descriptorJson.ok) return descriptorJson
	const descriptor = parseDescriptor(descriptorJson.value)
	if (!descriptor.ok) return descriptor

	const value = await readValue(valuePath, options.inline)
	if (!value.ok) return value

	const contract = createContract(resolved.data)
	const checked = contract.inspect(value.value, descriptor.value)
	if (!checked.ok) return checked

	return {
		ok: true,
		value: {
			expected: formatDescriptor(descriptor.value),
			output: formatJson(checked.value.value),
			status: checked.value.status,
		},
	}
}

async function readValue(
	valuePath: string | undefined,
	inline: string | undefined,
): Promise<Result<unknown, CliError>> {
	if (inline !== undefined && valuePath !== undefined) {
		return {
			error: {
				field: "value",
				message: "Pass either a value file or --inline, not both.",
				type: "usage",
			},
			ok: false,
		}
	}
	if (inline !== undefined) return parseJson(inline, "--inline")
	if (valuePath !== undefined) return readJsonFile(valuePath)
	return {
		error: {
			field: "value",
			message: "A value is required: pass a value file or --inline <json>.",
			type: "usage",
		},
		ok: false,
	}
}

export async function checkCommand(
	descriptorPath: string,
	valuePath: string | undefined,
	options: CheckOptions,
): Promise<void> {
	const result = await runCheck(descriptorPath, valuePath, options)
	if (!result.ok) {
		printError(result.error)
		return
	}

	const { expected, output, status } = result.value
	consola.success(
		status === "exact" ? `Value conforms to ${expected}.` : `Value converted to ${expected}.`,
	)
	consola.log(output)
}
