import { descriptorDepth, formatDescriptor, parseDescriptor, type Result } from "@conform/core"
import { consola } from "consola"
import { readJsonFile } from "../io"
import type { CliError } from "../types/errors"
import { printError } from "./outcome"

export interface DescribeOutcome {
	text: string
	depth: number
}

export async function runDescribe(
	descriptorPath: string,
): Promise<Result<DescribeOutcome, CliError>> {
	const json = await readJsonFile(descriptorPath)
	if (!json.ok) return json
	const descriptor = parseDescriptor(json.value)
	if (!descriptor.ok) return descriptor

	return {
		ok: true,
		value: {
			depth: descriptorDepth(descriptor.value),
			text: formatDescriptor(descriptor.value),
		},
	}
}

export async function describeCommand(descriptorPath: string): Promise<void> {
	const result = await runDescribe(descriptorPath)
	if (!result.ok) {
		printError(result.error)
		return
	}

	consola.info(result.value.text)
	consola.info(`depth: ${result.value.depth}`)
}
