#!/usr/bin/env node

import { Command } from "commander"
import { checkCommand } from "./commands/check"
import { describeCommand } from "./commands/describe"
import pkg from "./package.json" with { type: "json" }

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("conform")
		.description("Check JSON values against type descriptors")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("check")
		.description("Validate a value, converting it where a conversion exists")
		.argument("<descriptor>", "Path to a descriptor JSON file")
		.argument("[value]", "Path to a value JSON file")
		.option("--inline <json>", "Read the value from this JSON text")
		.option("--strict", "Only accept values that already conform")
		.option("--coerce-booleans", "Allow numbers and words to become booleans")
		.option("--max-depth <n>", "Reject descriptors nested deeper than this")
		.action(
			async (
				descriptor: string,
				value: string | undefined,
				options: {
					inline?: string
					strict?: boolean
					coerceBooleans?: boolean
					maxDepth?: string
				},
			) => {
				await checkCommand(descriptor, value, {
					coerceBooleans: Boolean(options.coerceBooleans),
					inline: options.inline,
					maxDepth: options.maxDepth,
					strict: Boolean(options.strict),
				})
			},
		)

	program
		.command("describe")
		.description("Print a descriptor in type notation with its depth")
		.argument("<descriptor>", "Path to a descriptor JSON file")
		.action(async (descriptor: string) => {
			await describeCommand(descriptor)
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

void main()
