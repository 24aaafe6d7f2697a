import { isDeepStrictEqual } from "node:util"
import {
	type ContractOptionsInput,
	createContract,
	type Infer,
	prependPath,
	renderValue,
	type Result,
	type TypeDescriptor,
} from "@conform/core"
import { type ModelIssue, ModelError } from "./errors"

export type FieldMap = Readonly<Record<string, TypeDescriptor>>

export type ModelInstance<F extends FieldMap> = { [K in keyof F]: Infer<F[K]> }

export interface ModelDefinition<F extends FieldMap> {
	name: string
	fields: F
	/** Reject every assignment after construction. */
	frozen?: boolean
	options?: ContractOptionsInput
}

export interface Model<F extends FieldMap> {
	readonly name: string
	readonly fields: F
	readonly frozen: boolean
	create(record: Readonly<Record<string, unknown>>): ModelInstance<F>
	safeCreate(record: Readonly<Record<string, unknown>>): Result<ModelInstance<F>, ModelFailure>
	fromArgs(...values: ReadonlyArray<unknown>): ModelInstance<F>
	onSet<K extends keyof F & string>(field: K, value: unknown): Infer<F[K]>
	extend<G extends FieldMap>(name: string, fields: G): Model<F & G>
	format(instance: ModelInstance<F>): string
	equals(left: ModelInstance<F>, right: ModelInstance<F>): boolean
	isInstance(value: unknown): value is ModelInstance<F>
}

export interface ModelFailure {
	type: "model"
	message: string
	model: string
	issues: ReadonlyArray<ModelIssue>
	rawError: ModelError
}

/**
 * Declares a record type whose fields are validated on construction and on
 * every assignment. Field values pass through the contract engine, so a
 * coercible value is stored in its converted form.
 *
 * @example
 * const User = defineModel({ name: "User", fields: { age: t.integer, tags: t.set(t.string) } })
 * const user = User.create({ age: "42", tags: ["a", "a"] }) // age 42, tags Set { "a" }
 */
export function defineModel<F extends FieldMap>(definition: ModelDefinition<F>): Model<F> {
	const { fields, name } = definition
	const frozen = definition.frozen ?? false
	const contract = createContract(definition.options)
	const fieldNames = Object.keys(fields)
	// Proxy -> backing record, for every instance this model created.
	const records = new WeakMap<object, Record<string, unknown>>()

	function checkField(field: string, value: unknown, issues: ModelIssue[]): unknown {
		const descriptor = Object.hasOwn(fields, field) ? fields[field] : undefined
		if (descriptor === undefined) {
			issues.push({ field, kind: "unknown" })
			return undefined
		}
		const result = contract.safeValidate(value, descriptor)
		if (result.ok) return result.value

		const diagnostic = prependPath(result.error.diagnostic, [{ name: field, type: "field" }])
		issues.push(
			value === undefined
				? { diagnostic, field, kind: "missing" }
				: { diagnostic, field, kind: "invalid" },
		)
		return undefined
	}

	function instantiate(record: Record<string, unknown>): ModelInstance<F> {
		const proxy = new Proxy(record, {
			// Removing a field stores undefined, which only optional fields accept.
			deleteProperty(target, key) {
				if (typeof key === "string" && Object.hasOwn(fields, key)) {
					if (frozen) throw new ModelError(name, [{ field: key, kind: "frozen" }])
					return Reflect.set(target, key, onSetField(key, undefined))
				}
				return Reflect.deleteProperty(target, key)
			},
			set(target, key, value) {
				if (typeof key === "symbol") return Reflect.set(target, key, value)
				if (frozen) throw new ModelError(name, [{ field: key, kind: "frozen" }])
				return Reflect.set(target, key, onSetField(key, value))
			},
		})
		records.set(proxy, record)
		// The record holds a validated value for every declared field.
		const instance: object = proxy
		return instance as ModelInstance<F>
	}

	function onSetField(field: string, value: unknown): unknown {
		const issues: ModelIssue[] = []
		const checked = checkField(field, value, issues)
		if (issues.length > 0) throw new ModelError(name, issues)
		return checked
	}

	function build(
		record: Readonly<Record<string, unknown>>,
	): Result<ModelInstance<F>, ModelFailure> {
		const issues: ModelIssue[] = []
		for (const field of Object.keys(record)) {
			if (!Object.hasOwn(fields, field)) issues.push({ field, kind: "unknown" })
		}

		const values: Record<string, unknown> = {}
		for (const field of fieldNames) {
			values[field] = checkField(field, record[field], issues)
		}

		if (issues.length > 0) {
			const error = new ModelError(name, issues)
			return {
				error: {
					issues: error.issues,
					message: error.message,
					model: name,
					rawError: error,
					type: "model",
				},
				ok: false,
			}
		}
		return { ok: true, value: instantiate(values) }
	}

	function recordOf(instance: ModelInstance<F>): Record<string, unknown> {
		const record = records.get(instance)
		if (!record) throw new TypeError(`not an instance of ${name}`)
		return record
	}

	const model: Model<F> = {
		create(record) {
			const result = build(record)
			if (!result.ok) throw result.error.rawError
			return result.value
		},
		equals(left, right) {
			const a = recordOf(left)
			const b = recordOf(right)
			return fieldNames.every((field) => isDeepStrictEqual(a[field], b[field]))
		},
		extend(childName, extra) {
			return defineModel({
				fields: { ...fields, ...extra },
				frozen,
				name: childName,
				options: contract.options,
			})
		},
		fields,
		format(instance) {
			const record = recordOf(instance)
			const parts = fieldNames.map(
				(field) => `${field}=${renderValue(record[field], contract.options.render)}`,
			)
			return `${name}(${parts.join(", ")})`
		},
		fromArgs(...values) {
			const issues: ModelIssue[] = []
			const record: Record<string, unknown> = {}
			for (const [position, value] of values.entries()) {
				const field = fieldNames[position]
				if (field === undefined) {
					issues.push({ kind: "unexpected", position })
				} else {
					record[field] = value
				}
			}
			const result = build(record)
			if (!result.ok) throw new ModelError(name, [...issues, ...result.error.issues])
			if (issues.length > 0) throw new ModelError(name, issues)
			return result.value
		},
		frozen,
		isInstance(value): value is ModelInstance<F> {
			return typeof value === "object" && value !== null && records.has(value)
		},
		name,
		onSet(field, value) {
			// The field's own descriptor accepted the value.
			return onSetField(field, value) as Infer<F[typeof field]>
		},
		safeCreate(record) {
			return build(record)
		},
	}
	return Object.freeze(model)
}
