/**
 * Custom Vitest assertions for Result and Verdict values
 *
 * Results follow the { ok: true, value } | { ok: false, error } pattern;
 * verdicts carry a status of "exact", "coercible" or "rejected".
 */

import { expect } from "vitest"

interface OkResult<T> {
	ok: true
	value: T
}

interface ErrResult<E> {
	ok: false
	error: E
}

type Result<T, E> = OkResult<T> | ErrResult<E>

interface VerdictLike {
	status: string
	diagnostic?: { reason: string; message: string }
}

function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
	return result.ok === true
}

function describeValue(value: unknown): string {
	return typeof value === "object" && value !== null
		? JSON.stringify(value, null, 2)
		: String(value)
}

expect.extend({
	/**
	 * Assert that a result is an error.
	 *
	 * @example
	 * expect(parseDescriptor({ kind: "tree" })).toBeErr()
	 */
	toBeErr(received: Result<unknown, unknown>) {
		if (!isOk(received)) {
			return {
				message: () =>
					`expected result not to be an error, but got: ${describeValue(received.error)}`,
				pass: true,
			}
		}

		return {
			message: () =>
				`expected result to be an error, but got ok with value: ${describeValue(received.value)}`,
			pass: false,
		}
	},

	/**
	 * Assert that a result is an error whose message contains a substring.
	 *
	 * @example
	 * expect(parseDescriptor(input)).toBeErrContaining("nesting exceeds")
	 */
	toBeErrContaining(received: Result<unknown, { message: string }>, substring: string) {
		if (isOk(received)) {
			return {
				message: () =>
					`expected result to be an error, but got ok with value: ${describeValue(received.value)}`,
				pass: false,
			}
		}

		if (received.error.message.includes(substring)) {
			return {
				message: () => `expected error not to contain "${substring}", but it did`,
				pass: true,
			}
		}

		return {
			message: () =>
				`expected error to contain "${substring}", but got: ${received.error.message}`,
			pass: false,
		}
	},

	/**
	 * Assert that a result is Ok.
	 *
	 * @example
	 * expect(safeValidate(1, t.integer)).toBeOk()
	 */
	toBeOk(received: Result<unknown, unknown>) {
		if (isOk(received)) {
			return {
				message: () =>
					`expected result not to be ok, but got value: ${describeValue(received.value)}`,
				pass: true,
			}
		}

		return {
			message: () =>
				`expected result to be ok, but got error:\n${describeValue(received.error)}`,
			pass: false,
		}
	},

	/**
	 * Assert that a verdict was rejected for the given reason.
	 *
	 * @example
	 * expect(classify([1, 2], t.tuple(t.integer))).toBeRejectedWith("arity_mismatch")
	 */
	toBeRejectedWith(received: VerdictLike, reason: string) {
		if (received.status !== "rejected" || !received.diagnostic) {
			return {
				message: () => `expected a rejected verdict, but got "${received.status}"`,
				pass: false,
			}
		}

		const actual = received.diagnostic.reason
		return {
			message: () =>
				actual === reason
					? `expected verdict not to be rejected with "${reason}"`
					: `expected rejection "${reason}", but got "${actual}": ${received.diagnostic?.message}`,
			pass: actual === reason,
		}
	},
})

declare module "vitest" {
	// biome-ignore lint/suspicious/noExplicitAny: matches Vitest's Assertion default.
	interface Assertion<T = any> {
		toBeOk(): void
		toBeErr(): void
		toBeErrContaining(substring: string): void
		toBeRejectedWith(reason: string): void
	}

	interface AsymmetricMatchersContaining {
		toBeOk(): void
		toBeErr(): void
	}
}
