// CHANGE: Parse one raw input line into an unsigned guess
// WHY: Malformed input is a recoverable value, so parsing returns Either instead of failing an Effect
// FORMAT THEOREM: ∀n ∈ [0, MAX_GUESS]: parseGuess(String(n)) = Right(n)
// PURITY: CORE
// INVARIANT: Right values are integers in [0, MAX_GUESS]; no range check against the secret's bounds
// COMPLEXITY: O(n) where n = |text|

import { Data, Either } from "effect";

import { MAX_GUESS } from "../models.js";

/**
 * Why a line was rejected.
 */
export type InvalidGuessReason = "empty" | "not-a-number" | "out-of-range";

/**
 * Rejected guess text. Recoverable: the session re-prompts.
 *
 * @pure true (Data class)
 */
export class InvalidGuess extends Data.TaggedClass("InvalidGuess")<{
	readonly reason: InvalidGuessReason;
}> {}

// Optional plus sign, then ASCII digits only. Leading zeros are accepted.
const UNSIGNED_INTEGER = /^\+?[0-9]+$/u;

/**
 * Parses a line of text as a non-negative 32-bit integer.
 *
 * @param text - Raw line as read from input, surrounding whitespace included
 * @returns Right(guess) on success, Left(InvalidGuess) otherwise
 *
 * @pure true
 * @precondition none; any string is accepted
 * @postcondition Right(g) → 0 ≤ g ≤ MAX_GUESS ∧ Number.isInteger(g)
 *
 * @example
 * ```ts
 * parseGuess("  42\n"); // Right(42)
 * parseGuess("abc");    // Left(InvalidGuess { reason: "not-a-number" })
 * ```
 */
export function parseGuess(text: string): Either.Either<number, InvalidGuess> {
	const trimmed = text.trim();
	if (trimmed.length === 0) {
		return Either.left(new InvalidGuess({ reason: "empty" }));
	}
	if (!UNSIGNED_INTEGER.test(trimmed)) {
		return Either.left(new InvalidGuess({ reason: "not-a-number" }));
	}
	const digits = trimmed.startsWith("+") ? trimmed.slice(1) : trimmed;
	const value = Number(digits);
	if (value > MAX_GUESS) {
		return Either.left(new InvalidGuess({ reason: "out-of-range" }));
	}
	return Either.right(value);
}
