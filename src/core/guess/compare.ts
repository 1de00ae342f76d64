// CHANGE: Compare a parsed guess against the secret
// FORMAT THEOREM: compareGuess(g, s) = "Less" ↔ g < s; "Greater" ↔ g > s; "Equal" ↔ g = s
// PURITY: CORE
// COMPLEXITY: O(1)

import { Order } from "effect";
import { match } from "ts-pattern";

import type { Comparison } from "../models.js";

/**
 * Orders a guess relative to the secret value.
 *
 * @pure true
 * @invariant total: exactly one Comparison for every pair of numbers
 */
export const compareGuess = (guess: number, secret: number): Comparison =>
	match(Order.number(guess, secret))
		.returnType<Comparison>()
		.with(-1, () => "Less")
		.with(1, () => "Greater")
		.with(0, () => "Equal")
		.exhaustive();
