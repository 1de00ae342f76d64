// CHANGE: Random source as an Effect service
// WHY: The session depends on a single draw capability; tests substitute a deterministic source
// PURITY: SHELL (live layer reads OS entropy)
// EFFECT: Effect<number, never, RandomSource>
// INVARIANT: ∀low ≤ high: low ≤ drawUniform(low, high) ≤ high
// COMPLEXITY: O(1)

import { randomInt } from "node:crypto";

import { Context, Effect, Layer } from "effect";

/**
 * Source of uniformly distributed integers.
 */
export class RandomSource extends Context.Tag("RandomSource")<
	RandomSource,
	{
		/**
		 * Draws an integer from the closed range [low, high].
		 *
		 * @precondition Number.isInteger(low) ∧ Number.isInteger(high) ∧ low ≤ high
		 */
		readonly drawUniform: (low: number, high: number) => Effect.Effect<number>;
	}
>() {}

/**
 * Live source backed by node:crypto. Never seeded explicitly.
 *
 * @pure false (consumes OS entropy)
 */
export const RandomSourceLive = Layer.succeed(RandomSource, {
	// randomInt excludes its upper bound
	drawUniform: (low, high) => Effect.sync(() => randomInt(low, high + 1)),
});
