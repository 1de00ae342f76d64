// CHANGE: Domain models for the guessing game core (pure, immutable)
// WHY: CORE holds only data and pure functions; SHELL and APP depend on it, never the reverse
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the game process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Closed integer range the secret value is drawn from.
 *
 * @remarks
 * - @invariant 0 ≤ min ≤ max
 */
export interface GuessRange {
	readonly min: number;
	readonly max: number;
}

/**
 * Range used when no bounds are given on the command line.
 */
export const DEFAULT_RANGE: GuessRange = { min: 1, max: 100 };

/**
 * Largest value a parsed guess can hold (unsigned 32-bit).
 */
export const MAX_GUESS = 4_294_967_295;

/**
 * Result of comparing a guess to the secret.
 */
export type Comparison = "Less" | "Greater" | "Equal";

/**
 * Value returned once a session reaches its terminal state.
 *
 * @remarks
 * - @invariant attempts ≥ 1 (the winning guess is always counted)
 */
export interface SessionOutcome {
	readonly secret: number;
	readonly attempts: number;
}
