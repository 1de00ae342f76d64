// CHANGE: Session state machine and event types
// WHY: The guessing loop is modelled as an explicit two-state machine with events as output
// PURITY: CORE
// INVARIANT: Finished is terminal; secret is fixed for the lifetime of a session
// COMPLEXITY: O(1)

import type { GuessRange } from "../models.js";

/**
 * Session waiting for the next line of input.
 *
 * @property secret Hidden value, never changes after start
 * @property attempts Number of parsed guesses so far
 */
export interface AwaitingGuess {
	readonly _tag: "AwaitingGuess";
	readonly secret: number;
	readonly attempts: number;
}

/**
 * Terminal state reached after the secret was guessed.
 */
export interface Finished {
	readonly _tag: "Finished";
	readonly secret: number;
	readonly attempts: number;
}

export type SessionState = AwaitingGuess | Finished;

/**
 * Everything a session reports to the player, in order of appearance.
 */
export type GameEvent =
	| { readonly _tag: "Welcome" }
	| { readonly _tag: "SecretRevealed"; readonly secret: number }
	| { readonly _tag: "Prompt"; readonly range: GuessRange }
	| { readonly _tag: "InvalidGuess" }
	| { readonly _tag: "GuessEchoed"; readonly guess: number }
	| { readonly _tag: "TooLow" }
	| { readonly _tag: "TooHigh" }
	| { readonly _tag: "Correct" };

export type GameEventTag = GameEvent["_tag"];

/**
 * Output of a single dispatch step.
 *
 * @invariant events are emitted in the order they must be printed
 */
export interface StepResult {
	readonly state: SessionState;
	readonly events: ReadonlyArray<GameEvent>;
}
