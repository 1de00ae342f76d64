// CHANGE: Pure state machine for one guessing session
// WHY: Replaces loop-with-break control flow by a single dispatch step per input line
// FORMAT THEOREM: ∀s ∈ AwaitingGuess, ∀line: step(s, line).state ∈ Finished ↔ parseGuess(line) = Right(s.secret)
// PURITY: CORE
// INVARIANT: secret is copied unchanged across every transition; Finished is absorbing
// COMPLEXITY: O(|line|) per step

import { Either } from "effect";
import { match } from "ts-pattern";

import { compareGuess } from "./guess/compare.js";
import { parseGuess } from "./guess/parse.js";
import type { GuessRange } from "./models.js";
import type {
	AwaitingGuess,
	Finished,
	GameEvent,
	SessionState,
	StepResult,
} from "./types/index.js";

/**
 * Creates the initial session state for a freshly drawn secret.
 *
 * @pure true
 * @postcondition result._tag = "AwaitingGuess" ∧ result.attempts = 0
 */
export const startSession = (secret: number): AwaitingGuess => ({
	_tag: "AwaitingGuess",
	secret,
	attempts: 0,
});

/**
 * Narrows a state to the terminal variant.
 */
export const isFinished = (state: SessionState): state is Finished =>
	state._tag === "Finished";

/**
 * Events printed once before the first read.
 *
 * @param range - Range the secret was drawn from
 * @param secret - Drawn secret, only emitted when reveal is on
 * @param reveal - Debug switch printing the secret
 */
export function introduction(
	range: GuessRange,
	secret: number,
	reveal: boolean,
): ReadonlyArray<GameEvent> {
	const revealed: ReadonlyArray<GameEvent> = reveal
		? [{ _tag: "SecretRevealed", secret }]
		: [];
	return [{ _tag: "Welcome" }, ...revealed, { _tag: "Prompt", range }];
}

function judge(state: AwaitingGuess, guess: number): StepResult {
	const attempts = state.attempts + 1;
	const echoed: GameEvent = { _tag: "GuessEchoed", guess };
	return match(compareGuess(guess, state.secret))
		.returnType<StepResult>()
		.with("Less", () => ({
			state: { ...state, attempts },
			events: [echoed, { _tag: "TooLow" }],
		}))
		.with("Greater", () => ({
			state: { ...state, attempts },
			events: [echoed, { _tag: "TooHigh" }],
		}))
		.with("Equal", () => ({
			state: { _tag: "Finished", secret: state.secret, attempts },
			events: [echoed, { _tag: "Correct" }],
		}))
		.exhaustive();
}

/**
 * Feeds one line of input to the session.
 *
 * Malformed input yields an InvalidGuess event and leaves the state untouched,
 * so it does not count as an attempt. A finished session ignores input.
 *
 * @param state - Current session state
 * @param line - Raw line as read from input
 * @returns Next state and the events to print, in order
 *
 * @pure true
 * @invariant result.state.secret = state.secret
 *
 * @example
 * ```ts
 * const s0 = startSession(42);
 * step(s0, "abc").events; // [{ _tag: "InvalidGuess" }]
 * step(s0, "42").state._tag; // "Finished"
 * ```
 */
export function step(state: SessionState, line: string): StepResult {
	if (isFinished(state)) {
		return { state, events: [] };
	}
	return Either.match(parseGuess(line), {
		onLeft: (): StepResult => ({
			state,
			events: [{ _tag: "InvalidGuess" }],
		}),
		onRight: (guess) => judge(state, guess),
	});
}

/**
 * Replays a whole input script against a secret, stopping at the first match.
 *
 * Lines after the winning guess are not consumed.
 *
 * @pure true
 * @complexity O(Σ|line|)
 */
export function replay(
	secret: number,
	lines: ReadonlyArray<string>,
): StepResult {
	let state: SessionState = startSession(secret);
	const events: GameEvent[] = [];
	for (const line of lines) {
		if (isFinished(state)) break;
		const next = step(state, line);
		state = next.state;
		events.push(...next.events);
	}
	return { state, events };
}
