// CHANGE: Render session events and fatal errors as terminal lines
// PURITY: CORE
// INVARIANT: Exhaustive over GameEvent and AppError; one line per event
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";
import type { GameEvent } from "../types/index.js";

/**
 * Turns a session event into the line shown to the player.
 *
 * @pure true
 *
 * @example
 * ```ts
 * renderEvent({ _tag: "GuessEchoed", guess: 7 }); // "You guessed: 7"
 * ```
 */
export const renderEvent = (event: GameEvent): string =>
	match(event)
		.with({ _tag: "Welcome" }, () => "Welcome to the Guessing Game!")
		.with(
			{ _tag: "SecretRevealed" },
			({ secret }) => `The secret number is: ${secret}`,
		)
		.with(
			{ _tag: "Prompt" },
			({ range }) =>
				`I've picked a number between ${range.min} and ${range.max}. Can you guess what it is?`,
		)
		.with(
			{ _tag: "InvalidGuess" },
			() => "That doesn't seem like a number. Please enter a valid number:",
		)
		.with({ _tag: "GuessEchoed" }, ({ guess }) => `You guessed: ${guess}`)
		.with({ _tag: "TooLow" }, () => "Too low! Try again:")
		.with({ _tag: "TooHigh" }, () => "Too high! Try again:")
		.with(
			{ _tag: "Correct" },
			() => "Congratulations! You guessed the right number!",
		)
		.exhaustive();

/**
 * Describes a fatal error for stderr.
 *
 * @pure true
 */
export const describeAppError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "InputClosed" },
			({ linesRead }) =>
				`Failed to read line: input closed after ${linesRead} line(s) without a correct guess`,
		)
		.with(
			{ _tag: "InputReadError" },
			({ detail }) => `Failed to read line: ${detail}`,
		)
		.with(
			{ _tag: "InvalidOptions" },
			({ flag, detail }) => `Invalid option ${flag}: ${detail}`,
		)
		.exhaustive();
