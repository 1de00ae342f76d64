// CHANGE: Typed error ADT for the game using Effect.Data
// WHY: Fatal conditions travel in the Effect error channel; only BIN turns them into an exit status
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Input stream reached end-of-stream before the secret was guessed.
 *
 * @pure true (Data class)
 */
export class InputClosed extends Data.TaggedError("InputClosed")<{
	readonly linesRead: number;
}> {}

/**
 * Input stream raised an I/O fault while a line was being read.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class InputReadError extends Data.TaggedError("InputReadError")<{
	readonly detail: string;
}> {}

/**
 * Command line could not be turned into game options.
 *
 * @pure true (Data class)
 * @invariant flag.length > 0 ∧ detail.length > 0
 */
export class InvalidOptions extends Data.TaggedError("InvalidOptions")<{
	readonly flag: string;
	readonly detail: string;
}> {}

/**
 * Errors a line read can fail with.
 */
export type InputError = InputClosed | InputReadError;

/**
 * Union type of all fatal application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError = InputClosed | InputReadError | InvalidOptions;
