// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE functions and service tags; BIN stays private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect services
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Game orchestration for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect, Layer } from "effect";
 * import { RandomSourceLive, runGame, TerminalLive } from "number-guess";
 *
 * const exitCode = await Effect.runPromise(
 *   runGame({ range: { min: 1, max: 100 }, reveal: false }).pipe(
 *     Effect.provide(Layer.merge(TerminalLive, RandomSourceLive)),
 *   ),
 * );
 * ```
 */
export { playSession, runGame } from "./app/runGame.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	Comparison,
	ExitCode,
	GuessRange,
	SessionOutcome,
} from "./core/models.js";
export { DEFAULT_RANGE, MAX_GUESS } from "./core/models.js";
export type {
	AwaitingGuess,
	Finished,
	GameEvent,
	GameEventTag,
	GameOptions,
	SessionState,
	StepResult,
} from "./core/types/index.js";
export {
	type AppError,
	InputClosed,
	type InputError,
	InputReadError,
	InvalidOptions,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	compareGuess,
	InvalidGuess,
	type InvalidGuessReason,
	parseGuess,
} from "./core/guess/index.js";
export {
	introduction,
	isFinished,
	replay,
	startSession,
	step,
} from "./core/session.js";
export { describeAppError, renderEvent } from "./core/format/messages.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export { parseCLIArgs } from "./shell/config/index.js";
export { RandomSource, RandomSourceLive } from "./shell/services/random.js";
export {
	makeStreamTerminal,
	Terminal,
	TerminalLive,
} from "./shell/services/terminal.js";
