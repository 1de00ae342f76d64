// CHANGE: Application layer composing the pure session with terminal and random services
// WHY: APP owns the loop; CORE decides, SHELL performs I/O
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, InputError, Terminal | RandomSource>
// INVARIANT: Returns only after a Finished state; input failures propagate unchanged
// COMPLEXITY: O(k) where k = number of lines read

import { Effect } from "effect";

import type { InputError } from "../core/errors.js";
import { renderEvent } from "../core/format/messages.js";
import type { ExitCode, SessionOutcome } from "../core/models.js";
import { introduction, isFinished, startSession, step } from "../core/session.js";
import type {
	GameEvent,
	GameOptions,
	SessionState,
} from "../core/types/index.js";
import { RandomSource } from "../shell/services/random.js";
import { Terminal } from "../shell/services/terminal.js";

const printEvents = (
	events: ReadonlyArray<GameEvent>,
): Effect.Effect<void, never, Terminal> =>
	Effect.flatMap(Terminal, (terminal) =>
		Effect.forEach(events, (event) => terminal.writeLine(renderEvent(event)), {
			discard: true,
		}),
	);

/**
 * Plays one session to completion.
 *
 * @param options - Range to draw from and reveal switch
 * @returns Secret and number of parsed guesses once the player wins
 *
 * @pure false (reads input, writes output, draws randomness)
 * @effect Effect<SessionOutcome, InputError, Terminal | RandomSource>
 * @invariant the secret is drawn once and never reassigned
 */
export function playSession(
	options: GameOptions,
): Effect.Effect<SessionOutcome, InputError, Terminal | RandomSource> {
	return Effect.gen(function* () {
		const random = yield* RandomSource;
		const terminal = yield* Terminal;

		const secret = yield* random.drawUniform(
			options.range.min,
			options.range.max,
		);
		yield* printEvents(introduction(options.range, secret, options.reveal));

		let state: SessionState = startSession(secret);
		while (!isFinished(state)) {
			const line = yield* terminal.readLine;
			const next = step(state, line);
			yield* printEvents(next.events);
			state = next.state;
		}

		return { secret: state.secret, attempts: state.attempts };
	});
}

/**
 * Runs the game and returns ExitCode as value (no process.exit).
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @effect Effect<ExitCode, InputError, Terminal | RandomSource>
 * @postcondition success → 0
 */
export function runGame(
	options: GameOptions,
): Effect.Effect<ExitCode, InputError, Terminal | RandomSource> {
	return playSession(options).pipe(Effect.as<ExitCode>(0));
}
