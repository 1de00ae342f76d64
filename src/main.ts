// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI options, provides live services and delegates to app/runGame
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value; typed failures are reported once on stderr
// COMPLEXITY: O(1)

import { Effect, Either, Layer } from "effect";

import { runGame } from "./app/runGame.js";
import type { AppError } from "./core/errors.js";
import { describeAppError } from "./core/format/messages.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";
import { RandomSourceLive } from "./shell/services/random.js";
import { TerminalLive } from "./shell/services/terminal.js";

const reportFatal = (error: AppError): Effect.Effect<ExitCode> =>
	Effect.sync(() => {
		console.error(`Fatal error: ${describeAppError(error)}`);
		return 1;
	});

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv - Command-line arguments after the script path
 * @returns ExitCode (0 | 1)
 *
 * @pure false (stdin/stdout), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(
	argv: ReadonlyArray<string> = process.argv.slice(2),
): Promise<ExitCode> {
	const program = Either.match(parseCLIArgs(argv), {
		onLeft: (error) => reportFatal(error),
		onRight: (options) =>
			runGame(options).pipe(
				Effect.provide(Layer.merge(TerminalLive, RandomSourceLive)),
				Effect.catchAll(reportFatal),
			),
	});
	return Effect.runPromise(program);
}
