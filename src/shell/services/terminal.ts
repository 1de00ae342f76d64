// CHANGE: Line-oriented terminal as a scoped Effect service
// WHY: The game loop reads whole lines and prints whole lines; stdin/stdout are one binding among many
// PURITY: SHELL (stream I/O)
// EFFECT: Effect<string, InputError, Terminal> for reads, Effect<void, never, Terminal> for writes
// INVARIANT: Every successful readLine returns exactly one line without its terminator
// INVARIANT: The readline interface is closed when the owning scope closes
// INVARIANT: Input that is not valid UTF-8 fails the read with InputReadError
// COMPLEXITY: O(|line|) per read

import * as readline from "node:readline";
import { Transform, type TransformCallback } from "node:stream";
import { TextDecoder } from "node:util";

import { Context, Effect, Layer, type Scope } from "effect";

import {
	InputClosed,
	type InputError,
	InputReadError,
} from "../../core/errors.js";

/**
 * Line input and output for the player.
 */
export class Terminal extends Context.Tag("Terminal")<
	Terminal,
	{
		/** Blocks until one line is available; fails when the stream ends or errors. */
		readonly readLine: Effect.Effect<string, InputError>;
		readonly writeLine: (text: string) => Effect.Effect<void>;
	}
>() {}

const describeUnknown = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

const asError = (error: unknown): Error =>
	error instanceof Error ? error : new Error(String(error));

/**
 * Strict UTF-8 decoding stage. Malformed bytes destroy the stream with a
 * TypeError instead of being replaced by U+FFFD.
 */
function strictUtf8(): Transform {
	const decoder = new TextDecoder("utf-8", { fatal: true });
	return new Transform({
		transform(chunk: Buffer, _encoding, callback: TransformCallback): void {
			try {
				callback(null, decoder.decode(chunk, { stream: true }));
			} catch (error) {
				callback(asError(error));
			}
		},
		flush(callback: TransformCallback): void {
			try {
				callback(null, decoder.decode());
			} catch (error) {
				callback(asError(error));
			}
		},
	});
}

/**
 * Builds a terminal over arbitrary Node streams.
 *
 * Input is decoded as strict UTF-8 before line splitting. Faults of the
 * source stream are forwarded to the decoder so readline sees them.
 * The async line iterator is created eagerly so no line emitted before the
 * first read is lost.
 *
 * @param input - Source of lines (process.stdin in production)
 * @param output - Sink for lines (process.stdout in production)
 * @returns Scoped effect producing the service; the interface closes with the scope
 *
 * @pure false (attaches listeners to the input stream)
 */
export function makeStreamTerminal(
	input: NodeJS.ReadableStream,
	output: NodeJS.WritableStream,
): Effect.Effect<Context.Tag.Service<Terminal>, never, Scope.Scope> {
	return Effect.gen(function* () {
		const decoded = yield* Effect.acquireRelease(
			Effect.sync(() => {
				const stage = strictUtf8();
				input.on("error", (error: Error) => stage.destroy(error));
				return input.pipe(stage);
			}),
			(stage) =>
				Effect.sync(() => {
					input.unpipe(stage);
				}),
		);
		const rl = yield* Effect.acquireRelease(
			Effect.sync(() =>
				readline.createInterface({
					input: decoded,
					crlfDelay: Infinity,
					terminal: false,
				}),
			),
			(iface) => Effect.sync(() => iface.close()),
		);
		const lines = rl[Symbol.asyncIterator]();
		let linesRead = 0;

		const readLine: Effect.Effect<string, InputError> = Effect.tryPromise({
			try: () => lines.next(),
			catch: (error) => new InputReadError({ detail: describeUnknown(error) }),
		}).pipe(
			Effect.flatMap((result): Effect.Effect<string, InputClosed> => {
				if (result.done === true) {
					return Effect.fail(new InputClosed({ linesRead }));
				}
				linesRead += 1;
				return Effect.succeed(result.value);
			}),
		);

		const writeLine = (text: string): Effect.Effect<void> =>
			Effect.sync(() => {
				output.write(`${text}\n`);
			});

		return { readLine, writeLine };
	});
}

/**
 * Terminal bound to the process standard streams.
 */
export const TerminalLive: Layer.Layer<Terminal> = Layer.scoped(
	Terminal,
	Effect.suspend(() => makeStreamTerminal(process.stdin, process.stdout)),
);
