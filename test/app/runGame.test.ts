// CHANGE: End-to-end specs for the game loop with in-process services
// PURITY: SHELL - runs Effects against scripted terminal and fixed random layers
// INVARIANT: Output lines match the session events exactly, in order

import { Readable, Writable } from "node:stream";

import { Effect, Layer } from "effect";
import { describe, expect, it } from "vitest";

import { playSession, runGame } from "../../src/app/runGame.js";
import type { GameOptions } from "../../src/core/types/index.js";
import {
	makeStreamTerminal,
	Terminal,
} from "../../src/shell/services/terminal.js";
import { fixedRandom, scriptedTerminal } from "../utils/builders.js";

const classic: GameOptions = { range: { min: 1, max: 100 }, reveal: false };

const WELCOME = "Welcome to the Guessing Game!";
const PROMPT =
	"I've picked a number between 1 and 100. Can you guess what it is?";
const CONGRATS = "Congratulations! You guessed the right number!";

describe("runGame", () => {
	it("plays abc, 10, 90, 42 against secret 42 and exits with 0", async () => {
		const written: string[] = [];
		const code = await Effect.runPromise(
			runGame(classic).pipe(
				Effect.provide(
					Layer.merge(
						scriptedTerminal(["abc", "10", "90", "42"], written),
						fixedRandom(42),
					),
				),
			),
		);

		expect(code).toBe(0);
		expect(written).toEqual([
			WELCOME,
			PROMPT,
			"That doesn't seem like a number. Please enter a valid number:",
			"You guessed: 10",
			"Too low! Try again:",
			"You guessed: 90",
			"Too high! Try again:",
			"You guessed: 42",
			CONGRATS,
		]);
	});

	it("finishes after a single line when the first guess matches", async () => {
		const written: string[] = [];
		await Effect.runPromise(
			runGame(classic).pipe(
				Effect.provide(
					Layer.merge(scriptedTerminal(["1", "2"], written), fixedRandom(1)),
				),
			),
		);

		expect(written).toEqual([WELCOME, PROMPT, "You guessed: 1", CONGRATS]);
	});

	it("fails with InputClosed when input ends before a match", async () => {
		const written: string[] = [];
		const error = await Effect.runPromise(
			Effect.flip(
				runGame(classic).pipe(
					Effect.provide(
						Layer.merge(scriptedTerminal(["10"], written), fixedRandom(42)),
					),
				),
			),
		);

		expect(error._tag).toBe("InputClosed");
		expect(written.at(-1)).toBe("Too low! Try again:");
	});
});

describe("playSession", () => {
	it("draws once from the configured range and announces it", async () => {
		const written: string[] = [];
		const requests: Array<readonly [number, number]> = [];
		const outcome = await Effect.runPromise(
			playSession({ range: { min: 3, max: 9 }, reveal: false }).pipe(
				Effect.provide(
					Layer.merge(scriptedTerminal(["5"], written), fixedRandom(5, requests)),
				),
			),
		);

		expect(requests).toEqual([[3, 9]]);
		expect(written[1]).toBe(
			"I've picked a number between 3 and 9. Can you guess what it is?",
		);
		expect(outcome).toEqual({ secret: 5, attempts: 1 });
	});

	it("counts valid guesses only", async () => {
		const outcome = await Effect.runPromise(
			playSession(classic).pipe(
				Effect.provide(
					Layer.merge(
						scriptedTerminal(["", "x", "50", "50", "100"], []),
						fixedRandom(100),
					),
				),
			),
		);

		expect(outcome).toEqual({ secret: 100, attempts: 3 });
	});

	it("prints the secret after the welcome line when reveal is on", async () => {
		const written: string[] = [];
		await Effect.runPromise(
			playSession({ ...classic, reveal: true }).pipe(
				Effect.provide(
					Layer.merge(scriptedTerminal(["42"], written), fixedRandom(42)),
				),
			),
		);

		expect(written.slice(0, 3)).toEqual([
			WELCOME,
			"The secret number is: 42",
			PROMPT,
		]);
	});

	it("runs over Node streams through the stream terminal", async () => {
		const chunks: string[] = [];
		const output = new Writable({
			write(chunk: Buffer | string, _encoding, callback): void {
				chunks.push(String(chunk));
				callback();
			},
		});
		const terminal = Layer.scoped(
			Terminal,
			makeStreamTerminal(Readable.from(["99\n", "7\n"]), output),
		);

		const outcome = await Effect.runPromise(
			playSession(classic).pipe(
				Effect.provide(Layer.merge(terminal, fixedRandom(7))),
			),
		);

		expect(outcome).toEqual({ secret: 7, attempts: 2 });
		expect(chunks.join("")).toBe(
			[
				WELCOME,
				PROMPT,
				"You guessed: 99",
				"Too high! Try again:",
				"You guessed: 7",
				CONGRATS,
				"",
			].join("\n"),
		);
	});
});
