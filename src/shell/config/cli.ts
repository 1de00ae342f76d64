// CHANGE: Parse command-line flags into immutable GameOptions
// WHY: Range bounds and the reveal switch are the only knobs; no flags means the classic 1..100 game
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Right(options) → 0 ≤ options.range.min ≤ options.range.max ≤ MAX_GUESS
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { InvalidOptions } from "../../core/errors.js";
import { parseGuess } from "../../core/guess/parse.js";
import { DEFAULT_RANGE, MAX_GUESS } from "../../core/models.js";
import type { GameOptions } from "../../core/types/index.js";

interface ArgProcessResult {
	readonly options: GameOptions;
	readonly skipNext: boolean;
}

type FlagHandler = (
	args: ReadonlyArray<string>,
	index: number,
	current: GameOptions,
) => Either.Either<ArgProcessResult, InvalidOptions>;

function createBoundHandler(key: "min" | "max", flag: string): FlagHandler {
	return (args, index, current) => {
		const raw = args[index + 1];
		if (raw === undefined) {
			return Either.left(
				new InvalidOptions({ flag, detail: "expected a value" }),
			);
		}
		return parseGuess(raw).pipe(
			Either.mapLeft(
				({ reason }) =>
					new InvalidOptions({
						flag,
						detail:
							reason === "out-of-range"
								? `value "${raw}" exceeds ${MAX_GUESS}`
								: `expected a non-negative integer, got "${raw}"`,
					}),
			),
			Either.map((value) => ({
				options: { ...current, range: { ...current.range, [key]: value } },
				skipNext: true,
			})),
		);
	};
}

const flagHandlers: ReadonlyMap<string, FlagHandler> = new Map<
	string,
	FlagHandler
>([
	["--min", createBoundHandler("min", "--min")],
	["--max", createBoundHandler("max", "--max")],
	[
		"--reveal",
		(_args, _index, current) =>
			Either.right({ options: { ...current, reveal: true }, skipNext: false }),
	],
]);

function processArgument(
	arg: string,
	args: ReadonlyArray<string>,
	index: number,
	current: GameOptions,
): Either.Either<ArgProcessResult, InvalidOptions> {
	const handler = flagHandlers.get(arg);
	if (handler === undefined) {
		const detail = arg.startsWith("-")
			? "unknown flag"
			: "unexpected positional argument";
		return Either.left(new InvalidOptions({ flag: arg, detail }));
	}
	return handler(args, index, current);
}

function validateRange(
	options: GameOptions,
): Either.Either<GameOptions, InvalidOptions> {
	const { min, max } = options.range;
	return min <= max
		? Either.right(options)
		: Either.left(
				new InvalidOptions({
					flag: "--min",
					detail: `lower bound ${min} is greater than upper bound ${max}`,
				}),
			);
}

/**
 * Parses command-line arguments into game options.
 *
 * @param argv - Arguments without the node binary and script path
 * @returns Right(options) or Left(InvalidOptions) for the first bad argument
 *
 * @example
 * ```ts
 * parseCLIArgs([]);                          // Right({ range: { min: 1, max: 100 }, reveal: false })
 * parseCLIArgs(["--max", "10", "--reveal"]); // Right({ range: { min: 1, max: 10 }, reveal: true })
 * ```
 */
export function parseCLIArgs(
	argv: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<GameOptions, InvalidOptions> {
	let state: GameOptions = { range: DEFAULT_RANGE, reveal: false };

	for (let i = 0; i < argv.length; i++) {
		const arg: string = argv.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, argv, i, state);
		if (Either.isLeft(result)) {
			return Either.left(result.left);
		}
		state = result.right.options;
		if (result.right.skipNext) {
			i++;
		}
	}

	return validateRange(state);
}
