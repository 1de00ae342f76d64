// CHANGE: Deterministic and property-based specs for guess parsing
// FORMAT THEOREM: ∀n ∈ [0, MAX_GUESS], ∀ws: parseGuess(ws + String(n) + ws) = Right(n)
// PURITY: CORE
// INVARIANT: Only optional "+" followed by ASCII digits within u32 is accepted

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	type InvalidGuessReason,
	parseGuess,
} from "../../../src/core/guess/parse.js";
import { MAX_GUESS } from "../../../src/core/models.js";

const valueOf = (text: string): number | undefined =>
	Either.getOrUndefined(parseGuess(text));

const reasonOf = (text: string): InvalidGuessReason | undefined => {
	const result = parseGuess(text);
	return Either.isLeft(result) ? result.left.reason : undefined;
};

describe("parseGuess: accepted input", () => {
	it("parses plain digits", () => {
		expect(valueOf("42")).toBe(42);
	});

	it("trims surrounding whitespace including the line terminator", () => {
		expect(valueOf("  42\n")).toBe(42);
		expect(valueOf("\t7\r\n")).toBe(7);
	});

	it("accepts a leading plus sign", () => {
		expect(valueOf("+7")).toBe(7);
	});

	it("accepts leading zeros", () => {
		expect(valueOf("007")).toBe(7);
	});

	it("accepts zero even though it is below the default range", () => {
		expect(valueOf("0")).toBe(0);
	});

	it("accepts values far outside the default range", () => {
		expect(valueOf("500")).toBe(500);
	});

	it("accepts the largest unsigned 32-bit value", () => {
		expect(valueOf("4294967295")).toBe(MAX_GUESS);
	});
});

describe("parseGuess: rejected input", () => {
	it("reports empty for blank lines", () => {
		expect(reasonOf("")).toBe("empty");
		expect(reasonOf("   \n")).toBe("empty");
	});

	it("reports not-a-number for letters", () => {
		expect(reasonOf("abc")).toBe("not-a-number");
	});

	it("reports not-a-number for negative values", () => {
		expect(reasonOf("-1")).toBe("not-a-number");
	});

	it("reports not-a-number for embedded whitespace", () => {
		expect(reasonOf("4 2")).toBe("not-a-number");
	});

	it("reports not-a-number for decimals and exponents", () => {
		expect(reasonOf("3.5")).toBe("not-a-number");
		expect(reasonOf("1e3")).toBe("not-a-number");
	});

	it("reports not-a-number for a lone sign", () => {
		expect(reasonOf("+")).toBe("not-a-number");
	});

	it("reports out-of-range past the unsigned 32-bit limit", () => {
		expect(reasonOf("4294967296")).toBe("out-of-range");
	});

	it("classifies whitespace inside digits as not-a-number, not empty", () => {
		expect(reasonOf(" 1 2 \n")).toBe("not-a-number");
	});
});

describe("parseGuess invariants", () => {
	const whitespace = fc
		.array(fc.constantFrom(" ", "\t", "\n", "\r"), { maxLength: 3 })
		.map((chars) => chars.join(""));

	it("round-trips every unsigned 32-bit integer with surrounding whitespace", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 0, max: MAX_GUESS }),
				whitespace,
				whitespace,
				(n, before, after) => valueOf(`${before}${String(n)}${after}`) === n,
			),
		);
	});

	it("rejects every string containing a letter", () => {
		fc.assert(
			fc.property(
				fc.string().filter((s) => /[a-z]/iu.test(s)),
				(s) => Either.isLeft(parseGuess(s)),
			),
		);
	});
});
