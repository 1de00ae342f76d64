// CHANGE: Game options type produced by CLI parsing
// PURITY: CORE
// INVARIANT: 0 ≤ range.min ≤ range.max

import type { GuessRange } from "../models.js";

/**
 * Options for one game session.
 *
 * @property range Closed range the secret is drawn from
 * @property reveal Print the secret right after the welcome line
 */
export interface GameOptions {
	readonly range: GuessRange;
	readonly reveal: boolean;
}
