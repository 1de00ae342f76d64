#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// FORMAT THEOREM: ∀run: main resolves exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { main } from "../main.js";

/**
 * CLI entry point for number-guess.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 after a correct guess, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await main();
		// Shell boundary: single process exit
		process.exit(code);
	} catch (error) {
		// Defects only; typed failures are already mapped to exit code 1 by main
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
