#!/usr/bin/env node

// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1,2} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../main.js";

/**
 * CLI entry point for path-banner.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once
 */
try {
	const code = Effect.runSync(main(process.argv.slice(2)));
	process.exit(code);
} catch (error) {
	// Defects only; every expected failure is already an exit code
	console.error("Fatal error:", error);
	process.exit(1);
}
