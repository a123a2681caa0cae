#!/usr/bin/env node

/**
 * @blockpaint/cli — Entry point.
 */

import { run } from "./main.js";

run(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		const message = error instanceof Error ? error.message : String(error);
		process.stderr.write(`\nFatal error: ${message}\n\n`);
		process.exitCode = 1;
	},
);
