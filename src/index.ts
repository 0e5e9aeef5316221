#!/usr/bin/env node

/**
 * Main entry point for the acp-debounce CLI
 */

import { DebounceApp } from "./app.js";
import { parseCliArgs } from "./utils/cli.js";
import { ValidationError } from "./utils/schemas.js";

/**
 * Main entry point
 */
async function main(): Promise<void> {
	try {
		const args = process.argv.slice(2);

		// Parse CLI arguments and get configuration
		const { command, args: agentArgs, config } = await parseCliArgs(args);

		// stdout belongs to the protocol; diagnostics go to stderr only
		const app = new DebounceApp(command, agentArgs, config);
		process.exitCode = await app.start();
	} catch (error) {
		if (error instanceof ValidationError) {
			console.error(`❌ ${error.message}`);
		} else {
			console.error("❌ Fatal error:", error);
		}
		process.exitCode = 1;
	}
}

// Start the application
await main();
