/**
 * CLI argument parsing and help utilities
 */

import { Command } from "commander";
import { type AppConfig, loadConfig, validateConfig } from "./config.js";
import { validateCommand, validateDuration } from "./schemas.js";
import { getVersion } from "./version.js";

export interface ParsedCliArgs {
	command: string;
	args: string[];
	config: AppConfig;
}

/**
 * Create and configure the Commander.js program
 */
function createProgram(): Command {
	const program = new Command();

	program
		.name("acp-debounce")
		.description(
			"Run an ACP agent behind a proxy that coalesces its streamed text chunks",
		)
		.version(getVersion())
		.argument("<command>", "Agent command to run")
		.argument("[args...]", "Arguments passed to the agent")
		.option("-i, --interval <ms>", "Flush interval in milliseconds")
		.option(
			"--shutdown-grace <ms>",
			"Time to wait for the agent to exit before terminating it",
		)
		.option("--verbose", "Log every relayed message")
		.passThroughOptions()
		.addHelpText(
			"after",
			`
Examples:
  acp-debounce my-agent --acp
  acp-debounce -i 250 node ./agent.js
  LOG_LEVEL=info acp-debounce --interval 50 npx some-acp-agent`,
		);

	return program;
}

/**
 * Parse command line arguments and return configuration
 */
export async function parseCliArgs(args: string[]): Promise<ParsedCliArgs> {
	const config = loadConfig();
	validateConfig(config);

	const program = createProgram();
	program.parse(args, { from: "user" });
	const options = program.opts<{
		interval?: string;
		shutdownGrace?: string;
		verbose?: boolean;
	}>();

	// Apply CLI overrides to config
	if (options.interval !== undefined) {
		config.flushIntervalMs = validateDuration(options.interval, "interval");
	}
	if (options.shutdownGrace !== undefined) {
		config.shutdownGraceMs = validateDuration(
			options.shutdownGrace,
			"shutdown grace",
		);
	}
	if (options.verbose) {
		config.verboseLogging = true;
	}

	const [command = "", ...agentArgs] = program.args;

	// Final validation after CLI overrides
	validateConfig(config);

	return {
		command: validateCommand(command),
		args: agentArgs,
		config,
	};
}
