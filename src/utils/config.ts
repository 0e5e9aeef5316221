/**
 * Configuration management for acp-debounce
 */

import { ValidationError, validateDuration } from "./schemas.js";

export interface AppConfig {
	/** Period of the background flush in milliseconds */
	flushIntervalMs: number;

	/** How long to wait for the agent to exit after its input is closed */
	shutdownGraceMs: number;

	/** Log every relayed message (default: false) */
	verboseLogging: boolean;
}

export const DEFAULT_CONFIG: AppConfig = {
	flushIntervalMs: 100,
	shutdownGraceMs: 5000,
	verboseLogging: false,
};

function readDurationEnv(name: string, fallback: number): number {
	const raw = process.env[name];
	if (raw === undefined || raw.trim() === "") return fallback;
	return validateDuration(raw, name);
}

/**
 * Load configuration from environment variables with fallbacks to defaults
 */
export function loadConfig(): AppConfig {
	return {
		flushIntervalMs: readDurationEnv(
			"ACP_DEBOUNCE_INTERVAL_MS",
			DEFAULT_CONFIG.flushIntervalMs,
		),
		shutdownGraceMs: readDurationEnv(
			"ACP_DEBOUNCE_SHUTDOWN_GRACE_MS",
			DEFAULT_CONFIG.shutdownGraceMs,
		),
		verboseLogging: process.env.ACP_DEBOUNCE_VERBOSE === "true",
	};
}

/**
 * Validate configuration values
 */
export function validateConfig(config: AppConfig): void {
	if (config.flushIntervalMs < 1 || config.flushIntervalMs > 60_000) {
		throw new ValidationError(
			"Flush interval must be between 1 and 60,000 milliseconds",
			"interval",
		);
	}

	if (config.shutdownGraceMs < 0 || config.shutdownGraceMs > 60_000) {
		throw new ValidationError(
			"Shutdown grace period must be between 0 and 60,000 milliseconds",
			"shutdownGrace",
		);
	}
}
