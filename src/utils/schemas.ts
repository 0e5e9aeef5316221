/**
 * Zod validation schemas for configuration input
 */

import { z } from "zod";

export class ValidationError extends Error {
	constructor(
		message: string,
		public readonly field?: string,
	) {
		super(message);
		this.name = "ValidationError";
	}
}

/**
 * Schema for a duration in whole milliseconds, given as a number or a
 * numeric string (CLI flags and environment variables arrive as strings)
 */
const durationSchema = z
	.preprocess(
		(val) => (typeof val === "number" ? String(val) : val),
		z
			.string()
			.trim()
			.regex(/^-?\d+(\.\d+)?$/, "Must be a whole number of milliseconds")
			.transform((val) => Number(val)),
	)
	.pipe(
		z
			.number()
			.int("Must be a whole number of milliseconds")
			.nonnegative("Cannot be negative"),
	);

/**
 * Schema for a command line token passed on to the agent
 */
const commandSchema = z
	.string()
	.min(1, "Agent command cannot be empty")
	.refine((val) => val.trim().length > 0, "Agent command cannot be blank")
	.refine((val) => !val.includes("\0"), "Agent command cannot contain null bytes");

/**
 * Validation functions using Zod schemas
 */
export function validateDuration(
	value: string | number,
	field: string,
): number {
	try {
		return durationSchema.parse(value);
	} catch (error) {
		if (error instanceof z.ZodError) {
			const issue = error.issues[0];
			throw new ValidationError(`Invalid ${field}: ${issue.message}`, field);
		}
		throw error;
	}
}

export function validateCommand(command: string): string {
	try {
		return commandSchema.parse(command);
	} catch (error) {
		if (error instanceof z.ZodError) {
			const issue = error.issues[0];
			throw new ValidationError(issue.message, "command");
		}
		throw error;
	}
}

export const schemas = {
	duration: durationSchema,
	command: commandSchema,
};
