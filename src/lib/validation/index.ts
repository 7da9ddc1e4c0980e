/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Library code imports `{ z }` from here rather than from "zod" directly, so
 * the dependency stays behind a single import path.
 */

import { z } from "zod";
import { ErrorCategory, InfraError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends InfraError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, {
			issues: issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(schema: z.ZodType<T>, data: unknown): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}

/**
 * Validates a single optional setting. Absent values and values that fail the
 * schema both yield `fallback`; `onInvalid` sees the failure so callers can log it.
 */
export function validateOr<T>(
	schema: z.ZodType<T>,
	data: unknown,
	fallback: T,
	onInvalid?: (error: ValidationError) => void,
): T {
	if (data === undefined || data === null) return fallback;
	const result = validate(schema, data);
	if (result.ok) return result.value;
	onInvalid?.(result.error);
	return fallback;
}
