/**
 * Response Types
 */

import type { Value } from "../values";

/**
 * Declared comparison against a response field or a context value
 */
export interface ValidatorSpec {
	/** Response path (`status_code`, `headers.x`, `body.a.b`) or a `${var}` placeholder */
	check: string;
	/** Comparator name, defaults to `eq` */
	comparator?: string;
	/** Expected value, may contain placeholders */
	expect: Value;
}

/**
 * Outcome of one validator
 */
export interface DiffRecord {
	validator: ValidatorSpec;
	expected: Value;
	actual: Value;
	passed: boolean;
	/** Why the comparison could not be evaluated */
	error?: string;
}

/**
 * Outcome of all validators of a testcase
 */
export interface ValidationResult {
	success: boolean;
	diffContent: DiffRecord[];
}

/**
 * Variable name → extraction path
 */
export type ExtractBinds = Record<string, string>;
