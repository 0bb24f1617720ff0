/**
 * Runner Types
 */

import type { BindingConfig, BoundFunction, Context, FunctionModule } from "../context";
import type { TestReporter } from "../recording";
import type { DiffRecord, ExtractBinds, ValidatorSpec } from "../response";
import type { HttpTransport } from "../transport";
import type { ValueObject } from "../values";

// =============================================================================
// Suite Shapes
// =============================================================================

/**
 * One request/validate unit. Binding fields override the enclosing testset.
 */
export interface Testcase extends BindingConfig {
	request: ValueObject;
	extract_binds?: ExtractBinds;
	validators?: ValidatorSpec[];
}

/**
 * Group of testcases sharing one inherited scope
 */
export interface Testset {
	name?: string;
	config?: BindingConfig;
	testcases: Testcase[];
}

/**
 * Scope level passed to `updateContext`; only `testset` snapshots request defaults
 */
export type ContextLevel = "testset" | "testcase";

// =============================================================================
// Results
// =============================================================================

export interface TestcaseResult {
	name?: string;
	success: boolean;
	diffContent: DiffRecord[];
	/** Error message when the testcase aborted and `continueOnError` is set */
	error?: string;
}

export type TestsetResult = TestcaseResult[];

// =============================================================================
// Options
// =============================================================================

export interface RunnerOptions {
	/** Context shared by every call; a fresh one is created when omitted */
	context?: Context;
	/** Transport performing requests; defaults to FetchTransport */
	transport?: HttpTransport;
	/** Lifecycle listeners */
	reporters?: TestReporter[];
	/** Record an aborted testcase as failed and go on with the testset. Default: false */
	continueOnError?: boolean;
	/** Callables bindable by bare name */
	functions?: Record<string, BoundFunction>;
	/** Extra modules for `requires` */
	modules?: Record<string, FunctionModule>;
}
