/**
 * Recording Types
 *
 * Shapes passed to reporters during a run.
 */

import type { TestcaseResult, TestsetResult } from "../runner/runner.types";

/**
 * Emitted when a testset starts
 */
export interface TestsetInfo {
	name?: string;
	index: number;
	testcaseCount: number;
}

/**
 * Totals for a completed `runTestsets` call
 */
export interface RunSummary {
	totalTestsets: number;
	totalTestcases: number;
	passedTestcases: number;
	failedTestcases: number;
	startTime: number;
	endTime: number;
	duration: number;
	results: TestsetResult[];
}

/**
 * Summarize testset results
 */
export function summarize(results: TestsetResult[], startTime: number, endTime = Date.now()): RunSummary {
	const all: TestcaseResult[] = results.flat();
	const passed = all.filter((result) => result.success).length;
	return {
		totalTestsets: results.length,
		totalTestcases: all.length,
		passedTestcases: passed,
		failedTestcases: all.length - passed,
		startTime,
		endTime,
		duration: endTime - startTime,
		results,
	};
}
