/**
 * Test Reporter
 *
 * Interface and implementations for reporting run progress.
 */

import type { TestcaseResult, TestsetResult } from "../runner/runner.types";
import type { RunSummary, TestsetInfo } from "./recording.types";

/**
 * Test Reporter Interface
 */
export interface TestReporter {
	/** Reporter name */
	readonly name: string;

	/** Called when `runTestsets` starts */
	onStart?(info: { testsetCount: number; startTime: number }): void;

	/** Called when a testset starts */
	onTestsetStart?(testset: TestsetInfo): void;

	/** Called when a testcase completes (or aborts under `continueOnError`) */
	onTestcaseComplete?(result: TestcaseResult): void;

	/** Called when a testset completes */
	onTestsetComplete?(testset: TestsetInfo, results: TestsetResult): void;

	/** Called when `runTestsets` completes */
	onComplete?(summary: RunSummary): void;

	/** Called when a testcase raises */
	onError?(error: Error): void;
}

/**
 * Console Reporter
 *
 * Outputs progress and a summary to the console.
 */
export class ConsoleReporter implements TestReporter {
	readonly name = "console";
	private verbose: boolean;

	constructor(options?: { verbose?: boolean }) {
		this.verbose = options?.verbose ?? false;
	}

	onTestsetStart(testset: TestsetInfo): void {
		console.log(`\n${"=".repeat(60)}`);
		console.log(`🧪 Testset: ${testset.name || `#${testset.index + 1}`} (${testset.testcaseCount} testcase(s))`);
		console.log(`${"=".repeat(60)}\n`);
	}

	onTestcaseComplete(result: TestcaseResult): void {
		const icon = result.success ? "✅" : "❌";
		const status = result.success ? "PASSED" : "FAILED";
		console.log(`${icon} ${result.name || "Unnamed testcase"} - ${status}`);

		if (result.error) {
			console.log(`   Error: ${result.error}`);
		}

		for (const record of result.diffContent) {
			if (!this.verbose && record.passed) continue;
			const mark = record.passed ? "\x1b[32m✓\x1b[0m" : "\x1b[31m✗\x1b[0m";
			const comparator = record.validator.comparator ?? "eq";
			console.log(
				`    ${mark} ${record.validator.check} ${comparator} ${JSON.stringify(record.expected)}` +
					(record.passed ? "" : ` (actual: ${JSON.stringify(record.actual)})`) +
					(record.error ? ` - ${record.error}` : ""),
			);
		}
	}

	onComplete(summary: RunSummary): void {
		console.log(`\n${"-".repeat(60)}`);
		console.log("📊 Summary");
		console.log("-".repeat(60));

		console.log(`Testsets:  ${summary.totalTestsets}`);
		console.log(`Testcases: ${summary.totalTestcases}`);
		console.log(`Passed:    ${summary.passedTestcases}`);
		console.log(`Failed:    ${summary.failedTestcases}`);
		console.log(`Duration:  ${summary.duration}ms`);

		console.log("-".repeat(60));

		if (summary.failedTestcases === 0) {
			console.log("\n✅ All testcases passed!\n");
		} else {
			console.log("\n❌ Some testcases failed.\n");
		}
	}

	onError(error: Error): void {
		console.error(`\n❌ Error: ${error.message}\n`);
	}
}

/**
 * JSON Reporter
 *
 * Collects the run summary as JSON.
 */
export class JsonReporter implements TestReporter {
	readonly name = "json";
	private output: string[] = [];
	private prettyPrint: boolean;

	constructor(options?: { prettyPrint?: boolean }) {
		this.prettyPrint = options?.prettyPrint ?? true;
	}

	onComplete(summary: RunSummary): void {
		this.output.push(this.prettyPrint ? JSON.stringify(summary, null, 2) : JSON.stringify(summary));
	}

	/**
	 * Get the JSON output
	 */
	getOutput(): string {
		return this.output.join("\n");
	}
}

/**
 * Composite Reporter
 *
 * Fans events out to several reporters.
 */
export class CompositeReporter implements TestReporter {
	readonly name = "composite";
	private reporters: TestReporter[];

	constructor(reporters: TestReporter[] = []) {
		this.reporters = [...reporters];
	}

	onStart(info: { testsetCount: number; startTime: number }): void {
		for (const reporter of this.reporters) {
			reporter.onStart?.(info);
		}
	}

	onTestsetStart(testset: TestsetInfo): void {
		for (const reporter of this.reporters) {
			reporter.onTestsetStart?.(testset);
		}
	}

	onTestcaseComplete(result: TestcaseResult): void {
		for (const reporter of this.reporters) {
			reporter.onTestcaseComplete?.(result);
		}
	}

	onTestsetComplete(testset: TestsetInfo, results: TestsetResult): void {
		for (const reporter of this.reporters) {
			reporter.onTestsetComplete?.(testset, results);
		}
	}

	onComplete(summary: RunSummary): void {
		for (const reporter of this.reporters) {
			reporter.onComplete?.(summary);
		}
	}

	onError(error: Error): void {
		for (const reporter of this.reporters) {
			reporter.onError?.(error);
		}
	}

	/**
	 * Add a reporter
	 */
	addReporter(reporter: TestReporter): void {
		this.reporters.push(reporter);
	}

	/**
	 * Remove a reporter by name
	 */
	removeReporter(name: string): void {
		this.reporters = this.reporters.filter((r) => r.name !== name);
	}
}
