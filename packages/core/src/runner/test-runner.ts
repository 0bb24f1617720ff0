/**
 * TestRunner Class
 *
 * Orchestrates testset execution:
 *
 *   runTestsets → runTestset → runTest
 *
 * For each testcase: apply its bindings, merge the testset request defaults
 * with its own request, resolve placeholders, dispatch, extract variables and
 * validate. Testsets and testcases run strictly in order since later ones
 * read variables written by earlier ones.
 *
 * The context is not reset between testsets: variables bound or extracted
 * in one testset stay visible to the following ones.
 */

import type { BindingConfig } from "../context";
import { Context } from "../context";
import { ParamsError, toError } from "../errors";
import { CompositeReporter, summarize } from "../recording";
import type { TestsetInfo } from "../recording";
import { ResponseObject } from "../response";
import type { DispatchRequest, HttpTransport } from "../transport";
import { FetchTransport } from "../transport";
import type { ValueObject } from "../values";
import { cloneValue, isValueObject } from "../values";
import type {
	ContextLevel,
	RunnerOptions,
	Testcase,
	TestcaseResult,
	Testset,
	TestsetResult,
} from "./runner.types";

export class TestRunner {
	readonly context: Context;

	private transport: HttpTransport;
	private reporter: CompositeReporter;
	private continueOnError: boolean;
	private testsetRequest: ValueObject = {};

	constructor(options: RunnerOptions = {}) {
		this.context = options.context ?? new Context();
		this.transport = options.transport ?? new FetchTransport();
		this.reporter = new CompositeReporter(options.reporters);
		this.continueOnError = options.continueOnError ?? false;

		for (const [name, members] of Object.entries(options.modules ?? {})) {
			this.context.registerModule(name, members);
		}
		for (const [name, fn] of Object.entries(options.functions ?? {})) {
			this.context.registerFunction(name, fn);
		}
	}

	/**
	 * Request defaults inherited by testcases of the current testset (a copy)
	 */
	get inheritedRequest(): ValueObject {
		return cloneValue(this.testsetRequest);
	}

	// ========== Scope ==========

	/**
	 * Apply a scope's bindings to the context. At testset level the scope's
	 * `request` becomes the inherited request defaults.
	 */
	updateContext(config: BindingConfig, level: ContextLevel = "testcase"): void {
		this.context.update(config);

		if (level === "testset") {
			this.testsetRequest = cloneValue(config.request ?? {});
		}
	}

	// ========== Execution ==========

	/**
	 * Run a single testcase
	 *
	 * @throws any binding, resolution or transport error, unchanged
	 */
	async runTest(testcase: Testcase): Promise<TestcaseResult> {
		this.updateContext(testcase, "testcase");

		const request = this.buildRequest(testcase);
		const response = new ResponseObject(await this.transport.dispatch(request));

		this.context.updateVariables(response.extract(testcase.extract_binds ?? {}));

		const { success, diffContent } = response.validate(testcase.validators ?? [], this.context);
		return { name: testcase.name, success, diffContent };
	}

	/**
	 * Run all testcases of a testset in order
	 */
	async runTestset(testset: Testset, index = 0): Promise<TestsetResult> {
		const info: TestsetInfo = {
			name: testset.name ?? testset.config?.name,
			index,
			testcaseCount: testset.testcases.length,
		};
		this.reporter.onTestsetStart(info);

		this.updateContext(testset.config ?? {}, "testset");

		const results: TestsetResult = [];
		for (const testcase of testset.testcases) {
			const result = await this.runGuarded(testcase);
			this.reporter.onTestcaseComplete(result);
			results.push(result);
		}

		this.reporter.onTestsetComplete(info, results);
		return results;
	}

	/**
	 * Run testsets in order; results are index-aligned with the input
	 */
	async runTestsets(testsets: Testset[]): Promise<TestsetResult[]> {
		const startTime = Date.now();
		this.reporter.onStart({ testsetCount: testsets.length, startTime });

		const results: TestsetResult[] = [];
		for (const [index, testset] of testsets.entries()) {
			results.push(await this.runTestset(testset, index));
		}

		this.reporter.onComplete(summarize(results, startTime));
		return results;
	}

	// ========== Internals ==========

	private async runGuarded(testcase: Testcase): Promise<TestcaseResult> {
		try {
			return await this.runTest(testcase);
		} catch (error) {
			const err = toError(error);
			this.reporter.onError(err);
			if (!this.continueOnError) {
				throw err;
			}
			return { name: testcase.name, success: false, diffContent: [], error: err.message };
		}
	}

	/**
	 * Overlay the testcase request on a copy of the inherited defaults, then
	 * resolve placeholders and split out `url` and `method`
	 */
	private buildRequest(testcase: Testcase): DispatchRequest {
		const merged: ValueObject = {
			...cloneValue(this.testsetRequest),
			...cloneValue(testcase.request),
		};

		const resolved = this.context.resolve(merged);
		if (!isValueObject(resolved)) {
			throw new ParamsError("Request must be a mapping");
		}

		const { url, method, ...options } = resolved;
		if (url === undefined || method === undefined) {
			throw new ParamsError("URL or METHOD missed!");
		}
		if (typeof url !== "string" || typeof method !== "string") {
			throw new ParamsError("URL and METHOD must be strings");
		}

		return { url, method, options };
	}
}
