/**
 * Suite Schemas
 *
 * Validation of already-parsed suite data (from JSON, YAML or code) into
 * typed testsets.
 */

import { z } from "zod";
import type { BindingConfig, FunctionCallSpec, VariableSpec } from "../context";
import { ConfigError } from "../errors";
import type { ValidatorSpec } from "../response";
import type { Testcase, Testset } from "../runner/runner.types";
import type { Value, ValueObject } from "../values";

export const valueSchema: z.ZodType<Value> = z.lazy(() =>
	z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(valueSchema), z.record(valueSchema)]),
);

const valueObjectSchema: z.ZodType<ValueObject> = z.record(valueSchema);

const functionCallSchema: z.ZodType<FunctionCallSpec> = z.object({
	func: z.string(),
	args: z.array(valueSchema).optional(),
});

const variableSpecSchema: z.ZodType<VariableSpec> = z.union([functionCallSchema, valueSchema]);

const bindingFields = {
	name: z.string().optional(),
	requires: z.array(z.string()).optional(),
	function_binds: z.record(z.string()).optional(),
	variable_binds: z.array(z.record(variableSpecSchema)).optional(),
};

export const bindingConfigSchema: z.ZodType<BindingConfig> = z.object({
	...bindingFields,
	request: valueObjectSchema.optional(),
});

export const validatorSchema: z.ZodType<ValidatorSpec> = z.object({
	check: z.string(),
	comparator: z.string().optional(),
	expect: valueSchema,
});

export const testcaseSchema: z.ZodType<Testcase> = z.object({
	...bindingFields,
	request: valueObjectSchema,
	extract_binds: z.record(z.string()).optional(),
	validators: z.array(validatorSchema).optional(),
});

export const testsetSchema: z.ZodType<Testset> = z.object({
	name: z.string().optional(),
	config: bindingConfigSchema.optional(),
	testcases: z.array(testcaseSchema),
});

/**
 * Validate one testset or an array of testsets
 *
 * @throws ConfigError listing every issue with its path
 */
export function parseTestsets(data: unknown): Testset[] {
	const result = testsetSchema.array().safeParse(Array.isArray(data) ? data : [data]);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
		throw new ConfigError("Invalid testset configuration", issues);
	}
	return result.data;
}
