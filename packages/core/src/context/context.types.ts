/**
 * Context Types
 */

import type { Value, ValueObject } from "../values";

/**
 * Callable stored in the context function table
 */
export type BoundFunction = (...args: Value[]) => unknown;

/**
 * Named group of functions that a config can pull in through `requires`
 */
export type FunctionModule = Readonly<Record<string, BoundFunction>>;

/**
 * Variable spec that binds the result of a function call
 */
export interface FunctionCallSpec {
	func: string;
	args?: Value[];
}

/**
 * Right-hand side of a variable bind: a literal (possibly templated) or a call
 */
export type VariableSpec = Value | FunctionCallSpec;

/**
 * Ordered single-key mappings, e.g. `[{ TOKEN: "abc" }, { sign: { func: "gen_md5", args: ["${TOKEN}"] } }]`
 */
export type VariableBinds = Array<Record<string, VariableSpec>>;

/**
 * Scope declaration shared by testset config and testcase
 */
export interface BindingConfig {
	name?: string;
	requires?: string[];
	function_binds?: Record<string, string>;
	variable_binds?: VariableBinds;
	request?: ValueObject;
}

/**
 * Read-only view of the tables a template is resolved against
 */
export interface TemplateScope {
	readonly variables: ReadonlyMap<string, Value>;
	readonly functions: ReadonlyMap<string, BoundFunction>;
}
