/**
 * Context
 *
 * Variable and function tables for one run. Scopes add to or overwrite
 * entries, nothing is ever removed; a new run starts with a new Context.
 */

import {
	FunctionBindError,
	ImportError,
	VariableBindError,
	toError,
} from "../errors";
import { resolveTemplate } from "../template";
import type { Value } from "../values";
import { isValueObject, toValue } from "../values";
import { BUILTIN_MODULES } from "./builtin-modules";
import type {
	BindingConfig,
	BoundFunction,
	FunctionCallSpec,
	FunctionModule,
	TemplateScope,
	VariableBinds,
	VariableSpec,
} from "./context.types";

/**
 * Context construction options
 */
export interface ContextOptions {
	/** Modules available to `requires`, in addition to the built-in ones */
	modules?: Record<string, FunctionModule>;
	/** Callables bindable by bare name from `function_binds` */
	functions?: Record<string, BoundFunction>;
}

export class Context implements TemplateScope {
	readonly variables = new Map<string, Value>();
	readonly functions = new Map<string, BoundFunction>();
	readonly requires = new Set<string>();

	private modules = new Map<string, FunctionModule>(Object.entries(BUILTIN_MODULES));
	private registered = new Map<string, BoundFunction>();

	constructor(options: ContextOptions = {}) {
		for (const [name, members] of Object.entries(options.modules ?? {})) {
			this.registerModule(name, members);
		}
		for (const [name, fn] of Object.entries(options.functions ?? {})) {
			this.registerFunction(name, fn);
		}
	}

	// ========== Registration ==========

	/**
	 * Make a module available to `requires`
	 */
	registerModule(name: string, members: FunctionModule): this {
		this.modules.set(name, members);
		return this;
	}

	/**
	 * Make a callable available to `function_binds` under a bare name
	 */
	registerFunction(name: string, fn: BoundFunction): this {
		this.registered.set(name, fn);
		return this;
	}

	// ========== Binding ==========

	/**
	 * Apply one scope declaration: requires, then functions, then variables
	 */
	update(config: BindingConfig): void {
		this.importRequires(config.requires ?? []);
		this.bindFunctions(config.function_binds ?? {});
		this.bindVariables(config.variable_binds ?? []);
	}

	/**
	 * Record modules as imported. Already imported names are skipped.
	 */
	importRequires(names: string[]): void {
		for (const name of names) {
			if (this.requires.has(name)) continue;
			if (!this.modules.has(name)) {
				throw new ImportError(name);
			}
			this.requires.add(name);
		}
	}

	/**
	 * Bind `name → expression` entries. An expression is `module.member` of an
	 * imported module, or the name of a registered function.
	 */
	bindFunctions(functionBinds: Record<string, string>): void {
		for (const [name, expression] of Object.entries(functionBinds)) {
			this.functions.set(name, this.lookupFunction(name, expression.trim()));
		}
	}

	/**
	 * Bind variables in order; each bound value is visible to the next spec
	 */
	bindVariables(variableBinds: VariableBinds): void {
		for (const bind of variableBinds) {
			for (const [name, spec] of Object.entries(bind)) {
				this.variables.set(name, this.evaluateSpec(name, spec));
			}
		}
	}

	/**
	 * Overwrite variables in bulk (extracted response values)
	 */
	updateVariables(mapping: Record<string, Value>): void {
		for (const [name, value] of Object.entries(mapping)) {
			this.variables.set(name, value);
		}
	}

	/**
	 * Resolve placeholders in `value` against this context
	 */
	resolve(value: Value, path?: string): Value {
		return resolveTemplate(value, this, path);
	}

	// ========== Internals ==========

	private lookupFunction(name: string, expression: string): BoundFunction {
		const dot = expression.indexOf(".");
		if (dot === -1) {
			const fn = this.registered.get(expression);
			if (!fn) {
				throw new FunctionBindError(name, expression, "no registered function with this name");
			}
			return fn;
		}

		const moduleName = expression.slice(0, dot);
		const member = expression.slice(dot + 1);
		if (!this.requires.has(moduleName)) {
			throw new FunctionBindError(name, expression, `module "${moduleName}" is not imported`);
		}
		const members = this.modules.get(moduleName);
		const fn = members && Object.hasOwn(members, member) ? members[member] : undefined;
		if (typeof fn !== "function") {
			throw new FunctionBindError(name, expression, `"${member}" is not a function of "${moduleName}"`);
		}
		return fn;
	}

	private evaluateSpec(name: string, spec: VariableSpec): Value {
		if (!isFunctionCallSpec(spec)) {
			return this.resolve(spec, name);
		}

		const fn = this.functions.get(spec.func);
		if (!fn) {
			throw new VariableBindError(name, `function "${spec.func}" is not bound`);
		}
		const args = (spec.args ?? []).map((arg, index) => this.resolve(arg, `${name}.args[${index}]`));

		let result: unknown;
		try {
			result = fn(...args);
		} catch (error) {
			throw new VariableBindError(name, `calling "${spec.func}" failed`, toError(error));
		}

		try {
			return toValue(result);
		} catch (error) {
			throw new VariableBindError(name, `"${spec.func}" returned ${toError(error).message}`, toError(error));
		}
	}
}

/**
 * A variable spec object with a string `func` (and optional `args` array)
 * is a call; anything else is a literal.
 */
export function isFunctionCallSpec(spec: VariableSpec): spec is FunctionCallSpec {
	if (!isValueObject(spec) || typeof spec.func !== "string") {
		return false;
	}
	return spec.args === undefined || Array.isArray(spec.args);
}
