/**
 * Template Resolver
 *
 * Produces a resolved deep copy of a value, replacing `${name}` and
 * `${fn(arg, ...)}` placeholders found in string variants.
 *
 * - A string that is exactly one placeholder resolves to the native value
 *   (number, boolean, object...).
 * - A placeholder surrounded by other text is substituted as a string fragment.
 * - Call arguments may be quoted; quoted arguments can hold `,` and `)`.
 * - The input is never mutated.
 */

import type { TemplateScope } from "../context/context.types";
import { FunctionCallError, FunctionNotFoundError, VariableNotFoundError, toError } from "../errors";
import type { Value } from "../values";
import { fromEntries, stringifyValue, tagValue, toValue } from "../values";

const PLACEHOLDER_BODY = String.raw`\$\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*(?:\(((?:[^)'"]|'[^']*'|"[^"]*")*)\))?\s*\}`;
const PLACEHOLDER = new RegExp(PLACEHOLDER_BODY, "g");
const EXACT_PLACEHOLDER = new RegExp(`^${PLACEHOLDER_BODY}$`);
const IDENTIFIER = /^\$?([A-Za-z_][A-Za-z0-9_]*)$/;

// =============================================================================
// Public API
// =============================================================================

/**
 * Resolve every placeholder in `value` against the scope
 *
 * @param path - location of `value` inside its root, used in error messages
 */
export function resolveTemplate(value: Value, scope: TemplateScope, path = ""): Value {
	const tagged = tagValue(value);
	switch (tagged.kind) {
		case "null":
		case "boolean":
		case "number":
			return tagged.value;
		case "string":
			return resolveString(tagged.value, scope, path);
		case "array":
			return tagged.value.map((item, index) => resolveTemplate(item, scope, `${path}[${index}]`));
		case "object":
			return fromEntries(
				Object.entries(tagged.value).map(([key, item]): [string, Value] => [
					key,
					resolveTemplate(item, scope, path ? `${path}.${key}` : key),
				]),
			);
		default: {
			const unreachable: never = tagged;
			return unreachable;
		}
	}
}

/**
 * Check whether a string contains at least one placeholder
 */
export function hasPlaceholder(text: string): boolean {
	return new RegExp(PLACEHOLDER.source).test(text);
}

// =============================================================================
// Internals
// =============================================================================

function resolveString(text: string, scope: TemplateScope, path: string): Value {
	const exact = EXACT_PLACEHOLDER.exec(text);
	if (exact) {
		return evaluate(exact[1], exact[2], scope, path);
	}

	return text.replace(PLACEHOLDER, (_match, name: string, args: string | undefined) =>
		stringifyValue(evaluate(name, args, scope, path)),
	);
}

function evaluate(name: string, rawArgs: string | undefined, scope: TemplateScope, path: string): Value {
	if (rawArgs === undefined) {
		const value = scope.variables.get(name);
		if (value === undefined) {
			throw new VariableNotFoundError(name, path);
		}
		return value;
	}

	const fn = scope.functions.get(name);
	if (!fn) {
		throw new FunctionNotFoundError(name, path);
	}
	const args = splitArgs(rawArgs).map((arg) => parseArg(arg, scope, path));
	try {
		return toValue(fn(...args));
	} catch (error) {
		throw new FunctionCallError(name, path, toError(error));
	}
}

/**
 * Split a call argument list on top-level commas, keeping quoted commas
 */
function splitArgs(raw: string): string[] {
	const args: string[] = [];
	let current = "";
	let quote: string | null = null;

	for (const char of raw) {
		if (quote) {
			current += char;
			if (char === quote) quote = null;
		} else if (char === '"' || char === "'") {
			quote = char;
			current += char;
		} else if (char === ",") {
			args.push(current.trim());
			current = "";
		} else {
			current += char;
		}
	}

	if (current.trim() || args.length) {
		args.push(current.trim());
	}
	return args;
}

function parseArg(arg: string, scope: TemplateScope, path: string): Value {
	if (arg.length >= 2 && arg.startsWith("'") && arg.endsWith("'")) {
		return arg.slice(1, -1);
	}

	const ref = IDENTIFIER.exec(arg);
	if (ref && !["true", "false", "null"].includes(arg)) {
		return evaluate(ref[1], undefined, scope, path);
	}

	try {
		return toValue(JSON.parse(arg));
	} catch {
		return arg;
	}
}
