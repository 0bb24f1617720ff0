/**
 * Values
 *
 * The JSON-like variant carried through configs, contexts and requests.
 */

// =============================================================================
// Value Types
// =============================================================================

export type Primitive = null | boolean | number | string;

export type Value = Primitive | Value[] | ValueObject;

export interface ValueObject {
	[key: string]: Value;
}

/**
 * Tag for each value variant
 */
export type ValueKind = "null" | "boolean" | "number" | "string" | "array" | "object";

// =============================================================================
// Helpers
// =============================================================================

/**
 * A value paired with its variant tag, for exhaustive switches
 */
export type TaggedValue =
	| { kind: "null"; value: null }
	| { kind: "boolean"; value: boolean }
	| { kind: "number"; value: number }
	| { kind: "string"; value: string }
	| { kind: "array"; value: Value[] }
	| { kind: "object"; value: ValueObject };

export function tagValue(value: Value): TaggedValue {
	if (value === null) return { kind: "null", value };
	if (Array.isArray(value)) return { kind: "array", value };
	switch (typeof value) {
		case "boolean":
			return { kind: "boolean", value };
		case "number":
			return { kind: "number", value };
		case "string":
			return { kind: "string", value };
		default:
			return { kind: "object", value };
	}
}

export function kindOf(value: Value): ValueKind {
	return tagValue(value).kind;
}

export function isValueObject(value: unknown): value is ValueObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Object literal or null-prototype object (not a Date, Map, Promise...)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Build an object from entries as own properties; `__proto__` stays a key
 */
export function fromEntries(entries: Iterable<readonly [string, Value]>): ValueObject {
	return Object.fromEntries(entries);
}

/**
 * Narrow an unknown value (e.g. a parsed response body or a function result)
 * to a Value. `undefined` maps to null; other non-JSON values are rejected.
 */
export function toValue(input: unknown): Value {
	if (input === null || input === undefined) return null;
	if (typeof input === "boolean" || typeof input === "number" || typeof input === "string") {
		return input;
	}
	if (Array.isArray(input)) {
		return input.map(toValue);
	}
	if (isPlainObject(input)) {
		return fromEntries(Object.entries(input).map(([key, item]): [string, Value] => [key, toValue(item)]));
	}
	if (typeof input === "object") {
		throw new TypeError(`unsupported value ${Object.prototype.toString.call(input)}`);
	}
	throw new TypeError(`unsupported value of type ${typeof input}`);
}

/**
 * Structural deep copy
 */
export function cloneValue<T extends Value>(value: T): T {
	return structuredClone(value);
}

/**
 * Render a value as an inline string fragment
 */
export function stringifyValue(value: Value): string {
	const tagged = tagValue(value);
	switch (tagged.kind) {
		case "string":
			return tagged.value;
		case "null":
		case "boolean":
		case "number":
			return String(tagged.value);
		case "array":
		case "object":
			return JSON.stringify(tagged.value);
		default: {
			const unreachable: never = tagged;
			return unreachable;
		}
	}
}
