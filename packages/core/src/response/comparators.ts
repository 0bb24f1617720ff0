/**
 * Comparators
 *
 * Named comparisons used by validators. A comparator returns whether
 * `actual` satisfies `expected` and throws ValidatorError for operands it
 * cannot compare.
 */

import { isDeepStrictEqual } from "node:util";
import { ValidatorError, toError } from "../errors";
import type { Value } from "../values";
import { isValueObject, kindOf, stringifyValue } from "../values";

export type Comparator = (actual: Value, expected: Value) => boolean;

function ordered(name: string, test: (order: number) => boolean): Comparator {
	return (actual, expected) => {
		if (typeof actual === "number" && typeof expected === "number") {
			return test(actual - expected);
		}
		if (typeof actual === "string" && typeof expected === "string") {
			return test(actual < expected ? -1 : actual > expected ? 1 : 0);
		}
		throw new ValidatorError(name, `cannot order ${kindOf(actual)} against ${kindOf(expected)}`);
	};
}

function contains(container: Value, item: Value, name: string): boolean {
	if (typeof container === "string") {
		return container.includes(stringifyValue(item));
	}
	if (Array.isArray(container)) {
		return container.some((element) => isDeepStrictEqual(element, item));
	}
	if (isValueObject(container) && typeof item === "string") {
		return Object.hasOwn(container, item);
	}
	throw new ValidatorError(name, `${kindOf(container)} cannot contain ${kindOf(item)}`);
}

function lengthOf(value: Value): number {
	if (typeof value === "string" || Array.isArray(value)) {
		return value.length;
	}
	if (isValueObject(value)) {
		return Object.keys(value).length;
	}
	throw new ValidatorError("len_eq", `${kindOf(value)} has no length`);
}

const equals: Comparator = (actual, expected) => isDeepStrictEqual(actual, expected);
const notEquals: Comparator = (actual, expected) => !isDeepStrictEqual(actual, expected);
const greaterThan = ordered("gt", (order) => order > 0);
const greaterOrEqual = ordered("ge", (order) => order >= 0);
const lessThan = ordered("lt", (order) => order < 0);
const lessOrEqual = ordered("le", (order) => order <= 0);

export const COMPARATORS: Readonly<Record<string, Comparator>> = {
	eq: equals,
	"==": equals,
	ne: notEquals,
	"!=": notEquals,
	gt: greaterThan,
	">": greaterThan,
	ge: greaterOrEqual,
	">=": greaterOrEqual,
	lt: lessThan,
	"<": lessThan,
	le: lessOrEqual,
	"<=": lessOrEqual,
	contains: (actual, expected) => contains(actual, expected, "contains"),
	contained_by: (actual, expected) => contains(expected, actual, "contained_by"),
	regex: (actual, expected) => {
		if (typeof actual !== "string" || typeof expected !== "string") {
			throw new ValidatorError("regex", "regex needs a string value and a string pattern");
		}
		let pattern: RegExp;
		try {
			pattern = new RegExp(expected);
		} catch (error) {
			throw new ValidatorError("regex", toError(error).message);
		}
		return pattern.test(actual);
	},
	str_eq: (actual, expected) => stringifyValue(actual) === stringifyValue(expected),
	len_eq: (actual, expected) => lengthOf(actual) === expected,
	type: (actual, expected) => kindOf(actual) === expected,
};

/**
 * Look up a comparator by name or alias
 */
export function getComparator(name: string): Comparator {
	const comparator = Object.hasOwn(COMPARATORS, name) ? COMPARATORS[name] : undefined;
	if (!comparator) {
		throw new ValidatorError(name, "unknown comparator");
	}
	return comparator;
}
