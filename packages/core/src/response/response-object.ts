/**
 * Response Object
 *
 * Wraps a transport response and reads values from it by path:
 *
 * - `status_code` (alias `status`)
 * - `headers.<name>` (case-insensitive)
 * - `body.<key>.<index>...` (alias `content`)
 * - `elapsed`
 */

import type { TemplateScope } from "../context/context.types";
import { ExtractionError, ValidatorError } from "../errors";
import { hasPlaceholder, resolveTemplate } from "../template";
import type { TransportResponse } from "../transport";
import type { Value } from "../values";
import { isValueObject } from "../values";
import { getComparator } from "./comparators";
import type { DiffRecord, ExtractBinds, ValidationResult, ValidatorSpec } from "./response.types";

export class ResponseObject {
	private lastResult?: ValidationResult;

	constructor(readonly response: TransportResponse) {}

	/**
	 * Whether the last `validate` call passed; true before any validation
	 */
	get success(): boolean {
		return this.lastResult?.success ?? true;
	}

	/**
	 * Read a value by path
	 *
	 * @throws ExtractionError when the path does not exist
	 */
	get(path: string, variableName = path): Value {
		const [field = "", ...rest] = path.split(".");

		switch (field) {
			case "status_code":
			case "status":
				return this.leaf(this.response.status, rest, variableName, path);
			case "elapsed":
				return this.leaf(this.response.elapsed, rest, variableName, path);
			case "headers": {
				if (!rest.length) {
					return { ...this.response.headers };
				}
				const header = this.response.headers[rest.join(".").toLowerCase()];
				if (header === undefined) {
					throw new ExtractionError(variableName, path, `header "${rest.join(".")}" not present`);
				}
				return header;
			}
			case "body":
			case "content":
				return walk(this.response.body, rest, variableName, path);
			default:
				throw new ExtractionError(variableName, path, `unknown response field "${field}"`);
		}
	}

	/**
	 * Extract named values from the response
	 */
	extract(extractBinds: ExtractBinds): Record<string, Value> {
		const extracted: Record<string, Value> = {};
		for (const [name, path] of Object.entries(extractBinds)) {
			extracted[name] = this.get(path, name);
		}
		return extracted;
	}

	/**
	 * Run validators in order, producing one diff record each
	 */
	validate(validators: ValidatorSpec[], scope: TemplateScope): ValidationResult {
		const diffContent = validators.map((validator, index) => this.check(validator, index, scope));
		this.lastResult = {
			success: diffContent.every((record) => record.passed),
			diffContent,
		};
		return this.lastResult;
	}

	// ========== Internals ==========

	private check(validator: ValidatorSpec, index: number, scope: TemplateScope): DiffRecord {
		const expected = resolveTemplate(validator.expect, scope, `validators[${index}].expect`);

		let actual: Value = null;
		try {
			actual = hasPlaceholder(validator.check)
				? resolveTemplate(validator.check, scope, `validators[${index}].check`)
				: this.get(validator.check);
			const comparator = getComparator(validator.comparator ?? "eq");
			return { validator, expected, actual, passed: comparator(actual, expected) };
		} catch (error) {
			if (error instanceof ExtractionError || error instanceof ValidatorError) {
				return { validator, expected, actual, passed: false, error: error.message };
			}
			throw error;
		}
	}

	private leaf(value: Value, rest: string[], variableName: string, path: string): Value {
		if (rest.length) {
			throw new ExtractionError(variableName, path, "scalar field has no children");
		}
		return value;
	}
}

function walk(value: Value, keys: string[], variableName: string, path: string): Value {
	let current = value;
	for (const key of keys) {
		if (Array.isArray(current)) {
			const index = Number(key);
			if (!Number.isInteger(index) || index < 0 || index >= current.length) {
				throw new ExtractionError(variableName, path, `index "${key}" out of range`);
			}
			current = current[index];
		} else if (isValueObject(current) && Object.hasOwn(current, key)) {
			current = current[key];
		} else {
			throw new ExtractionError(variableName, path, `key "${key}" not found`);
		}
	}
	return current;
}
