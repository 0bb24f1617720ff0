/**
 * Built-in Function Modules
 *
 * Modules available to `requires`. Function binds reference their members
 * as `module.member`, e.g. `"random.gen_random_string"`.
 */

import { createHash, randomInt, randomUUID } from "node:crypto";
import type { Value } from "../values";
import type { FunctionModule } from "./context.types";

const ASCII_LETTERS_AND_DIGITS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

function toInteger(value: Value, name: string): number {
	const num = typeof value === "string" ? Number(value) : value;
	if (typeof num !== "number" || !Number.isInteger(num)) {
		throw new TypeError(`${name} must be an integer, got ${JSON.stringify(value)}`);
	}
	return num;
}

function digest(algorithm: string, parts: Value[]): string {
	const text = parts.map((part) => (typeof part === "string" ? part : JSON.stringify(part))).join("");
	return createHash(algorithm).update(text, "utf-8").digest("hex");
}

export const randomModule: FunctionModule = {
	gen_random_string: (length = 8) => {
		const size = toInteger(length, "length");
		let result = "";
		for (let i = 0; i < size; i++) {
			result += ASCII_LETTERS_AND_DIGITS[randomInt(ASCII_LETTERS_AND_DIGITS.length)];
		}
		return result;
	},
	random_int: (min = 0, max = 100) => randomInt(toInteger(min, "min"), toInteger(max, "max") + 1),
};

export const hashlibModule: FunctionModule = {
	gen_md5: (...parts) => digest("md5", parts),
	gen_sha1: (...parts) => digest("sha1", parts),
	gen_sha256: (...parts) => digest("sha256", parts),
};

export const timeModule: FunctionModule = {
	timestamp: () => Math.floor(Date.now() / 1000),
	timestamp_ms: () => Date.now(),
};

export const uuidModule: FunctionModule = {
	uuid4: () => randomUUID(),
};

export const BUILTIN_MODULES: Readonly<Record<string, FunctionModule>> = {
	random: randomModule,
	hashlib: hashlibModule,
	time: timeModule,
	uuid: uuidModule,
};
