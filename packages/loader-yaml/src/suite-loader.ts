/**
 * Suite Loader
 *
 * Reads YAML (or JSON, a YAML subset) suite documents into validated
 * testsets. A document holds one testset or a list of testsets.
 */

import { readFile } from "node:fs/promises";
import { ConfigError, parseTestsets, toError } from "reqflow";
import type { Testset } from "reqflow";
import { parse as parseYaml } from "yaml";

/**
 * Parse suite text into testsets
 *
 * @param source - file name or label used in error messages
 * @throws ConfigError on YAML syntax errors or invalid structure
 */
export function parseSuite(text: string, source = "<inline>"): Testset[] {
	let data: unknown;
	try {
		data = parseYaml(text);
	} catch (error) {
		throw new ConfigError(`Cannot parse suite "${source}": ${toError(error).message}`);
	}

	try {
		return parseTestsets(data);
	} catch (error) {
		if (error instanceof ConfigError) {
			throw new ConfigError(`Invalid suite "${source}"`, error.issues);
		}
		throw error;
	}
}

/**
 * Read and parse a suite file
 */
export async function loadSuiteFile(path: string): Promise<Testset[]> {
	const text = await readFile(path, "utf-8");
	return parseSuite(text, path);
}

/**
 * Read several suite files, concatenating their testsets in order
 */
export async function loadSuiteFiles(paths: string[]): Promise<Testset[]> {
	const testsets: Testset[] = [];
	for (const path of paths) {
		testsets.push(...(await loadSuiteFile(path)));
	}
	return testsets;
}
