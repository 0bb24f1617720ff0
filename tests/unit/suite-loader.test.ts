/**
 * Suite Loader Tests
 */

import { createHash } from "node:crypto";
import { fileURLToPath } from "node:url";
import { loadSuiteFile, loadSuiteFiles, parseSuite } from "@reqflow/loader-yaml";
import { ConfigError, TestRunner } from "reqflow";
import { describe, expect, it } from "vitest";
import { FakeTransport } from "../mocks/fakeTransport";

const USERS_SUITE = fileURLToPath(new URL("../fixtures/users.yml", import.meta.url));

describe("parseSuite", () => {
	it("should parse a single YAML testset", () => {
		const testsets = parseSuite(`
name: ping
testcases:
  - request:
      url: http://x/ping
      method: GET
`);

		expect(testsets).toEqual([{ name: "ping", testcases: [{ request: { url: "http://x/ping", method: "GET" } }] }]);
	});

	it("should parse JSON documents", () => {
		const testsets = parseSuite('[{"testcases": [{"request": {"url": "http://x", "method": "GET"}}]}]');

		expect(testsets).toEqual([{ testcases: [{ request: { url: "http://x", method: "GET" } }] }]);
	});

	it("should report YAML syntax errors with the source", () => {
		expect(() => parseSuite("testcases: [", "broken.yml")).toThrow(ConfigError);
		expect(() => parseSuite("testcases: [", "broken.yml")).toThrow('Cannot parse suite "broken.yml"');
	});

	it("should report structural issues with the source", () => {
		let caught: ConfigError | undefined;
		try {
			parseSuite("name: nothing", "empty.yml");
		} catch (error) {
			if (error instanceof ConfigError) caught = error;
		}

		expect(caught?.message).toBe('Invalid suite "empty.yml"\n  - 0.testcases: Required');
	});
});

describe("loadSuiteFile", () => {
	it("should load testsets from a file", async () => {
		const testsets = await loadSuiteFile(USERS_SUITE);

		expect(testsets.map((testset) => testset.name)).toEqual(["auth", "profile"]);
		expect(testsets[0].config?.variable_binds).toEqual([
			{ user: "alice" },
			{ sign: { func: "gen_md5", args: ["${user}", "test-secret"] } },
		]);
	});

	it("should concatenate several files in order", async () => {
		const testsets = await loadSuiteFiles([USERS_SUITE, USERS_SUITE]);

		expect(testsets.map((testset) => testset.name)).toEqual(["auth", "profile", "auth", "profile"]);
	});

	it("should run a loaded suite end to end", async () => {
		const transport = new FakeTransport()
			.on("POST http://api.test/login", { status: 200, body: { token: "test-token" } })
			.on("GET http://api.test/me", { status: 200, body: { name: "alice" } });
		const runner = new TestRunner({ transport });

		const results = await runner.runTestsets(await loadSuiteFile(USERS_SUITE));

		const sign = createHash("md5").update("alicetest-secret").digest("hex");
		expect(transport.requests).toEqual([
			{
				url: "http://api.test/login",
				method: "POST",
				options: { headers: { "Content-Type": "application/json" }, json: { user: "alice", sign } },
			},
			{
				url: "http://api.test/me",
				method: "GET",
				options: { headers: { Authorization: "Bearer test-token" } },
			},
		]);
		expect(results.map((testset) => testset.map((result) => result.success))).toEqual([[true], [true]]);
	});
});
