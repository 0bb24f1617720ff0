/**
 * Template Resolver Tests
 */

import type { BoundFunction, TemplateScope, Value } from "reqflow";
import {
	FunctionCallError,
	FunctionNotFoundError,
	VariableNotFoundError,
	hasPlaceholder,
	resolveTemplate,
} from "reqflow";
import { describe, expect, it } from "vitest";

function scope(
	variables: Record<string, Value>,
	functions: Record<string, BoundFunction> = {},
): TemplateScope {
	return {
		variables: new Map(Object.entries(variables)),
		functions: new Map(Object.entries(functions)),
	};
}

describe("resolveTemplate", () => {
	describe("exact placeholders", () => {
		it("should keep the native type of the variable", () => {
			const s = scope({ count: 5, flag: true, nothing: null, user: { id: 1, tags: ["a"] } });

			expect(resolveTemplate("${count}", s)).toBe(5);
			expect(resolveTemplate("${flag}", s)).toBe(true);
			expect(resolveTemplate("${nothing}", s)).toBeNull();
			expect(resolveTemplate("${user}", s)).toEqual({ id: 1, tags: ["a"] });
		});

		it("should tolerate whitespace inside the braces", () => {
			expect(resolveTemplate("${ count }", scope({ count: 5 }))).toBe(5);
		});
	});

	describe("inline placeholders", () => {
		it("should substitute string fragments", () => {
			const s = scope({ host: "api.test", id: 42 });

			expect(resolveTemplate("http://${host}/users/${id}", s)).toBe("http://api.test/users/42");
		});

		it("should JSON-encode structured values inside text", () => {
			const s = scope({ ids: [1, 2] });

			expect(resolveTemplate("ids=${ids}", s)).toBe("ids=[1,2]");
		});

		it("should leave strings without placeholders untouched", () => {
			expect(resolveTemplate("plain $text {x}", scope({}))).toBe("plain $text {x}");
		});
	});

	describe("nested structures", () => {
		it("should resolve mappings and sequences depth-first", () => {
			const s = scope({ token: "abc", n: 3 });
			const input: Value = {
				headers: { Authorization: "Bearer ${token}" },
				items: ["${n}", { deep: ["${token}"] }],
				keep: 1.5,
				off: false,
			};

			expect(resolveTemplate(input, s)).toEqual({
				headers: { Authorization: "Bearer abc" },
				items: [3, { deep: ["abc"] }],
				keep: 1.5,
				off: false,
			});
		});

		it("should not mutate the input", () => {
			const input: Value = { headers: { A: "${a}" }, list: ["${a}"] };
			const snapshot = structuredClone(input);

			resolveTemplate(input, scope({ a: "x" }));

			expect(input).toEqual(snapshot);
		});

		it("should keep a __proto__ key as an own property", () => {
			const input: Value = JSON.parse('{"json":{"__proto__":{"x":"${v}"},"y":1}}');

			const result = resolveTemplate(input, scope({ v: "abc" }));

			expect(JSON.stringify(result)).toBe('{"json":{"__proto__":{"x":"abc"},"y":1}}');
			expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
		});

		it("should be idempotent on resolved output", () => {
			const s = scope({ a: "x", b: 2 });
			const once = resolveTemplate({ v: "${a}-${b}", w: "${b}" }, s);

			expect(resolveTemplate(once, s)).toEqual(once);
		});
	});

	describe("function placeholders", () => {
		const functions: Record<string, BoundFunction> = {
			join: (...parts) => parts.join("|"),
			add: (a, b) => Number(a) + Number(b),
		};

		it("should call the function with literal and variable arguments", () => {
			const s = scope({ name: "bob" }, functions);

			expect(resolveTemplate("${join('a, b', name, $name, 3)}", s)).toBe("a, b|bob|bob|3");
			expect(resolveTemplate("${add(2, 3)}", s)).toBe(5);
			expect(resolveTemplate("sum=${add(1, 1)}", s)).toBe("sum=2");
		});

		it("should keep parentheses inside quoted arguments", () => {
			const s = scope({}, functions);

			expect(resolveTemplate("${join('a)b', \"(c)\")}", s)).toBe("a)b|(c)");
			expect(resolveTemplate("x-${join('1)', 2)}-y", s)).toBe("x-1)|2-y");
		});

		it("should wrap errors raised by the function with the path", () => {
			const s = scope(
				{},
				{
					boom: () => {
						throw new Error("kaboom");
					},
					now: () => new Date(0),
				},
			);

			expect(() => resolveTemplate({ a: { b: "${boom()}" } }, s)).toThrow(
				'Calling function "boom" at "a.b" failed: kaboom',
			);
			expect(() => resolveTemplate({ when: "${now()}" }, s)).toThrow(FunctionCallError);
			expect(() => resolveTemplate({ when: "${now()}" }, s)).toThrow(
				'Calling function "now" at "when" failed: unsupported value [object Date]',
			);
		});

		it("should accept an empty argument list", () => {
			const s = scope({}, { now: () => 1700000000 });

			expect(resolveTemplate("${now()}", s)).toBe(1700000000);
		});

		it("should fail for an unknown function", () => {
			expect(() => resolveTemplate({ a: "${missing()}" }, scope({}))).toThrow(FunctionNotFoundError);
		});
	});

	describe("missing variables", () => {
		it("should report the variable name and its path", () => {
			const input: Value = { headers: { Authorization: "Bearer ${token}" } };

			let caught: VariableNotFoundError | undefined;
			try {
				resolveTemplate(input, scope({}));
			} catch (error) {
				if (error instanceof VariableNotFoundError) caught = error;
			}

			expect(caught?.variableName).toBe("token");
			expect(caught?.path).toBe("headers.Authorization");
			expect(caught?.message).toBe('Variable "token" not found at "headers.Authorization"');
		});

		it("should include array indexes in the path", () => {
			expect(() => resolveTemplate({ list: ["ok", "${gone}"] }, scope({}))).toThrow(
				'Variable "gone" not found at "list[1]"',
			);
		});
	});
});

describe("hasPlaceholder", () => {
	it("should detect placeholders", () => {
		expect(hasPlaceholder("${a}")).toBe(true);
		expect(hasPlaceholder("x ${fn(1)} y")).toBe(true);
		expect(hasPlaceholder("body.token")).toBe(false);
		expect(hasPlaceholder("${1abc}")).toBe(false);
	});
});
