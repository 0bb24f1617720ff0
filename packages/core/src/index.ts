/**
 * Reqflow Core
 *
 * A declarative HTTP test engine. Suites are plain data: testsets holding
 * testcases, each with variable bindings, a templated request, extraction
 * paths and validators.
 *
 * Core package includes the fetch transport only.
 *
 * For file loading, install:
 * - @reqflow/loader-yaml - YAML/JSON suite files
 *
 * @example
 * ```typescript
 * import { TestRunner, ConsoleReporter } from 'reqflow';
 *
 * const runner = new TestRunner({ reporters: [new ConsoleReporter()] });
 *
 * const results = await runner.runTestsets([
 *   {
 *     name: 'Users API',
 *     config: {
 *       requires: ['random'],
 *       function_binds: { gen_random_string: 'random.gen_random_string' },
 *       variable_binds: [{ TOKEN: 'test-token' }, { user: { func: 'gen_random_string', args: [5] } }],
 *       request: { headers: { authorization: '${TOKEN}' } },
 *     },
 *     testcases: [
 *       {
 *         name: 'create user',
 *         request: { url: 'http://localhost:3000/users/${user}', method: 'POST', json: { name: '${user}' } },
 *         extract_binds: { id: 'body.id' },
 *         validators: [{ check: 'status_code', comparator: 'eq', expect: 201 }],
 *       },
 *     ],
 *   },
 * ]);
 * ```
 */

// Config schemas (parseTestsets, testsetSchema, ...)
export * from "./config";
// Context (Context, built-in modules, binding types)
export * from "./context";
// Errors
export * from "./errors";
// Recording (TestReporter, ConsoleReporter, JsonReporter, ...)
export * from "./recording";
// Response (ResponseObject, comparators, validator types)
export * from "./response";
// Runner (TestRunner, Testset, Testcase, results)
export * from "./runner";
// Template resolution
export * from "./template";
// Transport (HttpTransport, FetchTransport)
export * from "./transport";
// Values
export * from "./values";
