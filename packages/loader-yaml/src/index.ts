/**
 * @reqflow/loader-yaml
 *
 * Loads reqflow suites from YAML or JSON files.
 *
 * @example
 * ```typescript
 * import { TestRunner } from "reqflow";
 * import { loadSuiteFile } from "@reqflow/loader-yaml";
 *
 * const testsets = await loadSuiteFile("suites/users.yml");
 * const results = await new TestRunner().runTestsets(testsets);
 * ```
 */

export { loadSuiteFile, loadSuiteFiles, parseSuite } from "./suite-loader";
