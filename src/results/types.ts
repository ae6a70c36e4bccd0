/**
 * Test result type definitions
 */

/**
 * Outcome of a single test method
 */
export enum ResultStatus {
    Pass = 'pass',
    Fail = 'fail',
    Skip = 'skip',
}

/**
 * Per-file line coverage. Each string holds one character per source line:
 * `C` covered, `U` not covered, `N` not executable.
 */
export type CoverageMap = Readonly<Record<string, string>>;

/**
 * Result of one test method. Created once by the runner, never mutated.
 */
export interface UnitTestResult {
    /** Class name of the test case */
    readonly namespace:  string
    /** Test method name */
    readonly name:       string
    readonly status:     ResultStatus
    /** Wall-clock duration in milliseconds */
    readonly durationMs: number
    /** Human-readable explanation of the outcome */
    readonly message:    string
    /** Line coverage captured while the method ran; empty when disabled */
    readonly coverage:   CoverageMap
    /** Navigable link to the test method's source, when configured */
    readonly link?:      string
}

/**
 * Build a frozen result record
 */
export function createResult(fields: UnitTestResult): UnitTestResult {
    return Object.freeze({
        ...fields,
        coverage: Object.freeze({ ...fields.coverage }),
    });
}
