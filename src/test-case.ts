/**
 * Base class for test cases
 *
 * Subclasses declare test methods (any method whose name starts with `test`),
 * make assertions through the protected `assert*` primitives and may override
 * the setup and teardown hooks. Running is the job of {@link TestCaseDriver}.
 */

import { isDeepStrictEqual } from 'node:util';
import { AssertionTracker } from './assertions/assertion-tracker.js';
import { currentCallerLocation } from './assertions/caller-location.js';
import { equalityFailure, expectedValueFailure, failureType } from './assertions/failure-messages.js';
import { TestDeclarationError, isControlSignal } from './execution/signals.js';
import type { UnitTestResult } from './results/types.js';

/**
 * Name accepted for an explicitly registered test method
 */
export type TestMethodName = `test${string}`;

/**
 * Any class whose instances can be caught by the exception helpers
 */
export type ErrorClass = abstract new (...args: never[]) => Error;

export abstract class TestCase {
    /** @internal */
    public readonly assertionTracker = new AssertionTracker();

    private readonly registeredTests = new Map<string, () => unknown>();
    private results: readonly UnitTestResult[] = [];

    /* -(  Assertions  )----------------------------------------------------- */

    /**
     * Assert that a value is strictly `true`
     *
     * @param actual - The value produced by the code under test
     * @param message - What the value represents, and what a discrepancy means
     */
    protected assertTrue(actual: unknown, message?: string): void {
        if(actual === true) {
            this.assertionTracker.pass();
            return;
        }

        this.assertionTracker.fail(expectedValueFailure('true', actual, currentCallerLocation(), message));
    }

    /**
     * Assert that a value is strictly `false`
     */
    protected assertFalse(actual: unknown, message?: string): void {
        if(actual === false) {
            this.assertionTracker.pass();
            return;
        }

        this.assertionTracker.fail(expectedValueFailure('false', actual, currentCallerLocation(), message));
    }

    /**
     * Assert that two values are equal, strictly.
     *
     * Uses deep strict equality: types must match (`1` and `'1'` differ),
     * arrays and plain objects are compared by content, `NaN` equals `NaN`
     * and `0` equals `-0`.
     *
     * @param expected - The value reasoned out for the scenario
     * @param actual - The value produced by the code under test
     * @param message - What the values represent, and what a discrepancy means
     */
    protected assertEqual(expected: unknown, actual: unknown, message?: string): void {
        if(expected === actual || isDeepStrictEqual(expected, actual)) {
            this.assertionTracker.pass();
            return;
        }

        this.assertionTracker.fail(equalityFailure(expected, actual, currentCallerLocation(), message));
    }

    /**
     * Fail the test unconditionally
     */
    protected assertFailure(message: string): never {
        return this.assertionTracker.fail(message);
    }

    /**
     * End the test, marking it as skipped
     */
    protected assertSkipped(message: string): never {
        return this.assertionTracker.skip(message);
    }

    /* -(  Exception helpers  )---------------------------------------------- */

    /**
     * Assert that `callable` throws an instance of `errorClass`
     */
    protected assertException(errorClass: ErrorClass, callable: () => void): void {
        this.tryTestCases({ assertException: undefined }, [false], () => callable(), errorClass);
    }

    /**
     * Run `callable` once per labelled input and check whether it throws.
     *
     * `expectations[i]` is `true` when the i-th input should be accepted and
     * `false` when it should throw an instance of `errorClass`. Errors of any
     * other class propagate and fail the test.
     *
     * @example
     * ```typescript
     * this.tryTestCases(
     *   { 'apple is a fruit': new Apple(), 'rock is not a fruit': new Rock() },
     *   [true, false],
     *   (input) => assertFruit(input),
     *   NotAFruitError
     * );
     * ```
     *
     * @throws {TestDeclarationError} when inputs and expectations differ in length
     */
    protected tryTestCases<TInput>(
        inputs: Readonly<Record<string, TInput>>,
        expectations: readonly boolean[],
        callable: (input: TInput) => void,
        errorClass: ErrorClass = Error
    ): void {
        const labels = Object.keys(inputs);
        if(labels.length !== expectations.length) {
            throw new TestDeclarationError('Input and expectations must have the same number of values.');
        }

        labels.forEach((label, index) => {
            const expect = expectations[index];
            let caught: Error | undefined;

            try {
                callable(inputs[label]);
            } catch (error) {
                if(isControlSignal(error) || !(error instanceof errorClass)) {
                    throw error;
                }
                caught = error;
            }

            const actual = caught === undefined;
            let message: string;
            if(expect === actual) {
                message = expect
                    ? `Test case '${label}' did not throw, as expected.`
                    : `Test case '${label}' threw, as expected.`;
            } else if(caught !== undefined) {
                message = `Test case '${label}' was expected to succeed, but it raised an exception `
                    + `of class ${failureType(caught)} with message: ${caught.message}`;
            } else {
                message = `Test case '${label}' was expected to raise an exception, but it did not throw anything.`;
            }

            this.assertEqual(expect, actual, message);
        });
    }

    /**
     * {@link TestCase.tryTestCases} for scalar inputs: keys are the inputs,
     * values say whether each should succeed
     */
    protected tryTestCaseMap(
        map: Readonly<Record<string, boolean>>,
        callable: (input: string) => void,
        errorClass: ErrorClass = Error
    ): void {
        const inputs: Record<string, string> = {};
        for(const key of Object.keys(map)) {
            inputs[key] = key;
        }

        this.tryTestCases(inputs, Object.values(map), callable, errorClass);
    }

    /* -(  Hooks  )---------------------------------------------------------- */

    /**
     * Invoked once, before any test method of this case runs
     */
    public willRunTests(): void | Promise<void> {}

    /**
     * Invoked once, after every test method of this case has run
     */
    public didRunTests(): void | Promise<void> {}

    /**
     * Invoked before each test method
     */
    public willRunOneTest(testName: string): void | Promise<void> {}

    /**
     * Invoked after each test method, even when it failed
     */
    public didRunOneTest(testName: string): void | Promise<void> {}

    /**
     * Invoked by an orchestrator once, before any of `testCases` runs
     */
    public willRunTestCases(testCases: readonly TestCase[]): void | Promise<void> {}

    /**
     * Invoked by an orchestrator once, after all of `testCases` ran
     */
    public didRunTestCases(testCases: readonly TestCase[]): void | Promise<void> {}

    /* -(  Registration and results  )-------------------------------------- */

    /**
     * Register a test method that is not declared as a class method,
     * e.g. one generated in the constructor
     */
    protected registerTest(name: TestMethodName, method: (this: this) => unknown): this {
        if(this.registeredTests.has(name)) {
            throw new TestDeclarationError(`Test method '${name}' is already registered.`);
        }
        this.registeredTests.set(name, () => method.call(this));
        return this;
    }

    /** @internal */
    getRegisteredTests(): ReadonlyMap<string, () => unknown> {
        return this.registeredTests;
    }

    /**
     * Name of the test method currently running, if any
     */
    getRunningTest(): string | undefined {
        return this.assertionTracker.currentTest;
    }

    /**
     * Results of the most recent run, in execution order
     */
    getResults(): readonly UnitTestResult[] {
        return this.results;
    }

    /** @internal */
    setResults(results: readonly UnitTestResult[]): void {
        this.results = results;
    }
}
