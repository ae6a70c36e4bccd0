/**
 * Assertion bookkeeping for the currently running test method
 */

import { ResultStatus } from '../results/types.js';
import { ControlSignal } from '../execution/signals.js';

/**
 * Outcome recorded by a failing or skipping assertion
 */
export interface AssertionVerdict {
    status:  ResultStatus.Fail | ResultStatus.Skip
    message: string
}

/**
 * Counts successful assertions and records verdicts for one test method at a time.
 * The runner calls {@link AssertionTracker.begin} before every method.
 */
export class AssertionTracker {
    private count = 0;
    private verdicts: AssertionVerdict[] = [];
    private runningTest?: string;

    begin(testName: string): void {
        this.runningTest = testName;
        this.count = 0;
        this.verdicts = [];
    }

    get assertionCount(): number {
        return this.count;
    }

    get currentTest(): string | undefined {
        return this.runningTest;
    }

    /**
     * Verdicts recorded since the last {@link AssertionTracker.begin}, oldest first
     */
    getVerdicts(): readonly AssertionVerdict[] {
        return [...this.verdicts];
    }

    pass(): void {
        this.count++;
    }

    /**
     * Record a failure and unwind the test method
     */
    fail(message: string): never {
        this.verdicts.push({ status: ResultStatus.Fail, message });
        throw new ControlSignal('terminated', message);
    }

    /**
     * Record a skip and unwind the test method
     */
    skip(message: string): never {
        this.verdicts.push({ status: ResultStatus.Skip, message });
        throw new ControlSignal('skipped', message);
    }
}
