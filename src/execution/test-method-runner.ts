/**
 * Runs one test method end to end and classifies its outcome
 */

import type { Logger } from '@stryker-mutator/api/logging';
import type { AssertionVerdict } from '../assertions/assertion-tracker.js';
import { NO_ASSERTIONS_MESSAGE, exceptionFailure } from '../assertions/failure-messages.js';
import type { CoverageSession } from '../coverage/coverage-session.js';
import { ResultStatus, createResult, type CoverageMap, type UnitTestResult } from '../results/types.js';
import type { TestCase } from '../test-case.js';
import type { TestMethod } from './method-discovery.js';
import { FatalEngineError, TestAggregateError, isControlSignal } from './signals.js';

export const AGGREGATE_FAILURE_MESSAGE = 'Multiple exceptions were raised during test execution.';

export interface TestMethodRunContext {
    testCase: TestCase
    /** Class name reported as the result namespace */
    namespace: string
    name:      string
    method:    TestMethod
    coverage:  CoverageSession
    logger:    Logger
    /** Builds the result link, when links are configured */
    linkFor?:  (name: string) => string
}

/**
 * How a phase (setup, body, teardown) ended
 */
export type PhaseOutcome =
    | { readonly ok: true }
    | { readonly ok: false, readonly failure: unknown };

export const OK: PhaseOutcome = { ok: true };

async function runPhase(phase: () => unknown): Promise<PhaseOutcome> {
    try {
        await phase();
        return OK;
    } catch (failure) {
        if(failure instanceof FatalEngineError) {
            throw failure;
        }
        return { ok: false, failure };
    }
}

/**
 * Non-signal failure of a phase, if it had one
 */
function exceptionOf(outcome: PhaseOutcome): { failure: unknown } | undefined {
    return !outcome.ok && !isControlSignal(outcome.failure) ? { failure: outcome.failure } : undefined;
}

export interface Verdict {
    status:  ResultStatus
    message: string
}

/**
 * Decide the single verdict for a method from what each phase did
 */
export function classifyOutcome(
    body: PhaseOutcome,
    teardown: PhaseOutcome,
    verdicts: readonly AssertionVerdict[],
    assertionCount: number
): Verdict {
    const bodyException = exceptionOf(body);
    const teardownException = exceptionOf(teardown);

    let exception: string | undefined;
    if(bodyException && teardownException) {
        exception = exceptionFailure(new TestAggregateError(AGGREGATE_FAILURE_MESSAGE, new Map([
            ['Execution', bodyException.failure],
            ['Shutdown', teardownException.failure],
        ])));
    } else if(bodyException ?? teardownException) {
        exception = exceptionFailure((bodyException ?? teardownException)?.failure);
    }

    if(exception !== undefined) {
        const recorded = verdicts.map(verdict => verdict.message);
        return { status: ResultStatus.Fail, message: [...recorded, exception].join('\n\n') };
    }

    const failures = verdicts.filter(verdict => verdict.status === ResultStatus.Fail);
    if(failures.length > 0) {
        return { status: ResultStatus.Fail, message: failures.map(verdict => verdict.message).join('\n\n') };
    }

    if(verdicts.length > 0) {
        return { status: ResultStatus.Skip, message: verdicts[0].message };
    }

    // A control signal thrown without going through the tracker still ends the method
    const signal = [body, teardown].find(outcome => !outcome.ok);
    if(signal && !signal.ok && isControlSignal(signal.failure)) {
        const status = signal.failure.kind === 'skipped' ? ResultStatus.Skip : ResultStatus.Fail;
        return { status, message: signal.failure.message };
    }

    if(assertionCount === 0) {
        return { status: ResultStatus.Fail, message: NO_ASSERTIONS_MESSAGE };
    }

    return { status: ResultStatus.Pass, message: `${assertionCount} assertion(s) passed.` };
}

/**
 * Execute one test method: setup hook, coverage start, body, coverage stop,
 * teardown hook, then classification into exactly one result.
 *
 * Coverage capture is stopped on every exit path before the result is
 * built. Fatal engine errors propagate once capture has stopped.
 */
export async function runTestMethod(context: TestMethodRunContext): Promise<UnitTestResult> {
    const { testCase, name, coverage, logger } = context;
    const tracker = testCase.assertionTracker;

    tracker.begin(name);
    const startTime = Date.now();

    const finish = (verdict: Verdict, coverageMap: CoverageMap): UnitTestResult => createResult({
        namespace:  context.namespace,
        name,
        status:     verdict.status,
        durationMs: Date.now() - startTime,
        message:    verdict.message,
        coverage:   coverageMap,
        link:       context.linkFor?.(name),
    });

    const setup = await runPhase(() => testCase.willRunOneTest(name));
    if(!setup.ok) {
        logger.debug('Setup of %s failed, skipping its body', name);
        return finish(classifyOutcome(setup, OK, tracker.getVerdicts(), tracker.assertionCount), {});
    }

    await coverage.begin();
    let body: PhaseOutcome;
    let coverageMap: CoverageMap;
    try {
        body = await runPhase(context.method);
    } finally {
        coverageMap = await coverage.end();
    }

    const teardown = await runPhase(() => testCase.didRunOneTest(name));

    const verdict = classifyOutcome(body, teardown, tracker.getVerdicts(), tracker.assertionCount);
    logger.debug('%s::%s finished: %s', context.namespace, name, verdict.status);
    return finish(verdict, coverageMap);
}
