/**
 * Control signals and engine errors
 * Signals unwind a single test method; fatal errors abort the whole run
 */

export type ControlSignalKind = 'terminated' | 'skipped';

/**
 * Thrown by the assertion engine to leave the running test method early.
 *
 * Not an Error subclass: handlers that only deal with Error instances let
 * it pass, and the runner checks for it before generic failure handling.
 */
export class ControlSignal {
    public readonly kind:    ControlSignalKind;
    public readonly message: string;

    constructor(kind: ControlSignalKind, message: string) {
        this.kind = kind;
        this.message = message;
    }

    toString(): string {
        return `ControlSignal(${this.kind}): ${this.message}`;
    }
}

/**
 * Type guard for control signals
 */
export function isControlSignal(value: unknown): value is ControlSignal {
    return value instanceof ControlSignal;
}

/**
 * A test body failure and its teardown failure, reported together
 */
export class TestAggregateError extends AggregateError {
    public readonly failures: ReadonlyMap<string, unknown>;

    constructor(message: string, failures: ReadonlyMap<string, unknown>) {
        super(Array.from(failures.values()), TestAggregateError.describe(message, failures));
        this.name = 'TestAggregateError';
        this.failures = failures;
    }

    private static describe(message: string, failures: ReadonlyMap<string, unknown>): string {
        const lines = [message];
        for(const [label, failure] of failures) {
            lines.push(`    - ${label}: ${describeFailure(failure)}`);
        }
        return lines.join('\n');
    }
}

/**
 * Base class for errors that must abort the run instead of becoming a result
 */
export class FatalEngineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FatalEngineError';
    }
}

/**
 * Coverage was requested but no usable provider exists
 */
export class CoverageUnavailableError extends FatalEngineError {
    constructor(message: string) {
        super(message);
        this.name = 'CoverageUnavailableError';
    }
}

/**
 * A table-driven helper was called with inconsistent arguments
 */
export class TestDeclarationError extends FatalEngineError {
    constructor(message: string) {
        super(message);
        this.name = 'TestDeclarationError';
    }
}

/**
 * Short `Type: message` form of any thrown value
 */
export function describeFailure(failure: unknown): string {
    if(failure instanceof Error) {
        return `${failure.name}: ${failure.message}`;
    }
    if(isControlSignal(failure)) {
        return failure.toString();
    }
    return String(failure);
}
