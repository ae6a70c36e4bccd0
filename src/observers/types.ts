/**
 * Streaming result observers
 */

import type { UnitTestResult } from '../results/types.js';

/**
 * Receives each result the moment the runner produces it, in addition to
 * the sequence the driver returns. Delivery is immediate, never batched.
 */
export interface ResultObserver {
    onResult(result: UnitTestResult): void | Promise<void>
}
