/**
 * Coverage data type definitions
 */

/**
 * Classification of one source line after a capture
 */
export type LineStatus = 'covered' | 'uncovered' | 'unexecutable';

/**
 * Raw provider output: absolute file path -> status per line (index 0 is line 1)
 */
export type RawCoverage = Readonly<Record<string, readonly LineStatus[]>>;

/**
 * Line-level execution tracking. At most one capture is active at a time.
 */
export interface CoverageProvider {
    /** Whether captures can be started in this process */
    isAvailable(): boolean
    /** Begin tracking execution */
    start():       void | Promise<void>
    /** End tracking and report what ran since {@link CoverageProvider.start} */
    stop():        RawCoverage | Promise<RawCoverage>
    /** Release any process-wide resources */
    dispose?():    void | Promise<void>
}
