/**
 * In-process V8 inspector session
 * Promise wrapper around node:inspector for precise coverage and script sources
 */

import type { Debugger, Profiler, Session } from 'node:inspector';

/**
 * Error raised when the inspector rejects a request or is not connected
 */
export class InspectorSessionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InspectorSessionError';
    }
}

/**
 * The subset of the inspector protocol needed for precise coverage
 */
export interface CoverageInspector {
    connect():              Promise<void>
    startPreciseCoverage(): Promise<void>
    takePreciseCoverage():  Promise<Profiler.ScriptCoverage[]>
    stopPreciseCoverage():  Promise<void>
    getScriptSource(scriptId: string): Promise<string>
    close():                Promise<void>
}

type Callback<T> = (err: Error | null, result: T) => void;

/**
 * Session on the current isolate's inspector.
 *
 * `node:inspector` is imported on the first {@link InspectorSession.connect}.
 *
 * @example
 * ```typescript
 * const session = new InspectorSession();
 * await session.connect();
 * await session.startPreciseCoverage();
 * runSomething();
 * const scripts = await session.takePreciseCoverage();
 * await session.stopPreciseCoverage();
 * await session.close();
 * ```
 */
export class InspectorSession implements CoverageInspector {
    private session: Session | null = null;

    /**
     * Connect and enable the Profiler and Debugger domains
     * @throws {Error} if already connected
     */
    async connect(): Promise<void> {
        if(this.session) {
            throw new Error('Already connected');
        }

        const inspector = await import('node:inspector');
        const session = new inspector.Session();
        session.connect();
        this.session = session;

        await this.request<void>('Profiler.enable', (active, done) => {
            active.post('Profiler.enable', (err: Error | null) => done(err, undefined));
        });
        await this.request<void>('Debugger.enable', (active, done) => {
            active.post('Debugger.enable', (err: Error | null) => done(err, undefined));
        });
    }

    async startPreciseCoverage(): Promise<void> {
        await this.request<void>('Profiler.startPreciseCoverage', (active, done) => {
            active.post(
                'Profiler.startPreciseCoverage',
                { callCount: true, detailed: true },
                (err: Error | null) => done(err, undefined)
            );
        });
    }

    /**
     * Collect coverage since the capture started; also resets the counters
     */
    async takePreciseCoverage(): Promise<Profiler.ScriptCoverage[]> {
        const response = await this.request<Profiler.TakePreciseCoverageReturnType>(
            'Profiler.takePreciseCoverage',
            (active, done) => {
                active.post('Profiler.takePreciseCoverage', done);
            }
        );
        return response.result;
    }

    async stopPreciseCoverage(): Promise<void> {
        await this.request<void>('Profiler.stopPreciseCoverage', (active, done) => {
            active.post('Profiler.stopPreciseCoverage', (err: Error | null) => done(err, undefined));
        });
    }

    /**
     * Source text of a parsed script, exactly as V8 executes it
     */
    async getScriptSource(scriptId: string): Promise<string> {
        const response = await this.request<Debugger.GetScriptSourceReturnType>(
            'Debugger.getScriptSource',
            (active, done) => {
                active.post('Debugger.getScriptSource', { scriptId }, done);
            }
        );
        return response.scriptSource;
    }

    /**
     * Disconnect the session
     * Idempotent - safe to call multiple times
     */
    async close(): Promise<void> {
        if(!this.session) {
            return;
        }

        this.session.disconnect();
        this.session = null;
    }

    get isConnected(): boolean {
        return this.session !== null;
    }

    private request<T>(method: string, invoke: (session: Session, done: Callback<T>) => void): Promise<T> {
        const session = this.session;
        if(!session) {
            return Promise.reject(new InspectorSessionError(`Inspector session not connected: ${method}`));
        }

        return new Promise<T>((resolve, reject) => {
            invoke(session, (err, result) => {
                if(err) {
                    reject(new InspectorSessionError(`Inspector error in ${method}: ${err.message}`));
                } else {
                    resolve(result);
                }
            });
        });
    }
}
