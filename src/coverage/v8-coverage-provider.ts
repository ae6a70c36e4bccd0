/**
 * Coverage provider backed by V8 precise coverage
 */

import { isAbsolute, relative, sep } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Logger } from '@stryker-mutator/api/logging';
import { InspectorSession, type CoverageInspector } from '../inspector/inspector-session.js';
import { lineStatusesFromFunctions } from './v8-line-mapper.js';
import type { CoverageProvider, LineStatus, RawCoverage } from './types.js';

export interface V8CoverageProviderOptions {
    /** Only scripts below this directory are reported */
    rootDir?:    string
    /** Inspector to use; defaults to a session on the current isolate */
    inspector?:  CoverageInspector
}

/**
 * Local file path of a V8 script URL, or undefined for internal and eval'd scripts
 */
export function scriptPath(url: string): string | undefined {
    if(url.startsWith('file://')) {
        return fileURLToPath(url);
    }
    return isAbsolute(url) ? url : undefined;
}

function isInside(rootDir: string, path: string): boolean {
    const rel = relative(rootDir, path);
    return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Captures line coverage of the current process through the inspector's
 * Profiler domain. Lines are split from the script source V8 reports, so
 * offsets match code rewritten by a loader. The inspector connects lazily
 * on the first capture.
 */
export class V8CoverageProvider implements CoverageProvider {
    private readonly inspector: CoverageInspector;
    private readonly rootDir?:  string;
    // Script source by script id; undefined when the inspector could not provide it
    private readonly sources = new Map<string, string | undefined>();
    private connected = false;

    constructor(
        private readonly logger: Logger,
        options: V8CoverageProviderOptions = {}
    ) {
        this.inspector = options.inspector ?? new InspectorSession();
        this.rootDir = options.rootDir;
    }

    isAvailable(): boolean {
        return process.features.inspector;
    }

    async start(): Promise<void> {
        if(!this.connected) {
            await this.inspector.connect();
            this.connected = true;
            this.logger.debug('Connected to the V8 inspector for coverage');
        }
        await this.inspector.startPreciseCoverage();
    }

    async stop(): Promise<RawCoverage> {
        const scripts = await this.inspector.takePreciseCoverage();
        await this.inspector.stopPreciseCoverage();

        const coverage: Record<string, LineStatus[]> = {};
        for(const script of scripts) {
            const path = scriptPath(script.url);
            if(!path || !this.isReported(path)) {
                continue;
            }

            const source = await this.loadSource(script.scriptId, path);
            if(source === undefined) {
                continue;
            }

            coverage[path] = lineStatusesFromFunctions(source, script.functions);
        }

        return coverage;
    }

    async dispose(): Promise<void> {
        if(this.connected) {
            await this.inspector.close();
            this.connected = false;
        }
    }

    private isReported(path: string): boolean {
        if(path.includes(`${sep}node_modules${sep}`)) {
            return false;
        }
        return this.rootDir === undefined || isInside(this.rootDir, path);
    }

    private async loadSource(scriptId: string, path: string): Promise<string | undefined> {
        if(this.sources.has(scriptId)) {
            return this.sources.get(scriptId);
        }

        let source: string | undefined;
        try {
            source = await this.inspector.getScriptSource(scriptId);
        } catch (error) {
            const errorMsg = error instanceof Error ? error.message : String(error);
            this.logger.debug('Skipping coverage for %s, source unavailable: %s', path, errorMsg);
        }

        this.sources.set(scriptId, source);
        return source;
    }
}
