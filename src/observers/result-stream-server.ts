/**
 * WebSocket result stream
 * Broadcasts every result to connected live renderers as it is produced
 */

import { createServer } from 'node:http';
import type { Server as HTTPServer } from 'node:http';
import type { Logger } from '@stryker-mutator/api/logging';
import { WebSocketServer, WebSocket } from 'ws';
import { createLogger } from '../logging/logger.js';
import type { UnitTestResult } from '../results/types.js';
import type { ResultObserver } from './types.js';

export interface ResultStreamServerOptions {
    /**
     * Port to listen on; 0 lets the OS pick one
     * @default 0
     */
    port?: number

    /**
     * Interface to bind
     * @default '127.0.0.1'
     */
    host?: string

    /**
     * Path WebSocket clients connect to
     * @default '/results'
     */
    path?: string

    /** @default the `unit-case-engine.result-stream` log4js logger */
    logger?: Logger
}

/**
 * Message sent to clients for every result
 */
export interface ResultStreamMessage {
    type:   'result'
    result: UnitTestResult
}

/**
 * Result observer serving a WebSocket endpoint. Clients only receive results
 * produced while they are connected; nothing is buffered for late joiners.
 *
 * @example
 * ```typescript
 * const stream = new ResultStreamServer({ port: 7357 });
 * await stream.start();
 * const driver = await createTestCaseDriver({ observers: [stream] });
 * await driver.run(new ParserTest());
 * await stream.close();
 * ```
 */
export class ResultStreamServer implements ResultObserver {
    private httpServer:     HTTPServer | null = null;
    private wss:            WebSocketServer | null = null;
    private clients = new Set<WebSocket>();
    private readonly requestedPort: number;
    private readonly host:          string;
    private readonly path:          string;
    private readonly logger:        Logger;

    constructor(options: ResultStreamServerOptions = {}) {
        this.logger = options.logger ?? createLogger('unit-case-engine.result-stream');
        this.requestedPort = options.port ?? 0;
        this.host = options.host ?? '127.0.0.1';
        this.path = options.path ?? '/results';
    }

    /**
     * Start the WebSocket server
     */
    async start(): Promise<void> {
        if(this.httpServer) {
            throw new Error('Result stream server already started');
        }

        const httpServer = createServer((req, res) => {
            // Plain HTTP requests are not served; upgrades on the stream path are handled by ws
            res.writeHead(req.url === this.path ? 400 : 404);
            res.end(req.url === this.path ? 'WebSocket upgrade required' : 'Not found');
        });

        await new Promise<void>((resolve, reject) => {
            httpServer.once('error', reject);
            httpServer.listen(this.requestedPort, this.host, () => {
                httpServer.off('error', reject);
                resolve();
            });
        });

        // Attached after listen: ws re-emits server errors on the WebSocketServer
        const wss = new WebSocketServer({ server: httpServer, path: this.path });
        wss.on('error', (error) => {
            this.logger.error('Result stream server error: %s', error.message);
        });
        wss.on('connection', (ws) => {
            this.clients.add(ws);
            ws.on('close', () => {
                this.clients.delete(ws);
            });
        });

        this.httpServer = httpServer;
        this.wss = wss;
        this.logger.debug('Result stream listening on %s', this.url);
    }

    /**
     * Port the server is bound to
     * @throws {Error} if the server is not listening
     */
    get port(): number {
        const address = this.httpServer?.address();
        if(!address || typeof address === 'string') {
            throw new Error('Result stream server is not listening');
        }
        return address.port;
    }

    /**
     * WebSocket URL clients connect to
     */
    get url(): string {
        return `ws://${this.host}:${this.port}${this.path}`;
    }

    /**
     * Get the number of connected clients
     */
    get clientCount(): number {
        return this.clients.size;
    }

    onResult(result: UnitTestResult): void {
        const message: ResultStreamMessage = { type: 'result', result };
        const payload = JSON.stringify(message);

        for(const client of this.clients) {
            if(client.readyState === WebSocket.OPEN) {
                client.send(payload);
            }
        }
    }

    /**
     * Close the server and all client connections
     */
    async close(): Promise<void> {
        for(const client of this.clients) {
            client.terminate();
        }
        this.clients.clear();

        if(this.wss) {
            const wss = this.wss;
            this.wss = null;
            await new Promise<void>((resolve) => {
                wss.close(() => resolve());
            });
        }

        if(this.httpServer) {
            const httpServer = this.httpServer;
            this.httpServer = null;
            httpServer.closeAllConnections();
            await new Promise<void>((resolve, reject) => {
                httpServer.close((err) => (err ? reject(err) : resolve()));
            });
        }
    }
}
