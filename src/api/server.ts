import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../config/logger.js';
import type { CredentialStore } from '../auth/credential-store.js';
import type { DeviceRegistrationService } from '../devices/registration.js';
import type { IngestionPipeline } from '../ingest/pipeline.js';
import type { Metrics } from '../metrics/counter.js';
import type { EventTransport } from '../nats/connection.js';
import { isReachable, type Store } from '../store/database.js';
import type { HistoryQuery, VitalsQueries } from '../vitals/queries.js';
import { ApiError } from './errors.js';
import { header, readJsonBody, sendJson } from './http.js';

export interface ApiServices {
    db: Store;
    credentials: CredentialStore;
    registration: DeviceRegistrationService;
    pipeline: IngestionPipeline;
    queries: VitalsQueries;
    metrics: Metrics;
    events?: EventTransport;
}

const PATIENT_ROUTE = /^\/api\/v1\/patients\/([^/]+)\/(vitals|latest|history)\/?$/;
const REGISTER_ROUTE = /^\/api\/v1\/devices\/register\/?$/;

function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        throw new ApiError('bad_request', 'Malformed path segment');
    }
}

function optionalParam(url: URL, name: string): string | undefined {
    return url.searchParams.get(name) ?? undefined;
}

export class ApiServer {
    private server: Server;

    constructor(
        private port: number,
        private services: ApiServices,
        private corsOrigins = '*',
    ) {
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err) => {
                logger.error({ error: err }, 'Unhandled request failure');
                if (!res.headersSent) {
                    sendJson(res, 500, { code: 'internal_error', message: 'Internal server error' });
                } else {
                    res.end();
                }
            });
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const method = req.method ?? 'GET';
        const url = new URL(req.url ?? '/', 'http://localhost');

        logger.debug(
            {
                method,
                path: url.pathname,
                hasApiKey: Boolean(header(req, 'x-api-key')),
                idempotencyKey: header(req, 'idempotency-key'),
            },
            'Request received',
        );

        res.setHeader('Access-Control-Allow-Origin', this.corsOrigins);
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-API-Key, Idempotency-Key');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        try {
            await this.route(method, url, req, res);
        } catch (err) {
            if (err instanceof ApiError) {
                sendJson(res, err.status, err.toBody());
                return;
            }
            logger.error({ error: err, method, path: url.pathname }, 'Request failed');
            sendJson(res, 500, { code: 'internal_error', message: 'Internal server error' });
        }
    }

    private async route(method: string, url: URL, req: IncomingMessage, res: ServerResponse): Promise<void> {
        if (method === 'GET' && url.pathname === '/health') {
            this.handleHealth(res);
            return;
        }

        if (method === 'GET' && url.pathname === '/metrics') {
            this.handleMetrics(res);
            return;
        }

        if (method === 'POST' && REGISTER_ROUTE.test(url.pathname)) {
            const apiKey = header(req, 'x-api-key');
            const body = await this.readBodyWithKey(req, apiKey);
            const result = this.services.registration.registerDevice(body, apiKey);
            sendJson(res, result.status === 'registered' ? 201 : 200, result);
            return;
        }

        const match = PATIENT_ROUTE.exec(url.pathname);
        if (match) {
            const patientId = decodeSegment(match[1]);
            const action = match[2];

            if (method === 'POST' && action === 'vitals') {
                await this.handleIngest(patientId, req, res);
                return;
            }
            if (method === 'GET' && action === 'latest') {
                sendJson(res, 200, this.services.queries.latest(patientId));
                return;
            }
            if (method === 'GET' && action === 'history') {
                const query: HistoryQuery = {
                    from: optionalParam(url, 'from'),
                    to: optionalParam(url, 'to'),
                    page: optionalParam(url, 'page'),
                    page_size: optionalParam(url, 'page_size'),
                };
                sendJson(res, 200, this.services.queries.history(patientId, query));
                return;
            }
        }

        throw new ApiError('not_found', `No route for ${method} ${url.pathname}`);
    }

    private async handleIngest(patientId: string, req: IncomingMessage, res: ServerResponse): Promise<void> {
        const apiKey = header(req, 'x-api-key');
        const body = await this.readBodyWithKey(req, apiKey);

        const result = await this.services.pipeline.ingest(
            patientId,
            body,
            apiKey,
            header(req, 'idempotency-key'),
        );

        if (result.status === 'stored') {
            sendJson(res, 201, { vital_id: result.vitalId, status: result.status });
        } else {
            sendJson(res, 200, { status: result.status });
        }
    }

    /**
     * Writes with a missing or unknown key are rejected before the body is
     * parsed; the unread body is drained and the service reports the failure.
     */
    private async readBodyWithKey(req: IncomingMessage, apiKey: string | undefined): Promise<unknown> {
        if (!this.services.credentials.authorize(apiKey).authorized) {
            req.resume();
            return undefined;
        }
        return readJsonBody(req);
    }

    private handleHealth(res: ServerResponse): void {
        const databaseUp = isReachable(this.services.db);
        const events = this.services.events;

        const response = {
            status: databaseUp ? 'ok' : 'degraded',
            database: {
                reachable: databaseUp,
            },
            nats: {
                enabled: events !== undefined,
                connected: events?.isConnected() ?? false,
            },
            timestamp: new Date().toISOString(),
        };

        sendJson(res, databaseUp ? 200 : 503, response);
    }

    private handleMetrics(res: ServerResponse): void {
        const response = {
            ...this.services.metrics.getCounters(),
            timestamp: new Date().toISOString(),
        };

        sendJson(res, 200, response);
    }

    /**
     * Port actually bound; differs from the configured one when that is 0.
     */
    boundPort(): number {
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
            return this.port;
        }
        return address.port;
    }

    async start(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.port, () => {
                this.server.off('error', reject);
                logger.info({ port: this.boundPort() }, 'HTTP API server started');
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => {
                if (err) {
                    reject(err);
                    return;
                }
                logger.info('HTTP API server stopped');
                resolve();
            });
            this.server.closeIdleConnections();
        });
    }
}
