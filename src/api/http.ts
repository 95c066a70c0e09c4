import type { IncomingMessage, ServerResponse } from 'http';
import { ApiError } from './errors.js';

export const MAX_BODY_BYTES = 1024 * 1024;

export function header(req: IncomingMessage, name: string): string | undefined {
    const value = req.headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

/**
 * Buffer and parse a JSON request body. An empty body parses to `undefined`
 * and is left for schema validation to reject.
 */
export async function readJsonBody(req: IncomingMessage, limit = MAX_BODY_BYTES): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;

    for await (const chunk of req) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        size += buffer.length;
        if (size > limit) {
            throw new ApiError('bad_request', `Request body exceeds ${limit} bytes`);
        }
        chunks.push(buffer);
    }

    const text = Buffer.concat(chunks).toString('utf-8').trim();
    if (text === '') {
        return undefined;
    }

    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ApiError('bad_request', 'Malformed JSON body', message);
    }
}
