import pino from 'pino';
import { loadConfig } from './env.js';

const config = loadConfig();

const prettyPrint = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
    level: config.log.level,
    redact: ['apiKey', 'api_key', 'headers["x-api-key"]'],
    transport: prettyPrint
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        }
        : undefined,
});
