import { config } from 'dotenv';

// Load .env file if present
config();

export interface AppConfig {
    database: {
        path: string;
    };
    auth: {
        masterKey: string;
    };
    contracts: {
        path: string;
    };
    http: {
        port: number;
        corsOrigins: string;
    };
    nats: {
        enabled: boolean;
        url: string;
        stream: string;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;
    switch (value.toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            throw new Error(`Invalid boolean for environment variable ${key}: ${value}`);
    }
}

export function loadConfig(): AppConfig {
    return {
        database: {
            path: getEnv('DATABASE_PATH', './vitals.db'),
        },
        auth: {
            masterKey: getEnv('DEVICE_MASTER_KEY', 'dev-master-key'),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        http: {
            port: getEnvNumber('HTTP_PORT', 8080),
            corsOrigins: getEnv('CORS_ORIGINS', '*'),
        },
        nats: {
            enabled: getEnvBoolean('NATS_ENABLED', false),
            url: getEnv('NATS_URL', 'nats://localhost:4222'),
            stream: getEnv('NATS_STREAM', 'events'),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
