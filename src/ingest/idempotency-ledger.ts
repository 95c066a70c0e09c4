import type Database from 'better-sqlite3';
import { logger } from '../config/logger.js';
import { isUniqueViolation, type Store } from '../store/database.js';

export interface LedgerCheck {
    isNew: boolean;
}

/** Tokens are scoped per device: the same token from two devices is two keys. */
export function compositeKey(deviceId: string, token: string): string {
    return `${deviceId}:${token}`;
}

/**
 * Durable "(device, token) already processed" facts. Records are never
 * updated or expired.
 */
export class IdempotencyLedger {
    private selectKey: Database.Statement<[string], { id: number }>;
    private insertKey: Database.Statement<[{ device_id: string; key: string; created_at: string }]>;

    constructor(db: Store) {
        this.selectKey = db.prepare<[string], { id: number }>(
            'SELECT id FROM idempotency_keys WHERE key = ?',
        );
        this.insertKey = db.prepare<[{ device_id: string; key: string; created_at: string }]>(
            'INSERT INTO idempotency_keys (device_id, key, created_at) VALUES (@device_id, @key, @created_at)',
        );
    }

    has(deviceId: string, token: string): boolean {
        return this.selectKey.get(compositeKey(deviceId, token)) !== undefined;
    }

    /**
     * At most one caller sees `isNew: true` per (device, token): the UNIQUE
     * index on `key` arbitrates concurrent inserts. Without a token every
     * call is new.
     */
    checkAndRecord(deviceId: string, token: string | undefined): LedgerCheck {
        if (!token) {
            return { isNew: true };
        }

        if (this.has(deviceId, token)) {
            return { isNew: false };
        }

        const key = compositeKey(deviceId, token);

        try {
            this.insertKey.run({ device_id: deviceId, key, created_at: new Date().toISOString() });
        } catch (err) {
            if (isUniqueViolation(err)) {
                logger.debug({ deviceId, key }, 'Idempotency key recorded concurrently');
                return { isNew: false };
            }
            throw err;
        }

        return { isNew: true };
    }
}
