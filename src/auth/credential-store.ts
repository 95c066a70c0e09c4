import type Database from 'better-sqlite3';
import { ApiError } from '../api/errors.js';
import type { Store } from '../store/database.js';

export type Principal =
    | { kind: 'master' }
    | { kind: 'device'; deviceId: string };

export type AuthFailure = 'missing_api_key' | 'invalid_api_key';

export type AuthResult =
    | { authorized: true; principal: Principal }
    | { authorized: false; code: AuthFailure };

export function authError(code: AuthFailure): ApiError {
    return code === 'missing_api_key'
        ? new ApiError('missing_api_key', 'X-API-Key header required')
        : new ApiError('invalid_api_key', 'Invalid API key');
}

/**
 * Write credentials: one master secret from configuration plus the API key
 * issued to each registered device. Lookups never write.
 */
export class CredentialStore {
    private findDeviceByKey: Database.Statement<[string], { id: string }>;

    constructor(
        private db: Store,
        private masterKey: string,
    ) {
        this.findDeviceByKey = this.db.prepare<[string], { id: string }>(
            'SELECT id FROM devices WHERE api_key = ?',
        );
    }

    authorize(suppliedKey: string | undefined): AuthResult {
        if (!suppliedKey) {
            return { authorized: false, code: 'missing_api_key' };
        }

        if (suppliedKey === this.masterKey) {
            return { authorized: true, principal: { kind: 'master' } };
        }

        const device = this.findDeviceByKey.get(suppliedKey);
        if (device) {
            return { authorized: true, principal: { kind: 'device', deviceId: device.id } };
        }

        return { authorized: false, code: 'invalid_api_key' };
    }
}
