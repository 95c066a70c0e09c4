import { logger } from '../config/logger.js';
import { ApiError } from '../api/errors.js';
import { authError, type CredentialStore } from '../auth/credential-store.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import type { Metrics } from '../metrics/counter.js';
import type { DeviceRegistry } from './registry.js';

export interface RegistrationResponse {
    device_id: string;
    api_key: string;
    status: 'registered' | 'already_registered';
}

export class DeviceRegistrationService {
    constructor(
        private credentials: CredentialStore,
        private validator: SchemaValidator,
        private registry: DeviceRegistry,
        private metrics: Metrics,
    ) { }

    registerDevice(payload: unknown, apiKey: string | undefined): RegistrationResponse {
        const auth = this.credentials.authorize(apiKey);
        if (!auth.authorized) {
            this.metrics.incrementRejectedAuth();
            logger.warn({ reason: auth.code }, 'Device registration rejected');
            throw authError(auth.code);
        }

        const result = this.validator.validateDeviceRegister(payload);
        if (!result.valid) {
            this.metrics.incrementRejectedInvalid();
            throw new ApiError(
                'validation_error',
                'Invalid payload',
                result.details ?? { _schema: [result.errors] },
            );
        }

        const { device_id, type, patient_id } = result.value;
        const registration = this.registry.register(device_id, type, patient_id);

        if (!registration.alreadyExisted) {
            this.metrics.incrementDevicesRegistered();
        }

        return {
            device_id: registration.deviceId,
            api_key: registration.apiKey,
            status: registration.alreadyExisted ? 'already_registered' : 'registered',
        };
    }
}
