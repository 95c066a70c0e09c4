import type Database from 'better-sqlite3';
import { logger } from '../config/logger.js';
import { ApiError } from '../api/errors.js';
import { authError, type CredentialStore } from '../auth/credential-store.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import type { VitalIn, VitalView } from '../contracts/types.js';
import type { Metrics } from '../metrics/counter.js';
import type { Store } from '../store/database.js';
import type { VitalRow } from '../store/types.js';
import { uid } from '../lib/ids.js';
import { parseInstant } from '../lib/time.js';
import { toVitalView } from '../vitals/view.js';
import type { IdempotencyLedger } from './idempotency-ledger.js';

export type IngestResult =
    | { status: 'stored'; vitalId: string; vital: VitalView }
    | { status: 'duplicate_ignored' };

/**
 * Receives each vital after it is committed.
 */
export interface VitalEventSink {
    publishVitalRecorded(patientId: string, vital: VitalView): Promise<boolean>;
}

export class IngestionPipeline {
    private insertVital: Database.Statement<[VitalRow]>;

    constructor(
        private db: Store,
        private credentials: CredentialStore,
        private validator: SchemaValidator,
        private ledger: IdempotencyLedger,
        private metrics: Metrics,
        private events?: VitalEventSink,
    ) {
        this.insertVital = db.prepare<[VitalRow]>(
            `INSERT INTO vitals (id, patient_id, timestamp, timestamp_ms, heart_rate, bp_systolic,
                                 bp_diastolic, spo2, temp, device_id)
             VALUES (@id, @patient_id, @timestamp, @timestamp_ms, @heart_rate, @bp_systolic,
                     @bp_diastolic, @spo2, @temp, @device_id)`,
        );
    }

    /**
     * Authorize, validate, deduplicate and store one reading. Every failure
     * is raised before the first write.
     *
     * @param headerToken - `Idempotency-Key` header; wins over the body's `idempotency_key`
     */
    async ingest(
        patientId: string,
        payload: unknown,
        apiKey: string | undefined,
        headerToken: string | undefined,
    ): Promise<IngestResult> {
        this.metrics.incrementReceived();

        const auth = this.credentials.authorize(apiKey);
        if (!auth.authorized) {
            this.metrics.incrementRejectedAuth();
            logger.warn({ patientId, reason: auth.code }, 'Vital write rejected');
            throw authError(auth.code);
        }

        const body = this.validate(payload);
        const token = headerToken || body.idempotency_key;

        const stored = this.storeOnce(patientId, body, token);

        if (!stored) {
            this.metrics.incrementDuplicatesIgnored();
            logger.debug({ patientId, deviceId: body.device_id, token }, 'Duplicate vital ignored');
            return { status: 'duplicate_ignored' };
        }

        this.metrics.incrementStored();
        logger.info({ patientId, deviceId: body.device_id, vitalId: stored.id }, 'Vital stored');

        const vital = toVitalView(stored);
        await this.publish(patientId, vital);

        return { status: 'stored', vitalId: stored.id, vital };
    }

    private validate(payload: unknown): VitalIn & { timestamp_ms: number } {
        const result = this.validator.validateVitalIn(payload);
        if (!result.valid) {
            this.metrics.incrementRejectedInvalid();
            throw new ApiError(
                'validation_error',
                'Invalid payload',
                result.details ?? { _schema: [result.errors] },
            );
        }

        let instant: Date;
        try {
            instant = parseInstant(result.value.timestamp);
        } catch (err) {
            this.metrics.incrementRejectedInvalid();
            const message = err instanceof Error ? err.message : String(err);
            throw new ApiError('validation_error', 'Invalid payload', { timestamp: [message] });
        }

        return { ...result.value, timestamp: instant.toISOString(), timestamp_ms: instant.getTime() };
    }

    /**
     * Ledger record and vital insert commit together, so a failed insert
     * leaves the token free for the caller's retry.
     */
    private storeOnce(
        patientId: string,
        body: VitalIn & { timestamp_ms: number },
        token: string | undefined,
    ): VitalRow | undefined {
        const run = this.db.transaction((): VitalRow | undefined => {
            const { isNew } = this.ledger.checkAndRecord(body.device_id, token);
            if (!isNew) {
                return undefined;
            }

            const row: VitalRow = {
                id: uid('v'),
                patient_id: patientId,
                timestamp: body.timestamp,
                timestamp_ms: body.timestamp_ms,
                heart_rate: body.heart_rate ?? null,
                bp_systolic: body.bp?.systolic ?? null,
                bp_diastolic: body.bp?.diastolic ?? null,
                spo2: body.spo2 ?? null,
                temp: body.temp ?? null,
                device_id: body.device_id,
            };
            this.insertVital.run(row);
            return row;
        });

        return run();
    }

    private async publish(patientId: string, vital: VitalView): Promise<void> {
        if (!this.events) {
            return;
        }

        const published = await this.events.publishVitalRecorded(patientId, vital);
        if (!published) {
            this.metrics.incrementPublishFailed();
        }
    }
}
