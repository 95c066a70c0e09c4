import { countRows } from '../../../src/store/database.js';
import type { VitalEventSink } from '../../../src/ingest/pipeline.js';
import {
    createTestContext,
    MASTER_KEY,
    storedId,
    vitalPayload,
    type TestContext,
} from '../../support/context.js';
import { captureAsyncError } from '../../support/errors.js';

function vitalCountFor(ctx: TestContext, patientId: string): number {
    return ctx.queries.history(patientId, {}).total;
}

describe('IngestionPipeline', () => {
    let ctx: TestContext;
    let deviceKey: string;

    beforeEach(() => {
        ctx = createTestContext();
        deviceKey = ctx.registry.register('dev_1', 'hr', 'p_1').apiKey;
    });

    describe('Idempotency', () => {
        it('should store the first submission of a token and ignore replays', async () => {
            const first = await ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, 'abc');
            const second = await ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, 'abc');
            const third = await ctx.pipeline.ingest('p_1', vitalPayload({ heart_rate: 90 }), deviceKey, 'abc');

            expect(first.status).toBe('stored');
            expect(storedId(first)).toMatch(/^v_[0-9a-f]{12}$/);
            expect(second).toEqual({ status: 'duplicate_ignored' });
            expect(third).toEqual({ status: 'duplicate_ignored' });
            expect(vitalCountFor(ctx, 'p_1')).toBe(1);
            expect(ctx.queries.latest('p_1').heart_rate).toBe(72);
        });

        it('should store every submission when no token is given', async () => {
            const first = await ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, undefined);
            const second = await ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, undefined);

            expect(storedId(first)).not.toBe(storedId(second));
            expect(vitalCountFor(ctx, 'p_1')).toBe(2);
            expect(countRows(ctx.db, 'idempotency_keys')).toBe(0);
        });

        it('should deduplicate on the body token when no header is sent', async () => {
            const payload = vitalPayload({ idempotency_key: 'body-1' });

            const first = await ctx.pipeline.ingest('p_1', payload, deviceKey, undefined);
            const second = await ctx.pipeline.ingest('p_1', payload, deviceKey, undefined);

            expect(first.status).toBe('stored');
            expect(second.status).toBe('duplicate_ignored');
        });

        it('should prefer the header token over the body token', async () => {
            const payload = vitalPayload({ idempotency_key: 'body-1' });

            const withHeader = await ctx.pipeline.ingest('p_1', payload, deviceKey, 'header-1');
            const bodyOnly = await ctx.pipeline.ingest('p_1', payload, deviceKey, undefined);
            const headerAgain = await ctx.pipeline.ingest('p_1', payload, deviceKey, 'header-1');

            expect(withHeader.status).toBe('stored');
            expect(bodyOnly.status).toBe('stored');
            expect(headerAgain.status).toBe('duplicate_ignored');
            expect(ctx.ledger.has('dev_1', 'header-1')).toBe(true);
            expect(ctx.ledger.has('dev_1', 'body-1')).toBe(true);
        });

        it('should scope tokens to the device named in the payload', async () => {
            await ctx.pipeline.ingest('p_1', vitalPayload({ device_id: 'dev_1' }), MASTER_KEY, 'abc');
            const other = await ctx.pipeline.ingest('p_1', vitalPayload({ device_id: 'dev_2' }), MASTER_KEY, 'abc');

            expect(other.status).toBe('stored');
        });

        it('should release the token when the vital insert fails', async () => {
            ctx.db.exec('ALTER TABLE vitals RENAME TO vitals_offline');

            await expect(ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, 'abc')).rejects.toThrow('no such table');
            expect(countRows(ctx.db, 'idempotency_keys')).toBe(0);

            ctx.db.exec('ALTER TABLE vitals_offline RENAME TO vitals');

            const retry = await ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, 'abc');
            expect(retry.status).toBe('stored');
        });
    });

    describe('Authorization', () => {
        it('should reject a missing key without touching the store', async () => {
            const error = await captureAsyncError(ctx.pipeline.ingest('p_1', vitalPayload(), undefined, 'abc'));

            expect(error.code).toBe('missing_api_key');
            expect(error.status).toBe(401);
            expect(countRows(ctx.db, 'vitals')).toBe(0);
            expect(countRows(ctx.db, 'idempotency_keys')).toBe(0);
        });

        it('should reject an unknown key', async () => {
            const error = await captureAsyncError(ctx.pipeline.ingest('p_1', vitalPayload(), 'key_unknown', 'abc'));

            expect(error.code).toBe('invalid_api_key');
            expect(countRows(ctx.db, 'vitals')).toBe(0);
        });

        it('should check the key before the payload', async () => {
            const error = await captureAsyncError(ctx.pipeline.ingest('p_1', { nonsense: true }, undefined, undefined));

            expect(error.code).toBe('missing_api_key');
        });

        it('should accept the master key', async () => {
            const result = await ctx.pipeline.ingest('p_1', vitalPayload(), MASTER_KEY, undefined);

            expect(result.status).toBe('stored');
        });
    });

    describe('Validation', () => {
        it('should reject blood pressure with only a systolic value', async () => {
            const error = await captureAsyncError(
                ctx.pipeline.ingest('p_1', { ...vitalPayload(), bp: { systolic: 120 } }, deviceKey, undefined),
            );

            expect(error.code).toBe('validation_error');
            expect(error.details).toEqual({ 'bp.diastolic': ["must have required property 'diastolic'"] });
        });

        it('should reject blood pressure with only a diastolic value', async () => {
            const error = await captureAsyncError(
                ctx.pipeline.ingest('p_1', { ...vitalPayload(), bp: { diastolic: 80 } }, deviceKey, undefined),
            );

            expect(error.details).toEqual({ 'bp.systolic': ["must have required property 'systolic'"] });
        });

        it('should store blood pressure when both values are in range', async () => {
            const result = await ctx.pipeline.ingest(
                'p_1',
                vitalPayload({ bp: { systolic: 300, diastolic: 200 } }),
                deviceKey,
                undefined,
            );

            expect(result.status).toBe('stored');
            expect(ctx.queries.latest('p_1').bp).toEqual({ systolic: 300, diastolic: 200 });
        });

        it('should reject a systolic value above 300', async () => {
            const error = await captureAsyncError(
                ctx.pipeline.ingest('p_1', vitalPayload({ bp: { systolic: 301, diastolic: 80 } }), deviceKey, undefined),
            );

            expect(error.details).toEqual({ 'bp.systolic': ['must be <= 300'] });
        });

        it('should require a timestamp and a device id', async () => {
            const error = await captureAsyncError(ctx.pipeline.ingest('p_1', { heart_rate: 60 }, deviceKey, undefined));

            expect(error.details).toEqual({
                timestamp: ["must have required property 'timestamp'"],
                device_id: ["must have required property 'device_id'"],
            });
        });

        it('should reject a timestamp that is not an ISO-8601 date-time', async () => {
            const error = await captureAsyncError(
                ctx.pipeline.ingest('p_1', vitalPayload({ timestamp: 'yesterday' }), deviceKey, undefined),
            );

            expect(error.details).toEqual({ timestamp: ['must match format "date-time"'] });
        });

        it('should reject a timestamp without a zone designator', async () => {
            const error = await captureAsyncError(
                ctx.pipeline.ingest('p_1', vitalPayload({ timestamp: '2024-01-01T00:00:00' }), deviceKey, undefined),
            );

            expect(error.code).toBe('validation_error');
            expect(Object.keys(error.details ?? {})).toEqual(['timestamp']);
        });

        it('should normalize an offset timestamp to UTC', async () => {
            await ctx.pipeline.ingest('p_1', vitalPayload({ timestamp: '2024-01-01T02:30:00+02:00' }), deviceKey, undefined);

            expect(ctx.queries.latest('p_1').timestamp).toBe('2024-01-01T00:30:00.000Z');
        });

        it('should reject a non-integer heart rate', async () => {
            const error = await captureAsyncError(
                ctx.pipeline.ingest('p_1', { ...vitalPayload(), heart_rate: '72' }, deviceKey, undefined),
            );

            expect(error.details).toEqual({ heart_rate: ['must be integer,null'] });
        });

        it('should reject unknown fields', async () => {
            const error = await captureAsyncError(
                ctx.pipeline.ingest('p_1', { ...vitalPayload(), pulse: 72 }, deviceKey, undefined),
            );

            expect(error.details).toEqual({ pulse: ['must NOT have additional properties'] });
        });

        it('should reject a body that is not an object', async () => {
            const error = await captureAsyncError(ctx.pipeline.ingest('p_1', undefined, deviceKey, undefined));

            expect(error.code).toBe('validation_error');
            expect(error.details).toEqual({ _schema: ['must be object'] });
        });

        it('should accept explicit nulls for optional readings', async () => {
            const result = await ctx.pipeline.ingest(
                'p_1',
                vitalPayload({ heart_rate: null, spo2: null, temp: 36.6 }),
                deviceKey,
                undefined,
            );

            expect(result.status).toBe('stored');
            expect(ctx.queries.latest('p_1')).toMatchObject({ heart_rate: null, spo2: null, temp: 36.6, bp: null });
        });

        it('should not consume the token of a rejected payload', async () => {
            await captureAsyncError(ctx.pipeline.ingest('p_1', vitalPayload({ timestamp: 'bad' }), deviceKey, 'abc'));

            const result = await ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, 'abc');

            expect(result.status).toBe('stored');
        });
    });

    describe('Events and metrics', () => {
        it('should hand each stored vital to the event sink once', async () => {
            const sink = { publishVitalRecorded: vi.fn(async () => true) } satisfies VitalEventSink;
            ctx = createTestContext(sink);

            const result = await ctx.pipeline.ingest('p_1', vitalPayload(), MASTER_KEY, 'abc');
            await ctx.pipeline.ingest('p_1', vitalPayload(), MASTER_KEY, 'abc');

            expect(sink.publishVitalRecorded).toHaveBeenCalledTimes(1);
            expect(sink.publishVitalRecorded).toHaveBeenCalledWith('p_1', {
                vital_id: storedId(result),
                timestamp: '2024-01-01T00:00:00.000Z',
                heart_rate: 72,
                bp: null,
                spo2: null,
                temp: null,
                device_id: 'dev_1',
            });
        });

        it('should still report stored when publishing fails', async () => {
            const sink = { publishVitalRecorded: vi.fn(async () => false) } satisfies VitalEventSink;
            ctx = createTestContext(sink);

            const result = await ctx.pipeline.ingest('p_1', vitalPayload(), MASTER_KEY, undefined);

            expect(result.status).toBe('stored');
            expect(ctx.metrics.getCounters().publish_failed).toBe(1);
        });

        it('should count outcomes', async () => {
            await ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, 'abc');
            await ctx.pipeline.ingest('p_1', vitalPayload(), deviceKey, 'abc');
            await captureAsyncError(ctx.pipeline.ingest('p_1', vitalPayload(), undefined, undefined));
            await captureAsyncError(ctx.pipeline.ingest('p_1', {}, deviceKey, undefined));

            expect(ctx.metrics.getCounters()).toEqual({
                received: 4,
                stored: 1,
                duplicates_ignored: 1,
                rejected_auth: 1,
                rejected_invalid: 1,
                devices_registered: 0,
                publish_failed: 0,
            });
        });
    });
});
