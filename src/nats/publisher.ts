import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import type { VitalView, VitalsRecordedEvent } from '../contracts/types.js';
import type { VitalEventSink } from '../ingest/pipeline.js';
import type { EventTransport } from './connection.js';

export const VITALS_RECORDED_SUBJECT = 'vitals.recorded';

export class VitalsPublisher implements VitalEventSink {
    constructor(
        private transport: EventTransport,
        private validator: SchemaValidator,
    ) { }

    async publishVitalRecorded(patientId: string, vital: VitalView): Promise<boolean> {
        const event: VitalsRecordedEvent = {
            event_name: VITALS_RECORDED_SUBJECT,
            event_id: uuidv4(),
            timestamp: new Date().toISOString(),
            payload: {
                ...vital,
                patient_id: patientId,
            },
        };

        // Validate before publishing
        const validationResult = this.validator.validateVitalsRecorded(event);
        if (!validationResult.valid) {
            logger.error(
                { errors: validationResult.errors, event_id: event.event_id },
                'vitals.recorded event failed validation',
            );
            return false;
        }

        try {
            await this.transport.publish(VITALS_RECORDED_SUBJECT, JSON.stringify(event), vital.vital_id);

            logger.debug(
                { event_id: event.event_id, vital_id: vital.vital_id, patient_id: patientId },
                'vitals.recorded published',
            );

            return true;
        } catch (err) {
            logger.error(
                { error: err, event_id: event.event_id, vital_id: vital.vital_id },
                'Failed to publish vitals.recorded to NATS',
            );
            return false;
        }
    }
}
