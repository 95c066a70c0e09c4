import type Database from 'better-sqlite3';
import { logger } from '../config/logger.js';
import { isUniqueViolation, type Store } from '../store/database.js';
import type { DeviceRow, DeviceType, PatientRow } from '../store/types.js';
import { mintApiKey } from '../lib/ids.js';

export interface RegistrationResult {
    deviceId: string;
    apiKey: string;
    alreadyExisted: boolean;
}

export interface PatientLookup {
    patient: PatientRow;
    created: boolean;
}

export class DeviceRegistry {
    private selectDevice: Database.Statement<[string], DeviceRow>;
    private insertDevice: Database.Statement<[DeviceRow]>;
    private selectPatient: Database.Statement<[string], PatientRow>;
    private insertPatient: Database.Statement<[PatientRow]>;

    constructor(private db: Store) {
        this.selectDevice = db.prepare<[string], DeviceRow>('SELECT * FROM devices WHERE id = ?');
        this.insertDevice = db.prepare<[DeviceRow]>(
            `INSERT INTO devices (id, type, patient_id, api_key, status, registered_at)
             VALUES (@id, @type, @patient_id, @api_key, @status, @registered_at)`,
        );
        this.selectPatient = db.prepare<[string], PatientRow>('SELECT * FROM patients WHERE id = ?');
        this.insertPatient = db.prepare<[PatientRow]>(
            `INSERT INTO patients (id, name, dob, assigned_doctor_id)
             VALUES (@id, @name, @dob, @assigned_doctor_id)`,
        );
    }

    findDevice(deviceId: string): DeviceRow | undefined {
        return this.selectDevice.get(deviceId);
    }

    findPatient(patientId: string): PatientRow | undefined {
        return this.selectPatient.get(patientId);
    }

    /**
     * Return the patient, provisioning a placeholder record for an id the
     * store has not seen.
     */
    findOrCreatePatient(patientId: string): PatientLookup {
        const existing = this.selectPatient.get(patientId);
        if (existing) {
            return { patient: existing, created: false };
        }

        const patient: PatientRow = {
            id: patientId,
            name: `Patient ${patientId}`,
            dob: null,
            assigned_doctor_id: null,
        };

        try {
            this.insertPatient.run(patient);
        } catch (err) {
            const winner = isUniqueViolation(err) ? this.selectPatient.get(patientId) : undefined;
            if (!winner) throw err;
            return { patient: winner, created: false };
        }

        logger.info({ patientId }, 'Patient auto-provisioned');
        return { patient, created: true };
    }

    /**
     * Idempotent by device id: an existing device keeps its key, whatever
     * type or patient the new request names.
     */
    register(deviceId: string, deviceType: DeviceType, patientId: string): RegistrationResult {
        const run = this.db.transaction((): RegistrationResult => {
            const existing = this.findDevice(deviceId);
            if (existing) {
                return { deviceId: existing.id, apiKey: existing.api_key, alreadyExisted: true };
            }

            this.findOrCreatePatient(patientId);

            const device: DeviceRow = {
                id: deviceId,
                type: deviceType,
                patient_id: patientId,
                api_key: mintApiKey(),
                status: 'active',
                registered_at: new Date().toISOString(),
            };

            try {
                this.insertDevice.run(device);
            } catch (err) {
                // Lost the race to a concurrent registration of the same id.
                const winner = isUniqueViolation(err) ? this.selectDevice.get(deviceId) : undefined;
                if (!winner) throw err;
                return { deviceId: winner.id, apiKey: winner.api_key, alreadyExisted: true };
            }

            return { deviceId: device.id, apiKey: device.api_key, alreadyExisted: false };
        });

        const result = run();

        logger.info(
            { deviceId, patientId, alreadyExisted: result.alreadyExisted },
            result.alreadyExisted ? 'Device already registered' : 'Device registered',
        );

        return result;
    }
}
