import type { DeviceType } from '../store/types.js';

export interface BloodPressure {
    systolic: number;
    diastolic: number;
}

/** Body of `POST /api/v1/patients/:patientId/vitals`. */
export interface VitalIn {
    timestamp: string;
    device_id: string;
    heart_rate?: number | null;
    bp?: BloodPressure;
    spo2?: number | null;
    temp?: number | null;
    idempotency_key?: string;
}

/** Body of `POST /api/v1/devices/register`. */
export interface DeviceRegisterRequest {
    device_id: string;
    type: DeviceType;
    patient_id: string;
}

export interface VitalView {
    vital_id: string;
    timestamp: string;
    heart_rate: number | null;
    bp: BloodPressure | null;
    spo2: number | null;
    temp: number | null;
    device_id: string;
}

export interface VitalsRecordedEvent {
    event_name: 'vitals.recorded';
    event_id: string;
    timestamp: string;
    payload: VitalView & {
        patient_id: string;
    };
}
