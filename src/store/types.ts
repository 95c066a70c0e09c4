export const DEVICE_TYPES = ['hr', 'bp', 'spo2', 'temp', 'multi'] as const;

/** heart-rate, blood-pressure, oxygen-saturation, temperature, multi-sensor */
export type DeviceType = (typeof DEVICE_TYPES)[number];

export type DeviceStatus = 'active' | 'inactive';

export interface PatientRow {
    id: string;
    name: string;
    dob: string | null;
    assigned_doctor_id: string | null;
}

export interface DeviceRow {
    id: string;
    type: DeviceType;
    patient_id: string;
    api_key: string;
    status: DeviceStatus;
    registered_at: string;
}

export interface VitalRow {
    id: string;
    patient_id: string;
    timestamp: string;
    timestamp_ms: number;
    heart_rate: number | null;
    bp_systolic: number | null;
    bp_diastolic: number | null;
    spo2: number | null;
    temp: number | null;
    device_id: string;
}

export interface IdempotencyRow {
    id: number;
    device_id: string;
    key: string;
    created_at: string;
}
