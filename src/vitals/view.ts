import type { VitalView } from '../contracts/types.js';
import type { VitalRow } from '../store/types.js';

export function toVitalView(row: VitalRow): VitalView {
    return {
        vital_id: row.id,
        timestamp: row.timestamp,
        heart_rate: row.heart_rate,
        bp: row.bp_systolic !== null && row.bp_diastolic !== null
            ? { systolic: row.bp_systolic, diastolic: row.bp_diastolic }
            : null,
        spo2: row.spo2,
        temp: row.temp,
        device_id: row.device_id,
    };
}
